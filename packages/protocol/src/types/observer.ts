// Observer frame - the capability scope of a single episode

/**
 * Capabilities granted to the baseline observer.
 */
export const BASELINE_CAPABILITIES = [
  'baseline.dialog',
  'baseline.schema_selection',
  'baseline.invariant_evaluation',
  'baseline.evaluation',
] as const;

export type BaselineCapability = (typeof BASELINE_CAPABILITIES)[number];

/**
 * Declares who is observing a turn and what they may do.
 *
 * `capabilities` gates actions (persistence, outbox dispatch, interpretation).
 * `evaluationInvariants` scopes which invariants run; absent or empty means
 * "no restriction".
 */
export type ObserverFrame = {
  role: string;
  authorizationLevel: string;
  capabilities: string[];
  evaluationInvariants?: string[];
};

/**
 * Context recorded whenever an observer is checked for an action.
 */
export type AuthorizationContext = {
  action: string;
  requiredCapability: string;
  observerRole: string | null;
  authorizationLevel: string | null;
  observerCapabilities: string[];
  authorized: boolean;
};
