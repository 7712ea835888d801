// Observer capability checks

import type { AuthorizationContext, InvariantId, ObserverFrame } from '@ledgerline/protocol';
import { BASELINE_CAPABILITIES, INVARIANT_IDS } from '@ledgerline/protocol';

/**
 * The observer used when a turn does not name one.
 */
export function createDefaultObserverFrame(): ObserverFrame {
  return {
    role: 'assistant',
    authorizationLevel: 'baseline',
    capabilities: [...BASELINE_CAPABILITIES],
    evaluationInvariants: [],
  };
}

/**
 * A missing observer is unrestricted.
 */
export function observerHasCapability(observer: ObserverFrame | null, capability: string): boolean {
  if (!observer) return true;
  return observer.capabilities.includes(capability);
}

/**
 * Whether the observer's evaluation allow-list lets an invariant run.
 * An absent or empty list means no restriction; unknown names are ignored.
 */
export function observerAllowsInvariant(
  observer: ObserverFrame | null,
  invariantId: InvariantId
): boolean {
  const configured = observer?.evaluationInvariants ?? [];
  if (configured.length === 0) return true;

  const known: readonly string[] = INVARIANT_IDS;
  return configured.filter((name) => known.includes(name)).includes(invariantId);
}

export function authorizeObserver(
  observer: ObserverFrame | null,
  action: string,
  requiredCapability: string
): AuthorizationContext {
  return {
    action,
    requiredCapability,
    observerRole: observer?.role ?? null,
    authorizationLevel: observer?.authorizationLevel ?? null,
    observerCapabilities: [...(observer?.capabilities ?? [])],
    authorized: observerHasCapability(observer, requiredCapability),
  };
}
