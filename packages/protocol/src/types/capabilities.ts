// Capability types - explicit permission for side-effecting calls

import type { Id } from './common.js';
import type { HaltRecord } from './halts.js';

/**
 * Permission token every log append and outbox dispatch must receive.
 */
export type CapabilityAdapterGate = {
  readonly invocationId: Id;
  readonly allowed: boolean;
};

export type CapabilityPolicyCode =
  | 'current_prediction_required'
  | 'explicit_gate_pass_required'
  | 'observer_scope_denied';

/**
 * Everything the policy looked at when deciding an invocation.
 */
export type CapabilityInvocationAttempt = {
  invocationId: Id;
  capability: string;
  action: string;
  stage: string;
  scopeKey: string;
  predictionKey: string | null;
  requiredCapability: string;
  explicitGatePassPresent: boolean;
  currentPredictionAvailable: boolean;
  observerRole: string | null;
  observerAuthorizationLevel: string | null;
  observerCapabilities: string[];
};

export type CapabilityInvocationDecision =
  | {
      allowed: true;
      attempt: CapabilityInvocationAttempt;
    }
  | {
      allowed: false;
      attempt: CapabilityInvocationAttempt;
      denialCode: CapabilityPolicyCode;
      denialReason: string;
      halt: HaltRecord;
    };
