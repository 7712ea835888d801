// Observation-freshness types

import type { JsonObject, Timestamp } from './common.js';

/**
 * Per-turn freshness policy supplied by an external adapter.
 */
export type ObservationFreshnessPolicyContract = {
  /**
   * Matched case-insensitively against observation type or source
   */
  scope: string;
  observedAt?: Timestamp;
  staleAfterSeconds: number;
};

export type ObservationFreshnessOutcome = 'continue' | 'ask_request' | 'hold';

export type ObservationFreshnessDecision = {
  scope: string;
  outcome: ObservationFreshnessOutcome;
  reason: string;
  staleAfterSeconds: number;
  observedAt?: Timestamp;
  lastObservedAt: Timestamp | null;
  lastObservedValue: string | null;
  evidence: JsonObject;
};
