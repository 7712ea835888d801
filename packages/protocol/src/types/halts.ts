// Halt types - durable explanations of a stop

import type { EvidenceRef, Id, JsonObject, Timestamp } from './common.js';

/**
 * The durable, immutable explanation of a stop.
 *
 * Construct through `createHaltRecord` or `parseHaltRecord` (validation/halts),
 * which reject empty details, empty evidence and disagreeing legacy aliases.
 */
export type HaltRecord = {
  /**
   * Content-derived id: the same violating context always yields the same id
   */
  readonly haltId: Id;

  /**
   * Gate point that stopped, e.g. "pre-decision:pre_consume"
   */
  readonly stage: string;

  readonly invariantId: string;
  readonly reason: string;
  readonly details: JsonObject;
  readonly evidence: readonly EvidenceRef[];

  /**
   * Whether the stop carries a follow-up that could make a retry succeed
   */
  readonly retryability: boolean;

  readonly timestamp: Timestamp;
};

/**
 * Legacy field names accepted when reading persisted halts.
 * Each must agree with its canonical counterpart when both are present.
 */
export const HALT_ALIAS_FIELDS = {
  haltId: 'stableHaltId',
  invariantId: 'violatedInvariantId',
  evidence: 'evidenceRefs',
  retryability: 'retryable',
  timestamp: 'timestampIso',
} as const;

/**
 * Canonical persisted field order.
 */
export const HALT_PAYLOAD_FIELDS = [
  'haltId',
  'stage',
  'invariantId',
  'reason',
  'details',
  'evidence',
  'retryability',
  'timestamp',
] as const;
