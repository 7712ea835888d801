// Halt construction from stop outcomes

import type { HaltRecord, InvariantOutcome, Timestamp } from '@ledgerline/protocol';
import { createHaltRecord, stringifyCanonical } from '@ledgerline/protocol';
import { shortHash } from '../hashing.js';

/**
 * Content-derived halt id: identical stage, invariant, reason and evidence
 * always give the same id.
 */
export function stableHaltId(stage: string, outcome: InvariantOutcome): string {
  const evidence = outcome.evidence
    .map((item) => stringifyCanonical(item))
    .sort()
    .join(',');
  return `halt:${shortHash(stage, outcome.invariantId, outcome.reason, evidence)}`;
}

/**
 * @throws HaltPayloadValidationError when the outcome has empty details or evidence
 */
export function haltFromOutcome(
  stage: string,
  outcome: InvariantOutcome,
  timestamp: Timestamp
): HaltRecord {
  return createHaltRecord({
    haltId: stableHaltId(stage, outcome),
    stage,
    invariantId: outcome.invariantId,
    reason: outcome.reason,
    details: outcome.details,
    evidence: outcome.evidence,
    retryability: (outcome.actionHints ?? []).length > 0,
    timestamp,
  });
}
