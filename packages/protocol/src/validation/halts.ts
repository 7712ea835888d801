// Halt payload validation
//
// A halt is only ever constructed through this module. Legacy alias fields are
// accepted on read, but must agree with their canonical counterparts, and the
// persisted form carries canonical fields only.

import { z } from 'zod';
import type { EvidenceRef, JsonObject } from '../types/common.js';
import type { HaltRecord } from '../types/halts.js';
import { HALT_ALIAS_FIELDS } from '../types/halts.js';
import { stringifyCanonical } from '../bundle/ndjson.js';
import { evidenceRefSchema } from './schemas.js';
import { isRecord } from './guards.js';

/**
 * Raised when a halt payload is missing fields, carries empty details or
 * evidence, or has alias fields that disagree.
 */
export class HaltPayloadValidationError extends Error {
  readonly code = 'HALT_PAYLOAD_INVALID';
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'HaltPayloadValidationError';
    this.issues = issues;
  }
}

const haltRecordSchema = z.object({
  haltId: z.string().trim().min(1),
  stage: z.string().trim().min(1),
  invariantId: z.string().trim().min(1),
  reason: z.string().trim().min(1),
  details: z
    .record(z.unknown())
    .refine((details) => Object.keys(details).length > 0, 'details must not be empty'),
  evidence: z.array(evidenceRefSchema).min(1, 'evidence must not be empty'),
  retryability: z.boolean(),
  timestamp: z.string().trim().min(1),
});

function freezeHalt(parsed: z.infer<typeof haltRecordSchema>): HaltRecord {
  const evidence: EvidenceRef[] = parsed.evidence.map((item) => Object.freeze({ ...item }));
  return Object.freeze({
    haltId: parsed.haltId,
    stage: parsed.stage,
    invariantId: parsed.invariantId,
    reason: parsed.reason,
    details: Object.freeze({ ...parsed.details }),
    evidence: Object.freeze(evidence),
    retryability: parsed.retryability,
    timestamp: parsed.timestamp,
  });
}

function validateCandidate(candidate: Record<string, unknown>): HaltRecord {
  const result = haltRecordSchema.safeParse(candidate);
  if (!result.success) {
    throw new HaltPayloadValidationError(
      'halt payload is malformed or incomplete',
      result.error.issues.map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`)
    );
  }
  return freezeHalt(result.data);
}

/**
 * Build a halt from canonical fields.
 *
 * @throws HaltPayloadValidationError when any field is missing or empty
 */
export function createHaltRecord(fields: {
  haltId: string;
  stage: string;
  invariantId: string;
  reason: string;
  details: JsonObject;
  evidence: readonly EvidenceRef[];
  retryability: boolean;
  timestamp: string;
}): HaltRecord {
  return validateCandidate({ ...fields, evidence: [...fields.evidence] });
}

/**
 * Parse a persisted halt payload, accepting legacy alias fields.
 *
 * @throws HaltPayloadValidationError when the payload is not an object, an
 * alias disagrees with its canonical field, or the result is incomplete
 */
export function parseHaltRecord(payload: unknown): HaltRecord {
  if (!isRecord(payload)) {
    throw new HaltPayloadValidationError('halt payload must be a JSON object');
  }

  for (const [canonical, alias] of Object.entries(HALT_ALIAS_FIELDS)) {
    if (canonical in payload && alias in payload) {
      if (stringifyCanonical(payload[canonical]) !== stringifyCanonical(payload[alias])) {
        throw new HaltPayloadValidationError(
          `halt payload field mismatch: ${canonical} != ${alias}`
        );
      }
    }
  }

  return validateCandidate({
    haltId: payload.haltId ?? payload.stableHaltId,
    stage: payload.stage,
    invariantId: payload.invariantId ?? payload.violatedInvariantId,
    reason: payload.reason,
    details: payload.details,
    evidence: payload.evidence ?? payload.evidenceRefs,
    retryability: payload.retryability ?? payload.retryable,
    timestamp: payload.timestamp ?? payload.timestampIso,
  });
}

/**
 * True when the payload parses as a halt.
 */
export function isHaltPayload(payload: unknown): boolean {
  try {
    parseHaltRecord(payload);
    return true;
  } catch (error) {
    if (error instanceof HaltPayloadValidationError) {
      return false;
    }
    throw error;
  }
}

/**
 * The persisted form of a halt: canonical fields only, in canonical order.
 */
export function toCanonicalHaltPayload(halt: HaltRecord): JsonObject {
  return {
    haltId: halt.haltId,
    stage: halt.stage,
    invariantId: halt.invariantId,
    reason: halt.reason,
    details: { ...halt.details },
    evidence: halt.evidence.map((item) => ({ kind: item.kind, ref: item.ref })),
    retryability: halt.retryability,
    timestamp: halt.timestamp,
  };
}
