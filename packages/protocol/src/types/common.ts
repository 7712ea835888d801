// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Opaque string identifier (usually prefixed, e.g. "pred:", "ep:", "halt:")
 */
export type Id = string;

/**
 * Plain JSON object used for free-form details and metadata
 */
export type JsonObject = Record<string, unknown>;

/**
 * A tagged reference to a piece of evidence.
 * Both fields are required and must be non-empty.
 *
 * Examples:
 * - { kind: "jsonl", ref: "predictions.jsonl@12" }
 * - { kind: "scope", ref: "turn:3" }
 */
export type EvidenceRef = {
  kind: string;
  ref: string;
};

/**
 * Unix epoch, used as the initial `updatedAt` of an empty projection.
 */
export const EPOCH_TIMESTAMP: Timestamp = '1970-01-01T00:00:00.000Z';
