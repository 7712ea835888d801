import type { CapabilityAdapterGate, EvidenceRef, JsonObject } from '@ledgerline/protocol';

/**
 * AppendOnlyLog is the only persistence mechanism.
 *
 * Records are JSON objects written one per line and never rewritten or
 * truncated. Every append requires an explicit capability gate; a gate with
 * `allowed: false` fails before any I/O happens.
 */
export interface AppendOnlyLog {
  /**
   * Stream name used in evidence refs, e.g. "predictions.jsonl"
   */
  readonly name: string;

  /**
   * Append one record. Returns a `jsonl` evidence ref naming the 1-based line
   * the record landed on, e.g. { kind: "jsonl", ref: "predictions.jsonl@3" }.
   *
   * @throws MissingCapabilityGateError when no gate is supplied
   * @throws CapabilityDeniedError when the gate does not allow the write
   */
  append(record: JsonObject, gate: CapabilityAdapterGate): Promise<EvidenceRef>;

  /**
   * Read the full NDJSON content in append order ("" when nothing was written).
   */
  read(): Promise<string>;
}
