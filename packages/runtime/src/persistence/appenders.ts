// Typed appends onto the two log streams
//
// Every function takes the capability gate issued for the call and passes it
// through to the log, which rejects a missing or denied gate before any I/O.

import type {
  AskOutboxRequestEvent,
  AskOutboxResponseEvent,
  CapabilityAdapterGate,
  EvidenceRef,
  HaltRecord,
  Id,
  PredictionLogEvent,
  PredictionRecord,
  RepairProposalEvent,
  RepairResolutionEvent,
} from '@ledgerline/protocol';
import { toCanonicalHaltPayload } from '@ledgerline/protocol';
import type { LogContext } from '@ledgerline/repositories';

/**
 * Episode identifiers stamped onto prediction events.
 */
export type EpisodeTags = {
  episodeId?: Id;
  conversationId?: Id;
  turnIndex?: number;
};

export function appendHaltRecord(
  logs: LogContext,
  halt: HaltRecord,
  gate: CapabilityAdapterGate
): Promise<EvidenceRef> {
  return logs.halts.append(toCanonicalHaltPayload(halt), gate);
}

export function appendPredictionEvent(
  logs: LogContext,
  eventKind: PredictionLogEvent['eventKind'],
  record: PredictionRecord,
  gate: CapabilityAdapterGate,
  tags: EpisodeTags = {}
): Promise<EvidenceRef> {
  const event: PredictionLogEvent = { ...record, ...tags, eventKind };
  return logs.predictions.append({ ...event }, gate);
}

export function appendRepairEvent(
  logs: LogContext,
  event: RepairProposalEvent | RepairResolutionEvent,
  gate: CapabilityAdapterGate
): Promise<EvidenceRef> {
  return logs.predictions.append({ ...event }, gate);
}

export function appendAskOutboxEvent(
  logs: LogContext,
  event: AskOutboxRequestEvent | AskOutboxResponseEvent,
  gate: CapabilityAdapterGate
): Promise<EvidenceRef> {
  return logs.predictions.append({ ...event }, gate);
}
