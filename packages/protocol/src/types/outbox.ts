// Ask-Outbox types - requests for human input and their responses

import type { EvidenceRef, Id, JsonObject, Timestamp } from './common.js';

/**
 * Persisted when a human-recruitment request is dispatched.
 */
export type AskOutboxRequestEvent = {
  eventKind: 'ask_outbox_request';
  requestId: Id;
  scope: string;
  reason: string;
  evidenceRefs: EvidenceRef[];
  createdAt: Timestamp;
  timeoutAt?: Timestamp;
  metadata: JsonObject;
};

/**
 * Persisted when a response to a dispatched request is recorded.
 * `status` carries the intervention action that answered it.
 */
export type AskOutboxResponseEvent = {
  eventKind: 'ask_outbox_response';
  requestId: Id;
  scope: string;
  reason: string;
  evidenceRefs: EvidenceRef[];
  createdAt: Timestamp;
  respondedAt: Timestamp;
  status: string;
  escalation: boolean;
  metadata: JsonObject;
};
