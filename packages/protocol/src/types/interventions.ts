// Intervention types - the human-in-the-loop checkpoint contract

import type { Id, JsonObject, Timestamp } from './common.js';

export type InterventionAction = 'none' | 'pause' | 'timeout' | 'escalate' | 'resume';

export const INTERVENTION_ACTIONS: readonly InterventionAction[] = [
  'none',
  'pause',
  'timeout',
  'escalate',
  'resume',
];

/**
 * Actions that end the turn early.
 */
export const TERMINAL_INTERVENTION_ACTIONS: readonly InterventionAction[] = [
  'pause',
  'timeout',
  'escalate',
];

export type InterventionOverrideSource = 'operator' | 'policy' | 'system';

/**
 * The four lifecycle points at which the intervention hook is consulted.
 */
export type InterventionPhase =
  | 'start'
  | 'post_pre_decision_gate'
  | 'post_observation_gate'
  | 'post_pre_output_gate';

/**
 * Normalized hook decision.
 * `resume` is only valid with both `overrideSource` and `overrideProvenance`.
 */
export type InterventionDecision = {
  action: InterventionAction;
  reason?: string;
  metadata: JsonObject;
  overrideSource?: InterventionOverrideSource;
  overrideProvenance?: string;
  requestId?: Id;
  respondedAt?: Timestamp;
};

/**
 * Lifecycle request emitted before each hook invocation.
 */
export type InterventionRequest = {
  requestId: Id;
  phase: InterventionPhase;
  episodeId: Id;
  conversationId: Id;
  turnIndex: number;
  projectionUpdatedAt: Timestamp;
  createdAt: Timestamp;
  timeoutSeconds?: number;
  metadata: JsonObject;
};
