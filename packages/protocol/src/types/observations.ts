// Observation types - what was seen during a turn

import type { Id, Timestamp } from './common.js';

/**
 * Kinds of observation an episode can hold.
 * - user_utterance: the user replied with text
 * - silence: no usable reply was captured
 * - halt: an invariant or policy stopped the turn
 */
export type ObservationType = 'user_utterance' | 'silence' | 'halt';

export const OBSERVATION_TYPES: readonly ObservationType[] = ['user_utterance', 'silence', 'halt'];

/**
 * An Observation is an immutable record of something seen during a turn.
 */
export type Observation = {
  id: Id;

  /**
   * When the observation was recorded
   */
  observedAt: Timestamp;

  type: ObservationType;

  /**
   * Utterance text (user_utterance) or halt reason (halt)
   */
  text?: string;

  /**
   * Where the observation came from, e.g. "channel:chat" or "invariant:prediction_availability.v1"
   */
  source: string;
};
