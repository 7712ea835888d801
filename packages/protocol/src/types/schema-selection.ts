// Schema selection types - the classifier contract and the belief it updates

import type { JsonObject, Timestamp } from './common.js';
import type { AskStatus } from './episodes.js';

export type AmbiguityStatus = 'none' | 'unresolved' | 'resolved';

export type ResolutionPolicy = 'ask_user' | 'use_default' | 'defer' | 'lookup';

export type AmbiguityType =
  | 'underspecified'
  | 'polysemy'
  | 'conflict'
  | 'missing_context'
  | 'uncertain_mapping';

export type AboutKind =
  | 'intent'
  | 'entity'
  | 'time'
  | 'place'
  | 'parameter'
  | 'schema'
  | 'goal'
  | 'channel';

export type TextSpan = {
  text: string;
  start?: number;
  end?: number;
};

/**
 * What an ambiguity is about.
 */
export type AmbiguityAbout = {
  kind: AboutKind;
  key: string;
  span?: TextSpan;
};

export type Candidate = {
  value: string;
  score: number;
};

export type ClarifyingQuestion = {
  question: string;
  options?: string[];
};

export type Ambiguity = {
  status: AmbiguityStatus;
  about: AmbiguityAbout;
  type: AmbiguityType;
  candidates: Candidate[];
  resolutionPolicy: ResolutionPolicy;
  ask: ClarifyingQuestion[];
  notes?: string;
};

export type SchemaHit = {
  name: string;
  score: number;
  about?: AmbiguityAbout;
};

/**
 * Result type every schema selector must return.
 */
export type SchemaSelection = {
  schemas: SchemaHit[];
  ambiguities: Ambiguity[];
  notes?: string;
};

export type UtteranceType = 'none' | 'low_signal' | 'normal' | 'exit_intent';

/**
 * The open clarification obligation, if any.
 */
export type PendingAbout = {
  kind: AboutKind;
  key: string;
  span?: TextSpan;
};

/**
 * Conversation-level belief, carried from turn to turn by the caller.
 */
export type BeliefState = {
  beliefVersion: number;
  ambiguityState: AmbiguityStatus;
  pendingAbout: PendingAbout | null;
  pendingQuestion: string | null;
  pendingAttempts: number;
  bindings: JsonObject;
  activeSchemas: string[];
  schemaConfidence: Record<string, number>;
  ambiguitiesActive: Ambiguity[];
  updatedAt: Timestamp | null;
  lastUtteranceType: UtteranceType | null;
  lastStatus: AskStatus | null;
  consecutiveNoResponse: number;
};
