// Episode types - one conversational turn

import type { Id, JsonObject, Timestamp } from './common.js';
import type { Observation } from './observations.js';
import type { ObserverFrame } from './observer.js';
import type { EpisodeArtifact } from './artifacts.js';

export type AskStatus = 'ok' | 'no_response' | 'error';

export type CaptureStatus = 'no_response' | 'error';

/**
 * Why a reply could not be captured.
 */
export type CaptureOutcome = {
  status: CaptureStatus;
  message?: string;
  details: JsonObject;
};

export type AskMetrics = {
  elapsedSeconds: number;
  questionChars: number;
  questionWords: number;
};

/**
 * What came back from asking the user.
 */
export type AskResult = {
  status: AskStatus;
  sentence?: string;
  slots: JsonObject;
  error?: CaptureOutcome;
  metrics: AskMetrics;
};

/**
 * The agent's decision about how to ask this turn.
 */
export type PolicyDecision = {
  decisionId: Id;
  decidedAt: Timestamp;
  actionType: string;
  channel: string;
  reasonCodes: string[];
  hypothesis?: string;
};

/**
 * Links a prior episode's decision to what happened in the current one.
 */
export type DecisionEffect = {
  evaluatesDecisionId: Id;
  decisionEpisodeId: Id;
  evaluatedInEpisodeId: Id;
  responseCaptured: boolean;
  status: AskStatus;
  hadUserUtterance: boolean;
  userUtteranceChars: number;
  elapsedSeconds: number;
  hypothesis: string | null;
  held: boolean;
  observerRole: string;
  authorizationLevel: string;
};

/**
 * One conversational turn. Created once by `buildEpisode`; afterwards only
 * `observations`, `artifacts` and `effects` are appended to.
 */
export type Episode = {
  readonly id: Id;
  readonly conversationId: Id;
  readonly turnIndex: number;
  readonly askedAt: Timestamp;
  readonly assistantPrompt: string;
  readonly observer: ObserverFrame;
  readonly policyDecision: PolicyDecision;
  readonly ask: AskResult;
  readonly observations: Observation[];
  readonly artifacts: EpisodeArtifact[];
  readonly effects: DecisionEffect[];
};
