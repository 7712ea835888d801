// Episode construction and per-turn observation helpers

import type {
  AskMetrics,
  AskResult,
  AskStatus,
  CaptureOutcome,
  Episode,
  JsonObject,
  ObserverFrame,
  PolicyDecision,
} from '@ledgerline/protocol';
import type { RuntimeContext } from '../context.js';
import { authorizeObserver, createDefaultObserverFrame } from '../observer.js';
import { appendArtifact, recordAuthorizationIssue } from './artifacts.js';

/**
 * Raw result of asking the user, as handed over by the dialog channel.
 * `error` may be a capture outcome or just its status/message string.
 */
export type AskPayload = {
  sentence?: string | null;
  slots?: JsonObject;
  error?: CaptureOutcome | string | null;
  metrics?: Partial<AskMetrics>;
};

export type BuildEpisodeInput = {
  conversationId: string;
  turnIndex: number;
  assistantPrompt: string;
  policyDecision: PolicyDecision;
  payload: AskPayload;
  observer?: ObserverFrame;
};

function toCaptureOutcome(error: AskPayload['error']): CaptureOutcome | undefined {
  if (error === undefined || error === null) return undefined;
  if (typeof error !== 'string') return error;
  if (error === 'no_response') return { status: 'no_response', details: {} };
  return { status: 'error', message: error, details: {} };
}

function askStatus(capture: CaptureOutcome | undefined): AskStatus {
  if (!capture) return 'ok';
  return capture.status === 'no_response' ? 'no_response' : 'error';
}

/**
 * Create the episode for one turn and record the policy hypothesis it tests.
 */
export function buildEpisode(ctx: RuntimeContext, input: BuildEpisodeInput): Episode {
  const capture = toCaptureOutcome(input.payload.error);
  const ask: AskResult = {
    status: askStatus(capture),
    slots: input.payload.slots ?? {},
    metrics: {
      elapsedSeconds: input.payload.metrics?.elapsedSeconds ?? 0,
      questionChars: input.payload.metrics?.questionChars ?? 0,
      questionWords: input.payload.metrics?.questionWords ?? 0,
    },
  };
  if (typeof input.payload.sentence === 'string') ask.sentence = input.payload.sentence;
  if (capture) ask.error = capture;

  const episode: Episode = {
    id: ctx.newId('ep:'),
    conversationId: input.conversationId,
    turnIndex: input.turnIndex,
    askedAt: ctx.now(),
    assistantPrompt: input.assistantPrompt,
    observer: input.observer ?? createDefaultObserverFrame(),
    policyDecision: input.policyDecision,
    ask,
    observations: [],
    artifacts: [],
    effects: [],
  };

  appendArtifact(episode, {
    artifactKind: 'policy_hypothesis',
    decisionId: input.policyDecision.decisionId,
    hypothesis: input.policyDecision.hypothesis ?? null,
    reasonCodes: [...input.policyDecision.reasonCodes],
  });
  return episode;
}

/**
 * Record what the user did this turn: their utterance, or silence.
 */
export function ingestObservation(ctx: RuntimeContext, episode: Episode): Episode {
  const text = (episode.ask.sentence ?? '').trim();
  const base = {
    id: `obs:${episode.id}:0`,
    observedAt: ctx.now(),
    source: `channel:${episode.policyDecision.channel}`,
  };

  if (episode.ask.status === 'ok' && text) {
    episode.observations.push({ ...base, type: 'user_utterance', text });
  } else {
    episode.observations.push({ ...base, type: 'silence' });
  }
  return episode;
}

/**
 * The first user utterance observed this turn, trimmed, or null.
 */
export function extractUserUtterance(episode: Episode): string | null {
  const observation = episode.observations.find((item) => item.type === 'user_utterance');
  if (!observation) return null;
  return (observation.text ?? '').trim() || null;
}

/**
 * Evaluate the previous turn's decision against what happened in this one.
 * Requires `baseline.evaluation`; without it an authorization issue is
 * recorded instead.
 */
export function attachDecisionEffect(
  ctx: RuntimeContext,
  previous: Episode | null,
  current: Episode
): Episode {
  if (!previous || !previous.policyDecision.decisionId) {
    return current;
  }

  const authorization = authorizeObserver(
    current.observer,
    'attach_decision_effect',
    'baseline.evaluation'
  );
  if (!authorization.authorized) {
    recordAuthorizationIssue(ctx, current, 'decision-evaluation', authorization);
    return current;
  }

  const userText = extractUserUtterance(current);
  const held = current.ask.status === 'ok' && userText !== null;

  current.effects.push({
    evaluatesDecisionId: previous.policyDecision.decisionId,
    decisionEpisodeId: previous.id,
    evaluatedInEpisodeId: current.id,
    responseCaptured: held,
    status: current.ask.status,
    hadUserUtterance: userText !== null,
    userUtteranceChars: userText?.length ?? 0,
    elapsedSeconds: current.ask.metrics.elapsedSeconds,
    hypothesis: previous.policyDecision.hypothesis ?? null,
    held,
    observerRole: current.observer.role,
    authorizationLevel: current.observer.authorizationLevel,
  });
  return current;
}
