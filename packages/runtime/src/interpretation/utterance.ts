// Utterance interpretation

import type {
  BeliefState,
  CaptureOutcome,
  Episode,
  UtteranceType,
} from '@ledgerline/protocol';
import type { RuntimeContext } from '../context.js';
import { authorizeObserver } from '../observer.js';
import { appendArtifact, recordAuthorizationIssue } from '../episodes/artifacts.js';
import { extractUserUtterance } from '../episodes/episode.js';

export const EXIT_EXACT: ReadonlySet<string> = new Set(['quit', 'exit', 'q', 'lopeta', 'pois', 'stop']);

export const EXIT_PHRASES: readonly string[] = [
  'take a break',
  'pause',
  'stop for now',
  'come back later',
  'not now',
  'later',
  'leave me alone',
];

export const PHATIC_PATTERNS: readonly string[] = [
  "that's a great question",
  "that's an interesting question",
  'good question',
  'interesting',
  "i don't know",
  'not sure',
  'thanks',
];

const LOW_SIGNAL_MAX_WORDS = 8;
const TEXT_PREVIEW_CHARS = 80;

export function isExitIntent(text: string): boolean {
  const lowered = text.trim().toLowerCase();
  return EXIT_EXACT.has(lowered) || EXIT_PHRASES.some((phrase) => lowered.includes(phrase));
}

export function classifyUtterance(
  sentence: string | null,
  captureError: CaptureOutcome | null
): UtteranceType {
  if (captureError?.status === 'no_response') return 'none';

  const text = (sentence ?? '').trim().toLowerCase();
  if (!text) return 'none';
  if (isExitIntent(text)) return 'exit_intent';

  const words = text.split(/\s+/).length;
  if (PHATIC_PATTERNS.some((pattern) => text.includes(pattern)) && words <= LOW_SIGNAL_MAX_WORDS) {
    return 'low_signal';
  }
  return 'normal';
}

/**
 * Classify the turn's utterance and track the no-response streak.
 * Requires `baseline.dialog`; without it the belief is returned unchanged.
 */
export function applyUtteranceInterpretation(
  ctx: RuntimeContext,
  episode: Episode,
  belief: BeliefState
): BeliefState {
  const authorization = authorizeObserver(
    episode.observer,
    'apply_utterance_interpretation',
    'baseline.dialog'
  );
  if (!authorization.authorized) {
    recordAuthorizationIssue(ctx, episode, 'policy-utterance', authorization);
    return belief;
  }

  const text = extractUserUtterance(episode);
  const utteranceType = classifyUtterance(text, episode.ask.error ?? null);
  const consecutiveNoResponse =
    episode.ask.status === 'no_response' ? belief.consecutiveNoResponse + 1 : 0;

  appendArtifact(episode, {
    artifactKind: 'utterance_interpretation',
    observerRole: episode.observer.role,
    authorizationLevel: episode.observer.authorizationLevel,
    utteranceType,
    textPreview: text === null ? null : text.slice(0, TEXT_PREVIEW_CHARS),
    consecutiveNoResponse,
  });

  return {
    ...belief,
    lastUtteranceType: utteranceType,
    lastStatus: episode.ask.status,
    consecutiveNoResponse,
  };
}
