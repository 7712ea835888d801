// Tests for episode construction and per-turn observations

import { describe, it, expect } from 'vitest';
import type { Episode, ObserverFrame } from '@ledgerline/protocol';
import { createInMemoryLogContext } from '@ledgerline/repositories';
import {
  createFixedClock,
  createRuntimeContext,
  createSequentialIds,
  type RuntimeContext,
} from '../context.js';
import { createCapturingLogger } from '../logging.js';
import { appendTurnSummary, findArtifacts, recordHaltObservation } from './artifacts.js';
import {
  attachDecisionEffect,
  buildEpisode,
  extractUserUtterance,
  ingestObservation,
  type AskPayload,
} from './episode.js';

const NOW = '2026-03-01T12:00:00.000Z';

// --- Test Fixtures ---

function createTestContext() {
  const logger = createCapturingLogger();
  const ctx = createRuntimeContext({
    logs: createInMemoryLogContext(),
    logger,
    now: createFixedClock(NOW),
    newId: createSequentialIds(),
  });
  return { ctx, logger };
}

function createMockEpisode(
  ctx: RuntimeContext,
  payload: AskPayload = { sentence: 'Slept well' },
  observer?: ObserverFrame
): Episode {
  return buildEpisode(ctx, {
    conversationId: 'conv:1',
    turnIndex: 2,
    assistantPrompt: 'How did you sleep?',
    policyDecision: {
      decisionId: 'dec:2',
      decidedAt: NOW,
      actionType: 'ask',
      channel: 'chat',
      reasonCodes: ['morning_check'],
      hypothesis: 'user answers a short question',
    },
    payload,
    observer,
  });
}

describe('buildEpisode', () => {
  it('records the policy hypothesis and an ok ask', () => {
    const { ctx } = createTestContext();

    const episode = createMockEpisode(ctx);

    expect(episode.id).toBe('ep:1');
    expect(episode.askedAt).toBe(NOW);
    expect(episode.observer.role).toBe('assistant');
    expect(episode.ask).toEqual({
      status: 'ok',
      sentence: 'Slept well',
      slots: {},
      metrics: { elapsedSeconds: 0, questionChars: 0, questionWords: 0 },
    });
    expect(episode.artifacts).toEqual([
      {
        artifactKind: 'policy_hypothesis',
        decisionId: 'dec:2',
        hypothesis: 'user answers a short question',
        reasonCodes: ['morning_check'],
      },
    ]);
  });

  it.each([
    ['no_response', 'no_response'],
    ['microphone unavailable', 'error'],
  ] as const)('maps the capture error %s to %s', (error, status) => {
    const { ctx } = createTestContext();

    const episode = createMockEpisode(ctx, { error });

    expect(episode.ask.status).toBe(status);
    expect(episode.ask.sentence).toBeUndefined();
  });

  it('keeps a structured capture outcome', () => {
    const { ctx } = createTestContext();

    const episode = createMockEpisode(ctx, {
      error: { status: 'no_response', details: { waitedSeconds: 30 } },
    });

    expect(episode.ask.status).toBe('no_response');
    expect(episode.ask.error).toEqual({ status: 'no_response', details: { waitedSeconds: 30 } });
  });
});

describe('ingestObservation', () => {
  it('records a trimmed utterance', () => {
    const { ctx } = createTestContext();
    const episode = createMockEpisode(ctx, { sentence: '  Slept well  ' });

    ingestObservation(ctx, episode);

    expect(episode.observations).toEqual([
      {
        id: 'obs:ep:1:0',
        observedAt: NOW,
        source: 'channel:chat',
        type: 'user_utterance',
        text: 'Slept well',
      },
    ]);
    expect(extractUserUtterance(episode)).toBe('Slept well');
  });

  it('records silence for blank text or a failed capture', () => {
    const { ctx } = createTestContext();
    const blank = createMockEpisode(ctx, { sentence: '   ' });
    const failed = createMockEpisode(ctx, { sentence: 'hello', error: 'no_response' });

    ingestObservation(ctx, blank);
    ingestObservation(ctx, failed);

    expect(blank.observations.map((item) => item.type)).toEqual(['silence']);
    expect(failed.observations.map((item) => item.type)).toEqual(['silence']);
    expect(extractUserUtterance(failed)).toBeNull();
  });
});

describe('attachDecisionEffect', () => {
  it('evaluates the previous decision against this turn', () => {
    const { ctx } = createTestContext();
    const previous = createMockEpisode(ctx);
    const current = ingestObservation(ctx, createMockEpisode(ctx, { sentence: 'Fine' }));

    attachDecisionEffect(ctx, previous, current);

    expect(current.effects).toEqual([
      {
        evaluatesDecisionId: 'dec:2',
        decisionEpisodeId: 'ep:1',
        evaluatedInEpisodeId: 'ep:2',
        responseCaptured: true,
        status: 'ok',
        hadUserUtterance: true,
        userUtteranceChars: 4,
        elapsedSeconds: 0,
        hypothesis: 'user answers a short question',
        held: true,
        observerRole: 'assistant',
        authorizationLevel: 'baseline',
      },
    ]);
  });

  it('does nothing without a previous episode', () => {
    const { ctx } = createTestContext();
    const current = createMockEpisode(ctx);

    attachDecisionEffect(ctx, null, current);

    expect(current.effects).toEqual([]);
  });

  it('records an authorization issue when the observer cannot evaluate', () => {
    const { ctx, logger } = createTestContext();
    const previous = createMockEpisode(ctx);
    const current = createMockEpisode(ctx, { sentence: 'Fine' }, {
      role: 'guest',
      authorizationLevel: 'restricted',
      capabilities: ['baseline.dialog'],
    });

    attachDecisionEffect(ctx, previous, current);

    expect(current.effects).toEqual([]);
    const [issue] = findArtifacts(current, 'authorization_issue');
    expect(issue.halt.invariantId).toBe('authorization.scope.v1');
    expect(issue.halt.stage).toBe('decision-evaluation');
    expect(issue.halt.evidence).toEqual([
      { kind: 'authorization_scope', ref: 'action:attach_decision_effect' },
      { kind: 'required_capability', ref: 'baseline.evaluation' },
    ]);
    expect(current.observations).toEqual([
      {
        id: 'obs:1',
        observedAt: NOW,
        type: 'halt',
        text: 'Observer is not authorized for attach_decision_effect.',
        source: 'authorization:attach_decision_effect',
      },
    ]);
    expect(logger.entries.map((entry) => entry.message)).toEqual(['Observer not authorized']);
  });
});

describe('appendTurnSummary', () => {
  it('lists the halts recorded this turn', () => {
    const { ctx } = createTestContext();
    const episode = createMockEpisode(ctx);
    const halt = {
      haltId: 'halt:1',
      stage: 'pre-decision:pre_consume',
      invariantId: 'prediction_availability.v1',
      reason: 'Action selection requires at least one projected current prediction.',
      details: { reasonCode: 'no_predictions_projected' },
      evidence: [{ kind: 'scope', ref: 'decision_stage' }],
      retryability: true,
      timestamp: NOW,
    };
    recordHaltObservation(ctx, episode, halt, { kind: 'jsonl', ref: 'halts.jsonl@1' }, 'invariant');

    const summary = appendTurnSummary(episode);

    expect(summary).toEqual({
      artifactKind: 'turn_summary',
      turnIndex: 2,
      haltCount: 1,
      halts: [
        {
          haltId: 'halt:1',
          stage: 'pre-decision:pre_consume',
          invariantId: 'prediction_availability.v1',
          reason: 'Action selection requires at least one projected current prediction.',
          retryability: true,
          timestamp: NOW,
          evidenceRef: { kind: 'jsonl', ref: 'halts.jsonl@1' },
        },
      ],
      action: 'none',
      operatorAction: 'review_halts_then_resume_next_turn',
    });
  });

  it('has no operator action for a clean turn', () => {
    const { ctx } = createTestContext();

    const summary = appendTurnSummary(createMockEpisode(ctx));

    expect(summary.haltCount).toBe(0);
    expect(summary.operatorAction).toBeNull();
  });
});
