// Tests for invariant gate evaluation

import { describe, it, expect } from 'vitest';
import type { Episode, ObserverFrame } from '@ledgerline/protocol';
import { createInMemoryLogContext } from '@ledgerline/repositories';
import { createFixedClock, createRuntimeContext, createSequentialIds } from '../context.js';
import { createCapturingLogger } from '../logging.js';
import { buildEpisode } from '../episodes/episode.js';
import { findArtifacts } from '../episodes/artifacts.js';
import { stableHaltId } from '../invariants/halts.js';
import { createEmptyProjection, projectCurrent } from '../replay/projection.js';
import { evaluateGatePipeline, evaluateInvariantGates } from './evaluator.js';

const NOW = '2026-03-01T12:00:00.000Z';

// --- Test Fixtures ---

function createTestContext() {
  const logs = createInMemoryLogContext();
  const logger = createCapturingLogger();
  const ctx = createRuntimeContext({
    logs,
    logger,
    now: createFixedClock(NOW),
    newId: createSequentialIds(),
  });
  return { ctx, logs, logger };
}

function createMockEpisode(
  ctx: ReturnType<typeof createTestContext>['ctx'],
  observer?: ObserverFrame
): Episode {
  return buildEpisode(ctx, {
    conversationId: 'conv:1',
    turnIndex: 1,
    assistantPrompt: 'How did you sleep?',
    policyDecision: {
      decisionId: 'dec:1',
      decidedAt: NOW,
      actionType: 'ask',
      channel: 'chat',
      reasonCodes: ['baseline'],
    },
    payload: { sentence: 'Pretty well' },
    observer,
  });
}

function projectedTurn() {
  return projectCurrent(
    {
      predictionId: 'pred:1',
      scopeKey: 'turn:1',
      targetVariable: 'user_response_present',
      expectation: 1,
      wasCorrected: false,
      correctionRevision: 0,
      issuedAt: NOW,
      assumptions: [],
      evidenceRefs: [],
    },
    createEmptyProjection()
  );
}

describe('evaluateGatePipeline', () => {
  it('halts at pre_consume when nothing is projected', () => {
    const result = evaluateGatePipeline({
      gatePoint: 'pre-decision',
      scope: 'decision_stage',
      predictionKey: null,
      currentPredictions: {},
      predictionLogAvailable: true,
      timestamp: NOW,
    });

    expect(result.decision.kind).toBe('halt');
    if (result.decision.kind !== 'halt') return;
    const { halt } = result.decision;
    expect(halt.stage).toBe('pre-decision:pre_consume');
    expect(halt.invariantId).toBe('prediction_availability.v1');
    expect(halt.retryability).toBe(true);
    expect(halt.haltId).toBe(stableHaltId('pre-decision:pre_consume', result.evaluations[0].outcome));
    expect(result.audit.map((entry) => [entry.gatePoint, entry.code])).toEqual([
      ['pre-decision:pre_consume', 'no_predictions_projected'],
      ['halt_validation', 'halt_payload_explainable'],
    ]);
  });

  it('skips post_write when nothing was just written', () => {
    const result = evaluateGatePipeline({
      gatePoint: 'pre-decision',
      scope: 'turn:1',
      predictionKey: null,
      currentPredictions: { 'turn:1': 'pred:1' },
      predictionLogAvailable: true,
      timestamp: NOW,
    });

    expect(result.evaluations.map((item) => item.phase)).toEqual(['pre_consume']);
    expect(result.decision).toEqual({
      kind: 'success',
      preConsume: [result.evaluations[0].outcome],
      postWrite: [],
    });
  });

  it('checks evidence links after a write', () => {
    const result = evaluateGatePipeline({
      gatePoint: 'pre-output',
      scope: 'turn:1',
      predictionKey: 'turn:1',
      currentPredictions: { 'turn:1': 'pred:1' },
      predictionLogAvailable: true,
      justWritten: { key: 'turn:1', evidenceRefs: [{ kind: 'jsonl', ref: 'predictions.jsonl@2' }] },
      timestamp: NOW,
    });

    expect(result.decision.kind).toBe('success');
    if (result.decision.kind !== 'success') return;
    expect(result.decision.postWrite.map((outcome) => outcome.code)).toEqual([
      'evidence_links_complete',
    ]);
  });

  it('halts at post_write when the write is not projected', () => {
    const result = evaluateGatePipeline({
      gatePoint: 'pre-output',
      scope: 'turn:1',
      predictionKey: null,
      currentPredictions: { 'turn:1': 'pred:1' },
      predictionLogAvailable: true,
      justWritten: { key: 'turn:2', evidenceRefs: [{ kind: 'jsonl', ref: 'predictions.jsonl@4' }] },
      timestamp: NOW,
    });

    expect(result.decision.kind).toBe('halt');
    if (result.decision.kind !== 'halt') return;
    expect(result.decision.halt.stage).toBe('pre-output:post_write');
    expect(result.decision.halt.details).toEqual({
      message: 'Prediction write did not materialize into current projections.',
    });
  });

  it('runs only the invariants on the observer allow-list', () => {
    const result = evaluateGatePipeline({
      gatePoint: 'pre-decision',
      scope: 'decision_stage',
      predictionKey: null,
      currentPredictions: {},
      predictionLogAvailable: true,
      observer: {
        role: 'analyst',
        authorizationLevel: 'baseline',
        capabilities: [],
        evaluationInvariants: ['evidence_link_completeness.v1', 'not_a_real_invariant'],
      },
      timestamp: NOW,
    });

    expect(result.evaluations).toEqual([]);
    expect(result.decision.kind).toBe('success');
  });
});

describe('evaluateInvariantGates', () => {
  it('persists the halt and records it on the episode', async () => {
    const { ctx, logs, logger } = createTestContext();
    const episode = createMockEpisode(ctx);

    const decision = await evaluateInvariantGates(ctx, {
      episode,
      gatePoint: 'pre-decision',
      scope: 'decision_stage',
      predictionKey: null,
      projection: createEmptyProjection(),
    });

    expect(decision.kind).toBe('halt');
    if (decision.kind !== 'halt') return;
    expect(logs.halts.records().map((record) => record.haltId)).toEqual([decision.halt.haltId]);
    expect(logs.predictions.lines).toHaveLength(0);

    const [outcomes] = findArtifacts(episode, 'invariant_outcomes');
    expect(outcomes.result).toBe('halt');
    expect(outcomes.haltEvidenceRef).toEqual({ kind: 'jsonl', ref: 'halts.jsonl@1' });
    expect(outcomes.observerEnforcement.enforced).toBe(false);

    expect(findArtifacts(episode, 'halt_observation')).toEqual([
      {
        artifactKind: 'halt_observation',
        observationId: 'obs:1',
        halt: decision.halt,
        haltEvidenceRef: { kind: 'jsonl', ref: 'halts.jsonl@1' },
      },
    ]);
    expect(episode.observations).toEqual([
      {
        id: 'obs:1',
        observedAt: NOW,
        type: 'halt',
        text: 'Action selection requires at least one projected current prediction.',
        source: 'invariant:prediction_availability.v1',
      },
    ]);
    expect(logger.entries.filter((entry) => entry.level === 'warn').map((entry) => entry.message)).toEqual([
      'Invariant gate halted',
    ]);
  });

  it('records a passing gate without touching the logs', async () => {
    const { ctx, logs } = createTestContext();
    const episode = createMockEpisode(ctx);

    const decision = await evaluateInvariantGates(ctx, {
      episode,
      gatePoint: 'pre-decision',
      scope: 'turn:1',
      predictionKey: 'turn:1',
      projection: projectedTurn(),
    });

    expect(decision.kind).toBe('success');
    expect(logs.halts.lines).toHaveLength(0);
    expect(logs.predictions.lines).toHaveLength(0);
    const [outcomes] = findArtifacts(episode, 'invariant_outcomes');
    expect(outcomes.result).toBe('success');
    expect(outcomes.halt).toBeNull();
  });

  it('halts on authorization before running any invariant', async () => {
    const { ctx, logs } = createTestContext();
    const episode = createMockEpisode(ctx, {
      role: 'guest',
      authorizationLevel: 'restricted',
      capabilities: ['baseline.dialog'],
    });

    const decision = await evaluateInvariantGates(ctx, {
      episode,
      gatePoint: 'pre-decision',
      scope: 'turn:1',
      predictionKey: null,
      projection: projectedTurn(),
    });

    expect(decision.kind).toBe('halt');
    if (decision.kind !== 'halt') return;
    expect(decision.halt.invariantId).toBe('authorization.scope.v1');
    expect(decision.halt.stage).toBe('pre-decision');
    expect(decision.halt.reason).toBe('Observer is not authorized for evaluate_invariant_gates.');
    expect(logs.halts.lines).toHaveLength(1);
    expect(findArtifacts(episode, 'authorization_issue')).toHaveLength(1);
    expect(findArtifacts(episode, 'invariant_outcomes')).toHaveLength(0);
    expect(episode.observations.map((item) => item.source)).toEqual([
      'authorization:evaluate_invariant_gates',
    ]);
  });
});
