// Tests for reconciliation in both correction modes

import { describe, it, expect } from 'vitest';
import type {
  Episode,
  InvariantHandlingMode,
  PredictionRecord,
  ProjectionState,
} from '@ledgerline/protocol';
import { createInMemoryLogContext } from '@ledgerline/repositories';
import {
  createFixedClock,
  createRuntimeContext,
  createSequentialIds,
  type RuntimeContext,
} from '../context.js';
import { silentLogger } from '../logging.js';
import { buildEpisode, ingestObservation } from '../episodes/episode.js';
import { findArtifacts } from '../episodes/artifacts.js';
import { createEmptyProjection, projectCurrent, replayProjectionAnalytics } from '../replay/projection.js';
import { appendPredictionRecord } from './append.js';
import { reconcilePredictions, stableRepairId, type RepairResolver } from './reconcile.js';

const ISSUED = '2026-03-01T11:00:00.000Z';
const NOW = '2026-03-01T12:00:00.000Z';

// --- Test Fixtures ---

function createTestContext() {
  const logs = createInMemoryLogContext();
  const ctx = createRuntimeContext({
    logs,
    logger: silentLogger,
    now: createFixedClock(NOW),
    newId: createSequentialIds(),
  });
  return { ctx, logs };
}

function createMockPrediction(overrides: Partial<PredictionRecord> = {}): PredictionRecord {
  return {
    predictionId: 'pred:1',
    scopeKey: 'turn:1',
    targetVariable: 'user_response_present',
    expectation: 0.75,
    wasCorrected: false,
    correctionRevision: 0,
    issuedAt: ISSUED,
    assumptions: [],
    evidenceRefs: [],
    ...overrides,
  };
}

function createAnsweredEpisode(ctx: RuntimeContext, sentence = 'Yes, slept fine'): Episode {
  const episode = buildEpisode(ctx, {
    conversationId: 'conv:1',
    turnIndex: 1,
    assistantPrompt: 'How did you sleep?',
    policyDecision: {
      decisionId: 'dec:1',
      decidedAt: NOW,
      actionType: 'ask',
      channel: 'chat',
      reasonCodes: [],
    },
    payload: { sentence },
  });
  return ingestObservation(ctx, episode);
}

async function seedPrediction(ctx: RuntimeContext, episode: Episode): Promise<ProjectionState> {
  const prediction = createMockPrediction();
  await appendPredictionRecord(ctx, prediction, { episode });
  return projectCurrent(prediction, createEmptyProjection());
}

async function runReconcile(mode: InvariantHandlingMode, resolveRepair?: RepairResolver) {
  const { ctx, logs } = createTestContext();
  const episode = createAnsweredEpisode(ctx);
  const projection = await seedPrediction(ctx, episode);
  const updated = await reconcilePredictions(ctx, episode, projection, { mode, resolveRepair });
  return { ctx, logs, episode, projection, updated };
}

describe('reconcilePredictions', () => {
  it('appends the corrected record directly in strict_halt mode', async () => {
    const { logs, episode, updated } = await runReconcile('strict_halt');

    expect(updated.currentPredictions['turn:1']).toMatchObject({
      predictionId: 'pred:1',
      wasCorrected: true,
      correctionRevision: 1,
      absoluteError: 0.25,
    });
    expect(updated.correctionMetrics).toEqual({
      comparisons: 1,
      absoluteErrorTotal: 0.25,
      meanAbsoluteError: 0.25,
    });
    expect(updated.lastComparisonAt).toBe(NOW);
    expect(updated.updatedAt).toBe(NOW);
    expect(logs.predictions.records().map((record) => record.eventKind)).toEqual([
      'prediction',
      'prediction_record',
      'prediction',
      'prediction_record',
    ]);

    const [comparison] = findArtifacts(episode, 'prediction_comparison');
    expect(comparison).toMatchObject({
      predictionId: 'pred:1',
      expected: 0.75,
      observed: 1,
      error: 0.25,
      mode: 'strict_halt',
    });
    expect(comparison.binding.code).toBe('prediction_outcome_bound');
  });

  it('appends a proposal and an accepted resolution in repair_events mode', async () => {
    const { logs, episode, updated } = await runReconcile('repair_events');

    expect(logs.predictions.records().map((record) => record.eventKind)).toEqual([
      'prediction',
      'prediction_record',
      'repair_proposal',
      'repair_resolution',
    ]);
    expect(updated.currentPredictions['turn:1'].wasCorrected).toBe(true);

    const [repair] = findArtifacts(episode, 'repair_event');
    expect(repair.repairId).toBe(stableRepairId('turn:1', 'pred:1', NOW));
    expect(repair.resolution.decision).toBe('accepted');
    expect(repair.proposalEvidenceRef).toEqual({ kind: 'jsonl', ref: 'predictions.jsonl@3' });
    expect(repair.resolutionEvidenceRef).toEqual({ kind: 'jsonl', ref: 'predictions.jsonl@4' });
  });

  it('keeps the current prediction when a repair is rejected', async () => {
    const { logs, projection, updated } = await runReconcile('repair_events', () => ({
      decision: 'rejected',
      reason: 'operator disagrees',
    }));

    expect(updated.currentPredictions['turn:1']).toMatchObject({
      predictionId: 'pred:1',
      wasCorrected: false,
      correctionRevision: 0,
    });
    expect(updated.correctionMetrics).toEqual(projection.correctionMetrics);
    expect(updated.lastComparisonAt).toBeNull();

    const replayed = replayProjectionAnalytics(await logs.predictions.read());
    expect(replayed.projectionState.correctionMetrics).toEqual(updated.correctionMetrics);
    expect(replayed.projectionState.lastComparisonAt).toBe(updated.lastComparisonAt);
    const resolution = logs.predictions.records()[3];
    expect(resolution).toMatchObject({
      eventKind: 'repair_resolution',
      decision: 'rejected',
      rejectionReason: 'operator disagrees',
    });
  });

  it('replays to the same state in either mode', async () => {
    const direct = await runReconcile('strict_halt');
    const repaired = await runReconcile('repair_events');

    const fromDirect = replayProjectionAnalytics(await direct.logs.predictions.read());
    const fromRepair = replayProjectionAnalytics(await repaired.logs.predictions.read());

    expect(fromRepair.projectionState).toEqual(fromDirect.projectionState);
    expect(fromRepair.analyticsSnapshot.correctionCostAttribution).toEqual({
      'pred:1': { rootPredictionId: 'pred:1', correctionCount: 1, correctionCostTotal: 0.25 },
    });
    expect(fromDirect.analyticsSnapshot.correctionCostAttribution).toEqual(
      fromRepair.analyticsSnapshot.correctionCostAttribution
    );
  });

  it('binds silence as 0', async () => {
    const { ctx } = createTestContext();
    const episode = createAnsweredEpisode(ctx, '   ');
    const projection = await seedPrediction(ctx, episode);

    const updated = await reconcilePredictions(ctx, episode, projection);

    expect(updated.currentPredictions['turn:1'].observedValue).toBe(0);
    expect(updated.currentPredictions['turn:1'].absoluteError).toBe(0.75);
  });

  it('leaves corrected and unrelated predictions alone', async () => {
    const { ctx, logs } = createTestContext();
    const episode = createAnsweredEpisode(ctx);
    let projection = projectCurrent(
      createMockPrediction({ wasCorrected: true, correctionRevision: 1 }),
      createEmptyProjection()
    );
    projection = projectCurrent(
      createMockPrediction({ predictionId: 'pred:2', scopeKey: 'mood', targetVariable: 'mood' }),
      projection
    );

    const updated = await reconcilePredictions(ctx, episode, projection);

    expect(updated).toBe(projection);
    expect(logs.predictions.lines).toHaveLength(0);
  });
});
