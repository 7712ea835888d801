// Tests for the intervention lifecycle hook

import { describe, it, expect, vi } from 'vitest';
import type { Episode, InterventionPhase } from '@ledgerline/protocol';
import { createInMemoryLogContext } from '@ledgerline/repositories';
import {
  createFixedClock,
  createRuntimeContext,
  createSequentialIds,
  type RuntimeContext,
} from '../context.js';
import { createCapturingLogger } from '../logging.js';
import { InterventionProvenanceError, InvalidInterventionDecisionError } from '../errors.js';
import type { AskOutboxAdapter, InterventionHook } from '../adapters.js';
import { buildEpisode } from '../episodes/episode.js';
import { appendTurnSummary, findArtifacts } from '../episodes/artifacts.js';
import { createInitialBeliefState } from '../interpretation/schema.js';
import { createEmptyProjection } from '../replay/projection.js';
import { applyInterventionHook, normalizeInterventionDecision } from './hook.js';

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

function createMockEpisode(ctx: RuntimeContext, capabilities?: string[]): Episode {
  return buildEpisode(ctx, {
    conversationId: 'conv:1',
    turnIndex: 4,
    assistantPrompt: 'Ready for the next step?',
    policyDecision: {
      decisionId: 'dec:4',
      decidedAt: NOW,
      actionType: 'ask',
      channel: 'chat',
      reasonCodes: [],
    },
    payload: { sentence: 'Yes' },
    observer: capabilities
      ? { role: 'guest', authorizationLevel: 'restricted', capabilities }
      : undefined,
  });
}

function createMockOutbox(requestId = 'ask:1') {
  const createRequest = vi.fn(() => requestId);
  const outbox: AskOutboxAdapter = { createRequest };
  return { outbox, createRequest };
}

async function runCheckpoint(
  ctx: RuntimeContext,
  episode: Episode,
  hook: InterventionHook | undefined,
  options: { outbox?: AskOutboxAdapter; phase?: InterventionPhase } = {}
) {
  return applyInterventionHook(ctx, {
    episode,
    belief: createInitialBeliefState(),
    projection: createEmptyProjection(),
    phase: options.phase ?? 'start',
    hook,
    outbox: options.outbox,
  });
}

describe('normalizeInterventionDecision', () => {
  it('treats nothing as none', () => {
    expect(normalizeInterventionDecision(undefined, NOW)).toEqual({ action: 'none', metadata: {} });
    expect(normalizeInterventionDecision(null, NOW)).toEqual({ action: 'none', metadata: {} });
  });

  it('rejects an unknown action', () => {
    expect(() => normalizeInterventionDecision({ action: 'retry' }, NOW)).toThrow(
      InvalidInterventionDecisionError
    );
  });

  it('requires override source and provenance to resume', () => {
    expect(() => normalizeInterventionDecision({ action: 'resume' }, NOW)).toThrow(
      'resume requires override provenance: missing overrideSource, overrideProvenance'
    );
    expect(() =>
      normalizeInterventionDecision(
        { action: 'resume', overrideSource: 'operator', overrideProvenance: '   ' },
        NOW
      )
    ).toThrow(InterventionProvenanceError);
  });

  it('stamps a resume with the default response time', () => {
    expect(
      normalizeInterventionDecision(
        { action: 'resume', overrideSource: 'operator', overrideProvenance: 'ticket-7' },
        NOW
      )
    ).toEqual({
      action: 'resume',
      metadata: {},
      overrideSource: 'operator',
      overrideProvenance: 'ticket-7',
      respondedAt: NOW,
    });
  });
});

describe('applyInterventionHook', () => {
  it('proceeds without recording anything when there is no hook', async () => {
    const { ctx } = createTestContext();
    const episode = createMockEpisode(ctx);

    const result = await runCheckpoint(ctx, episode, undefined);

    expect(result).toEqual({ proceed: true, decision: null });
    expect(episode.artifacts.map((item) => item.artifactKind)).toEqual(['policy_hypothesis']);
  });

  it('hands the hook a lifecycle request', async () => {
    const { ctx } = createTestContext();
    const episode = createMockEpisode(ctx);
    const hook = vi.fn(() => undefined);

    const result = await runCheckpoint(ctx, episode, hook, { phase: 'post_observation_gate' });

    expect(result.proceed).toBe(true);
    expect(hook).toHaveBeenCalledTimes(1);
    expect(findArtifacts(episode, 'intervention_request')).toEqual([
      {
        artifactKind: 'intervention_request',
        phase: 'post_observation_gate',
        request: {
          requestId: 'hitl:1',
          phase: 'post_observation_gate',
          episodeId: 'ep:1',
          conversationId: 'conv:1',
          turnIndex: 4,
          projectionUpdatedAt: '1970-01-01T00:00:00.000Z',
          createdAt: NOW,
          metadata: {},
        },
      },
    ]);
    expect(findArtifacts(episode, 'intervention_lifecycle').map((item) => item.action)).toEqual([
      'none',
    ]);
  });

  it('ends the turn on pause', async () => {
    const { ctx, logger } = createTestContext();
    const episode = createMockEpisode(ctx);

    const result = await runCheckpoint(ctx, episode, () => ({
      action: 'pause',
      reason: 'operator break',
    }));

    expect(result).toEqual({
      proceed: false,
      decision: { action: 'pause', reason: 'operator break', metadata: {} },
    });
    expect(findArtifacts(episode, 'intervention_terminal')).toEqual([
      {
        artifactKind: 'intervention_terminal',
        phase: 'start',
        requestId: 'hitl:1',
        action: 'pause',
        reason: 'operator break',
      },
    ]);
    const [summary] = findArtifacts(episode, 'turn_summary');
    expect(summary.action).toBe('pause');
    expect(logger.entries.map((entry) => [entry.level, entry.message])).toEqual([
      ['info', 'Intervention decision'],
    ]);
  });

  it('continues on a resume with provenance and reports it in the summary', async () => {
    const { ctx } = createTestContext();
    const episode = createMockEpisode(ctx);

    const result = await runCheckpoint(ctx, episode, async () => ({
      action: 'resume',
      overrideSource: 'policy',
      overrideProvenance: 'auto-resume rule',
    }));

    expect(result.proceed).toBe(true);
    const [lifecycle] = findArtifacts(episode, 'intervention_lifecycle');
    expect(lifecycle).toMatchObject({
      action: 'resume',
      overrideSource: 'policy',
      overrideProvenance: 'auto-resume rule',
      respondedAt: NOW,
    });
    expect(appendTurnSummary(episode).action).toBe('resume');
  });

  it('fails the checkpoint when resume lacks provenance', async () => {
    const { ctx } = createTestContext();
    const episode = createMockEpisode(ctx);

    await expect(runCheckpoint(ctx, episode, () => ({ action: 'resume' }))).rejects.toBeInstanceOf(
      InterventionProvenanceError
    );
  });

  it('logs the outbox request and the hook answer as a pair', async () => {
    const { ctx, logs } = createTestContext();
    const episode = createMockEpisode(ctx);
    const { outbox, createRequest } = createMockOutbox();

    const result = await runCheckpoint(
      ctx,
      episode,
      () => ({ action: 'escalate', reason: 'needs a human' }),
      { outbox }
    );

    expect(result.proceed).toBe(false);
    expect(createRequest).toHaveBeenCalledWith(
      'Human review required: start',
      'Review intervention request for conversation conv:1 turn 4.',
      {
        phase: 'start',
        requestId: 'hitl:1',
        conversationId: 'conv:1',
        episodeId: 'ep:1',
        turnIndex: 4,
        projectionUpdatedAt: '1970-01-01T00:00:00.000Z',
      }
    );
    const [request, response] = logs.predictions.records();
    expect(request).toMatchObject({
      eventKind: 'ask_outbox_request',
      requestId: 'ask:1',
      scope: 'start',
      evidenceRefs: [{ kind: 'intervention_request', ref: 'hitl:1' }],
    });
    expect(response).toMatchObject({
      eventKind: 'ask_outbox_response',
      requestId: 'ask:1',
      status: 'escalate',
      escalation: true,
      reason: 'needs a human',
      respondedAt: NOW,
    });
    expect(findArtifacts(episode, 'ask_outbox_response')[0].evidenceRef).toEqual({
      kind: 'jsonl',
      ref: 'predictions.jsonl@2',
    });
  });

  it('escalates without consulting anyone when the outbox is denied', async () => {
    const { ctx, logs } = createTestContext();
    const episode = createMockEpisode(ctx, ['baseline.evaluation']);
    const { outbox, createRequest } = createMockOutbox();
    const hook = vi.fn(() => ({ action: 'none' }));

    const result = await runCheckpoint(ctx, episode, hook, { outbox });

    expect(result).toEqual({
      proceed: false,
      decision: { action: 'escalate', reason: 'ask outbox denied by policy', metadata: {} },
    });
    expect(hook).not.toHaveBeenCalled();
    expect(createRequest).not.toHaveBeenCalled();
    expect(logs.predictions.lines).toHaveLength(0);
    expect(logs.halts.records()).toHaveLength(1);
    expect(findArtifacts(episode, 'capability_policy_denial').map((item) => item.denialCode)).toEqual([
      'observer_scope_denied',
    ]);
    expect(findArtifacts(episode, 'turn_summary')).toHaveLength(1);
  });
});
