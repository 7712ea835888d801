// Zod schemas for every persisted contract
//
// Each schema is annotated with the hand-written protocol type it produces so
// the two cannot drift apart silently.

import { z } from 'zod';
import type { EvidenceRef, JsonObject } from '../types/common.js';
import type { PredictionOutcome, PredictionRecord } from '../types/predictions.js';
import type {
  RepairLineageRef,
  RepairProposalEvent,
  RepairResolutionEvent,
} from '../types/repairs.js';
import type { AskOutboxRequestEvent, AskOutboxResponseEvent } from '../types/outbox.js';
import type { PredictionLogEvent } from '../types/log-events.js';
import type { ObservationFreshnessPolicyContract } from '../types/freshness.js';
import type { SchemaSelection } from '../types/schema-selection.js';
import type { ObserverFrame } from '../types/observer.js';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export const jsonObjectSchema: Schema<JsonObject> = z.record(z.unknown());

export const evidenceRefSchema: Schema<EvidenceRef> = z.object({
  kind: z.string().trim().min(1),
  ref: z.string().trim().min(1),
});

const predictionRecordShape = {
  predictionId: z.string().min(1),
  scopeKey: z.string().min(1),
  predictionKey: z.string().optional(),
  predictionTarget: z.string().optional(),
  filtrationId: z.string().optional(),
  targetVariable: z.string().min(1),
  targetHorizon: z.string().optional(),
  targetHorizonTurns: z.number().int().optional(),
  confidence: z.number().optional(),
  uncertainty: z.number().optional(),
  expectation: z.number().optional(),
  variance: z.number().optional(),
  observedValue: z.number().optional(),
  predictionError: z.number().optional(),
  absoluteError: z.number().optional(),
  wasCorrected: z.boolean().default(false),
  correctionParentPredictionId: z.string().optional(),
  correctionRootPredictionId: z.string().optional(),
  correctionRevision: z.number().int().nonnegative().default(0),
  issuedAt: z.string().min(1),
  observedAt: z.string().optional(),
  comparedAt: z.string().optional(),
  correctedAt: z.string().optional(),
  assumptions: z.array(z.string()).default([]),
  evidenceRefs: z.array(evidenceRefSchema).default([]),
};

export const predictionRecordSchema: Schema<PredictionRecord> = z.object(predictionRecordShape);

export const predictionLogEventSchema: Schema<PredictionLogEvent> = z.object({
  ...predictionRecordShape,
  eventKind: z.enum(['prediction', 'prediction_record']),
  episodeId: z.string().optional(),
  conversationId: z.string().optional(),
  turnIndex: z.number().int().optional(),
});

export const predictionOutcomeSchema: Schema<PredictionOutcome> = z.object({
  predictionId: z.string().min(1),
  scopeKey: z.string().min(1),
  targetVariable: z.string().min(1),
  observedOutcome: z.number(),
  errorMetric: z.number(),
  absoluteError: z.number().nonnegative(),
  recordedAt: z.string().min(1),
});

export const repairLineageRefSchema: Schema<RepairLineageRef> = z.object({
  conversationId: z.string().optional(),
  episodeId: z.string().optional(),
  turnIndex: z.number().int().optional(),
  scopeKey: z.string().min(1),
  predictionId: z.string().min(1),
  correctionRootPredictionId: z.string().min(1),
});

export const repairProposalEventSchema: Schema<RepairProposalEvent> = z.object({
  eventKind: z.literal('repair_proposal'),
  repairId: z.string().min(1),
  proposedAt: z.string().min(1),
  reason: z.string(),
  invariantId: z.string().min(1),
  lineageRef: repairLineageRefSchema,
  proposedPrediction: predictionRecordSchema,
  predictionOutcome: predictionOutcomeSchema,
});

const repairResolutionBase = {
  eventKind: z.literal('repair_resolution'),
  repairId: z.string().min(1),
  proposalEventKind: z.literal('repair_proposal').default('repair_proposal'),
  resolvedAt: z.string().min(1),
  lineageRef: repairLineageRefSchema,
};

export const repairResolutionEventSchema: Schema<RepairResolutionEvent> = z.discriminatedUnion(
  'decision',
  [
    z.object({
      ...repairResolutionBase,
      decision: z.literal('accepted'),
      acceptedPrediction: predictionRecordSchema,
    }),
    z.object({
      ...repairResolutionBase,
      decision: z.literal('rejected'),
      rejectionReason: z.string().trim().min(1),
    }),
  ]
);

export const askOutboxRequestEventSchema: Schema<AskOutboxRequestEvent> = z.object({
  eventKind: z.literal('ask_outbox_request'),
  requestId: z.string().min(1),
  scope: z.string(),
  reason: z.string(),
  evidenceRefs: z.array(evidenceRefSchema).default([]),
  createdAt: z.string().min(1),
  timeoutAt: z.string().optional(),
  metadata: jsonObjectSchema.default({}),
});

export const askOutboxResponseEventSchema: Schema<AskOutboxResponseEvent> = z.object({
  eventKind: z.literal('ask_outbox_response'),
  requestId: z.string().min(1),
  scope: z.string(),
  reason: z.string(),
  evidenceRefs: z.array(evidenceRefSchema).default([]),
  createdAt: z.string().min(1),
  respondedAt: z.string().min(1),
  status: z.string().min(1),
  escalation: z.boolean().default(false),
  metadata: jsonObjectSchema.default({}),
});

export const interventionDecisionInputSchema = z.object({
  action: z.enum(['none', 'pause', 'timeout', 'escalate', 'resume']).default('none'),
  reason: z.string().optional(),
  metadata: jsonObjectSchema.default({}),
  overrideSource: z.enum(['operator', 'policy', 'system']).optional(),
  overrideProvenance: z.string().optional(),
  requestId: z.string().optional(),
  respondedAt: z.string().optional(),
});

export const observationFreshnessPolicyContractSchema: Schema<ObservationFreshnessPolicyContract> =
  z.object({
    scope: z.string().trim().min(1),
    observedAt: z.string().optional(),
    staleAfterSeconds: z.number().nonnegative(),
  });

export const observerFrameSchema: Schema<ObserverFrame> = z.object({
  role: z.string().min(1),
  authorizationLevel: z.string().min(1),
  capabilities: z.array(z.string()).default([]),
  evaluationInvariants: z.array(z.string()).optional(),
});

const aboutKindSchema = z.enum([
  'intent',
  'entity',
  'time',
  'place',
  'parameter',
  'schema',
  'goal',
  'channel',
]);

const ambiguityAboutSchema = z.object({
  kind: aboutKindSchema,
  key: z.string(),
  span: z
    .object({
      text: z.string(),
      start: z.number().int().optional(),
      end: z.number().int().optional(),
    })
    .optional(),
});

export const schemaSelectionSchema: Schema<SchemaSelection> = z.object({
  schemas: z.array(
    z.object({
      name: z.string().min(1),
      score: z.number(),
      about: ambiguityAboutSchema.optional(),
    })
  ),
  ambiguities: z.array(
    z.object({
      status: z.enum(['none', 'unresolved', 'resolved']),
      about: ambiguityAboutSchema,
      type: z.enum([
        'underspecified',
        'polysemy',
        'conflict',
        'missing_context',
        'uncertain_mapping',
      ]),
      candidates: z.array(z.object({ value: z.string(), score: z.number() })).default([]),
      resolutionPolicy: z.enum(['ask_user', 'use_default', 'defer', 'lookup']).default('ask_user'),
      ask: z
        .array(z.object({ question: z.string(), options: z.array(z.string()).optional() }))
        .default([]),
      notes: z.string().optional(),
    })
  ),
  notes: z.string().optional(),
});
