// @ledgerline/runtime
// Invariant gates, capability policy, reconciliation, replay and the mission loop

// Mission loop (one turn: predictions → gates → observation → interpretation)
export {
  runMissionLoop,
  type MissionLoopInput,
  type MissionLoopOptions,
  type MissionLoopResult,
  type MissionLoopStatus,
} from './loop.js';

// Context, configuration and logging
export {
  createRuntimeContext,
  createFixedClock,
  createSequentialIds,
  type RuntimeContext,
  type CreateRuntimeContextOptions,
} from './context.js';
export {
  loadRuntimeConfig,
  createLogContext,
  DEFAULT_PREDICTION_LOG_PATH,
  DEFAULT_HALT_LOG_PATH,
  type RuntimeConfig,
  type ConfiguredLogContext,
} from './config.js';
export {
  consoleLogger,
  silentLogger,
  createConsoleLogger,
  createCapturingLogger,
  type RuntimeLogger,
  type LogLevel,
  type LogEntry,
} from './logging.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  InterventionProvenanceError,
  InvalidInterventionDecisionError,
  SchemaSelectionTypeError,
  ConfigurationError,
  CapabilityDeniedError,
  MissingCapabilityGateError,
  HaltPayloadValidationError,
  ContractValidationError,
} from './errors.js';

// Adapter contracts
export type {
  AskOutboxAdapter,
  ObservationFreshnessPolicyAdapter,
  FreshnessPolicyInput,
  SchemaSelector,
  InterventionHook,
  InterventionHookInput,
} from './adapters.js';

// Observer frames
export {
  createDefaultObserverFrame,
  observerHasCapability,
  observerAllowsInvariant,
  authorizeObserver,
} from './observer.js';

// Invariants and gates
export {
  INVARIANT_REGISTRY,
  INVARIANT_BRANCH_BEHAVIORS,
  createCheckContext,
  runInvariant,
  type InvariantChecker,
  type InvariantCheckContext,
  type InvariantRegistry,
  type JustWrittenPrediction,
} from './invariants/registry.js';
export { haltFromOutcome, stableHaltId } from './invariants/halts.js';
export {
  evaluateGatePipeline,
  evaluateInvariantGates,
  currentPredictionIds,
  type GatePipelineInput,
  type GatePipelineResult,
  type GateDecision,
  type GateSuccess,
  type GateHalt,
  type GateEvaluation,
  type InvariantGateInput,
} from './gates/evaluator.js';

// Capability policy
export {
  decideCapabilityInvocation,
  gateFromDecision,
  issueSystemGate,
  persistPolicyDenial,
  type CapabilityInvocationRequest,
} from './capabilities/policy.js';

// Log appends
export {
  appendHaltRecord,
  appendPredictionEvent,
  appendRepairEvent,
  appendAskOutboxEvent,
  type EpisodeTags,
} from './persistence/appenders.js';

// Episodes
export {
  buildEpisode,
  ingestObservation,
  extractUserUtterance,
  attachDecisionEffect,
  type AskPayload,
  type BuildEpisodeInput,
} from './episodes/episode.js';
export {
  appendArtifact,
  findArtifacts,
  appendTurnSummary,
  recordHaltObservation,
  recordAuthorizationIssue,
  REVIEW_HALTS_OPERATOR_ACTION,
} from './episodes/artifacts.js';

// Predictions
export { bindPredictionOutcome } from './predictions/binder.js';
export {
  appendPredictionRecord,
  type AppendPredictionOptions,
  type AppendPredictionResult,
} from './predictions/append.js';
export { createTurnPrediction } from './predictions/emit.js';
export {
  reconcilePredictions,
  acceptAllRepairs,
  stableRepairId,
  USER_RESPONSE_PRESENT,
  type RepairChoice,
  type RepairResolver,
  type ReconcileOptions,
} from './predictions/reconcile.js';

// Replay and analytics
export {
  iterateLineageEvents,
  type LineageSkipReason,
  type LineageSkipHandler,
} from './replay/lineage.js';
export {
  createEmptyProjection,
  projectCurrent,
  applyRepairResolution,
  predictionEventTime,
  predictionFingerprint,
  deriveProjectionAnalytics,
  replayProjectionAnalytics,
  replayLogs,
  verifyCorrectionLineage,
  EMPTY_CORRECTION_METRICS,
  type ReplayOptions,
  type LineageViolation,
  type LineageViolationCode,
} from './replay/projection.js';
export { serializeReplayResult } from './replay/serialize.js';

// Interventions
export {
  applyInterventionHook,
  normalizeInterventionDecision,
  type InterventionCheckpointInput,
  type InterventionCheckpointResult,
} from './interventions/hook.js';

// Observation freshness
export {
  evaluateObservationFreshness,
  observationMatchesScope,
  parseTimestamp,
  type FreshnessEvaluationInput,
} from './freshness/evaluator.js';

// Interpretation
export {
  applySchemaInterpretation,
  createInitialBeliefState,
  emptySchemaSelector,
  projectAmbiguityState,
  clarifyingQuestionFor,
} from './interpretation/schema.js';
export {
  applyUtteranceInterpretation,
  classifyUtterance,
  isExitIntent,
  EXIT_EXACT,
  EXIT_PHRASES,
  PHATIC_PATTERNS,
} from './interpretation/utterance.js';
