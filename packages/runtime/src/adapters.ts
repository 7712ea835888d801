// External adapter contracts
//
// The runtime never talks to people, classifiers or freshness policies
// directly; callers plug these in. Every method may be sync or async.

import type {
  BeliefState,
  CaptureOutcome,
  Episode,
  Id,
  InterventionPhase,
  InterventionRequest,
  JsonObject,
  ObservationFreshnessPolicyContract,
  ProjectionState,
} from '@ledgerline/protocol';

type MaybePromise<T> = T | Promise<T>;

/**
 * Dispatches human-recruitment requests.
 */
export interface AskOutboxAdapter {
  /**
   * Create a request and return its id.
   */
  createRequest(title: string, question: string, context: JsonObject): MaybePromise<Id>;
}

export type FreshnessPolicyInput = {
  episode: Episode;
  belief: BeliefState;
  projection: ProjectionState;
};

/**
 * Supplies the freshness contract for a turn.
 */
export interface ObservationFreshnessPolicyAdapter {
  /**
   * Contract for this turn, or null when freshness does not apply.
   * The returned value is validated before use.
   */
  getContract(input: FreshnessPolicyInput): MaybePromise<ObservationFreshnessPolicyContract | null>;

  /**
   * Id of a request already outstanding for the scope, if any
   */
  hasOutstandingRequest?(scope: string): MaybePromise<Id | null>;
}

/**
 * Classifies an utterance into schemas and ambiguities.
 * Its return value is validated; anything else is rejected.
 */
export type SchemaSelector = (text: string | null, captureError: CaptureOutcome | null) => unknown;

export type InterventionHookInput = {
  phase: InterventionPhase;
  request: InterventionRequest;
  episode: Episode;
  belief: BeliefState;
  projection: ProjectionState;
};

/**
 * Consulted at each lifecycle checkpoint. Returning nothing means "none".
 * The result is validated as an intervention decision.
 */
export type InterventionHook = (input: InterventionHookInput) => unknown;
