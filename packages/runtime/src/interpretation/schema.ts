// Schema interpretation - selector output folded into the belief state

import type {
  Ambiguity,
  AmbiguityStatus,
  BeliefState,
  Episode,
  PendingAbout,
  SchemaSelection,
} from '@ledgerline/protocol';
import { safeParseSchemaSelection } from '@ledgerline/protocol';
import type { RuntimeContext } from '../context.js';
import type { SchemaSelector } from '../adapters.js';
import { SchemaSelectionTypeError } from '../errors.js';
import { authorizeObserver } from '../observer.js';
import { appendArtifact, recordAuthorizationIssue } from '../episodes/artifacts.js';
import { extractUserUtterance } from '../episodes/episode.js';

export function createInitialBeliefState(): BeliefState {
  return {
    beliefVersion: 0,
    ambiguityState: 'none',
    pendingAbout: null,
    pendingQuestion: null,
    pendingAttempts: 0,
    bindings: {},
    activeSchemas: [],
    schemaConfidence: {},
    ambiguitiesActive: [],
    updatedAt: null,
    lastUtteranceType: null,
    lastStatus: null,
    consecutiveNoResponse: 0,
  };
}

/**
 * A selector that finds nothing.
 */
export const emptySchemaSelector: SchemaSelector = (): SchemaSelection => ({
  schemas: [],
  ambiguities: [],
});

export function projectAmbiguityState(ambiguities: readonly Ambiguity[]): AmbiguityStatus {
  if (ambiguities.length === 0) return 'none';
  if (ambiguities.some((ambiguity) => ambiguity.status === 'unresolved')) return 'unresolved';
  return 'resolved';
}

/**
 * The question to ask for an ambiguity: its first clarifying question, or
 * one built from the ambiguous span.
 */
export function clarifyingQuestionFor(ambiguity: Ambiguity): string {
  const asked = ambiguity.ask[0]?.question.trim();
  if (asked) return asked;

  const span = ambiguity.about.span?.text.trim();
  return span
    ? `Be specific: what does “${span}” refer to?`
    : 'Be specific: what exactly are you referring to?';
}

type PendingObligation = Pick<BeliefState, 'pendingAbout' | 'pendingQuestion' | 'pendingAttempts'>;

function nextObligation(belief: BeliefState, ambiguities: Ambiguity[]): PendingObligation {
  if (projectAmbiguityState(ambiguities) !== 'unresolved') {
    return { pendingAbout: null, pendingQuestion: null, pendingAttempts: 0 };
  }

  // An open obligation is kept as is until the ambiguity resolves.
  if (belief.pendingAbout) {
    return {
      pendingAbout: belief.pendingAbout,
      pendingQuestion: belief.pendingQuestion,
      pendingAttempts: belief.pendingAttempts,
    };
  }

  const chosen = ambiguities.find((ambiguity) => ambiguity.status === 'unresolved');
  if (!chosen) {
    return {
      pendingAbout: null,
      pendingQuestion: belief.pendingQuestion,
      pendingAttempts: belief.pendingAttempts + 1,
    };
  }

  const pendingAbout: PendingAbout = { kind: chosen.about.kind, key: chosen.about.key };
  if (chosen.about.span) pendingAbout.span = { ...chosen.about.span };
  return {
    pendingAbout,
    pendingQuestion: clarifyingQuestionFor(chosen),
    pendingAttempts: 1,
  };
}

/**
 * Run the selector over the turn's utterance and update schemas, ambiguities
 * and the pending clarification obligation.
 * Requires `baseline.schema_selection`; without it the belief is returned
 * unchanged.
 *
 * @throws SchemaSelectionTypeError when the selector's result is not a selection
 */
export async function applySchemaInterpretation(
  ctx: RuntimeContext,
  episode: Episode,
  belief: BeliefState,
  selector: SchemaSelector = emptySchemaSelector
): Promise<BeliefState> {
  const authorization = authorizeObserver(
    episode.observer,
    'apply_schema_interpretation',
    'baseline.schema_selection'
  );
  if (!authorization.authorized) {
    recordAuthorizationIssue(ctx, episode, 'policy-schema', authorization);
    return belief;
  }

  const raw: unknown = await selector(extractUserUtterance(episode), episode.ask.error ?? null);
  const parsed = safeParseSchemaSelection(raw);
  if (!parsed.success) {
    throw new SchemaSelectionTypeError(parsed.issues);
  }

  const selection = parsed.data;
  const ambiguities = [...selection.ambiguities];
  const obligation = nextObligation(belief, ambiguities);
  const ambiguityState = projectAmbiguityState(ambiguities);

  const schemaConfidence: Record<string, number> = {};
  for (const hit of selection.schemas) {
    schemaConfidence[hit.name] = hit.score;
  }

  appendArtifact(episode, {
    artifactKind: 'schema_selection',
    schemas: selection.schemas,
    ambiguities,
    ambiguityState,
    notes: selection.notes ?? null,
    ...obligation,
  });

  return {
    ...belief,
    ...obligation,
    activeSchemas: selection.schemas.map((hit) => hit.name),
    schemaConfidence,
    ambiguitiesActive: ambiguities,
    ambiguityState,
    beliefVersion: belief.beliefVersion + 1,
    updatedAt: ctx.now(),
  };
}
