// Contract parsing - the boundary where untyped JSON becomes protocol types

import type { z } from 'zod';
import type { LineageEvent } from '../types/log-events.js';
import type { PredictionRecord } from '../types/predictions.js';
import type { RepairProposalEvent, RepairResolutionEvent } from '../types/repairs.js';
import type { ObservationFreshnessPolicyContract } from '../types/freshness.js';
import type { SchemaSelection } from '../types/schema-selection.js';
import {
  askOutboxRequestEventSchema,
  askOutboxResponseEventSchema,
  observationFreshnessPolicyContractSchema,
  predictionLogEventSchema,
  predictionRecordSchema,
  repairProposalEventSchema,
  repairResolutionEventSchema,
  schemaSelectionSchema,
} from './schemas.js';
import { isRecord } from './guards.js';

/**
 * Raised when a value does not satisfy a protocol contract.
 */
export class ContractValidationError extends Error {
  readonly code = 'CONTRACT_INVALID';
  readonly contract: string;
  readonly issues: string[];

  constructor(contract: string, issues: string[]) {
    super(`Invalid ${contract}: ${issues.join('; ')}`);
    this.name = 'ContractValidationError';
    this.contract = contract;
    this.issues = issues;
  }
}

/**
 * Outcome of a non-throwing parse.
 */
export type ParseResult<T> = { success: true; data: T } | { success: false; issues: string[] };

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`);
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): ParseResult<T> {
  const result = schema.safeParse(value);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, issues: formatIssues(result.error) };
}

function parseOrThrow<T>(
  contract: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown
): T {
  const result = parseWith(schema, value);
  if (!result.success) {
    throw new ContractValidationError(contract, result.issues);
  }
  return result.data;
}

export function parsePredictionRecord(value: unknown): PredictionRecord {
  return parseOrThrow('prediction record', predictionRecordSchema, value);
}

export function parseObservationFreshnessPolicyContract(
  value: unknown
): ObservationFreshnessPolicyContract {
  return parseOrThrow('observation freshness contract', observationFreshnessPolicyContractSchema, value);
}

/**
 * Non-throwing parse of a schema selector's return value.
 */
export function safeParseSchemaSelection(value: unknown): ParseResult<SchemaSelection> {
  return parseWith(schemaSelectionSchema, value);
}

/**
 * Parse one log row into a lineage event.
 * Returns null for non-objects, unknown kinds and rows that fail validation.
 */
export function parseLineageEvent(value: unknown): LineageEvent | null {
  if (!isRecord(value)) {
    return null;
  }

  let result: ParseResult<LineageEvent>;
  switch (value.eventKind) {
    case 'prediction':
    case 'prediction_record':
      result = parseWith(predictionLogEventSchema, value);
      break;
    case 'repair_proposal':
      result = parseWith(repairProposalEventSchema, value);
      break;
    case 'repair_resolution':
      result = parseWith(repairResolutionEventSchema, value);
      break;
    case 'ask_outbox_request':
      result = parseWith(askOutboxRequestEventSchema, value);
      break;
    case 'ask_outbox_response':
      result = parseWith(askOutboxResponseEventSchema, value);
      break;
    default:
      return null;
  }

  return result.success ? result.data : null;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Validate and freeze a repair proposal. The returned object cannot be
 * mutated, so its `repairId` is fixed at construction.
 *
 * @throws ContractValidationError
 */
export function createRepairProposal(
  fields: Omit<RepairProposalEvent, 'eventKind'>
): RepairProposalEvent {
  return deepFreeze(
    parseOrThrow('repair proposal', repairProposalEventSchema, {
      ...fields,
      eventKind: 'repair_proposal',
    })
  );
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

type RepairResolutionFields = DistributiveOmit<
  RepairResolutionEvent,
  'eventKind' | 'proposalEventKind'
>;

/**
 * Validate and freeze a repair resolution. Accepted resolutions must carry
 * `acceptedPrediction`; rejected ones must carry `rejectionReason`.
 *
 * @throws ContractValidationError
 */
export function createRepairResolution(fields: RepairResolutionFields): RepairResolutionEvent {
  return deepFreeze(
    parseOrThrow('repair resolution', repairResolutionEventSchema, {
      ...fields,
      eventKind: 'repair_resolution',
      proposalEventKind: 'repair_proposal',
    })
  );
}
