// Runtime error types

export { CapabilityDeniedError, MissingCapabilityGateError } from '@ledgerline/repositories';
export { HaltPayloadValidationError, ContractValidationError } from '@ledgerline/protocol';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * A `resume` intervention arrived without override source or provenance.
 */
export class InterventionProvenanceError extends ValidationError {
  constructor(missing: string[]) {
    super(`resume requires override provenance: missing ${missing.join(', ')}`, {
      field: missing[0],
      details: { missing },
    });
    this.name = 'InterventionProvenanceError';
  }
}

/**
 * The intervention hook returned something that is not a decision.
 */
export class InvalidInterventionDecisionError extends ValidationError {
  constructor(issues: string[]) {
    super(`Invalid intervention decision: ${issues.join('; ')}`, { details: { issues } });
    this.name = 'InvalidInterventionDecisionError';
  }
}

/**
 * A schema selector returned a value that does not match the selection contract.
 */
export class SchemaSelectionTypeError extends ValidationError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Schema selector returned an invalid selection: ${issues.join('; ')}`, {
      field: 'selection',
      details: { issues },
    });
    this.name = 'SchemaSelectionTypeError';
    this.issues = issues;
  }
}

/**
 * Environment configuration is missing or malformed.
 */
export class ConfigurationError extends RuntimeError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIGURATION_ERROR', `Invalid runtime configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
