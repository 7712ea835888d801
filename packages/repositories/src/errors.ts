// Storage-boundary error types

/**
 * Raised when a side-effecting call is attempted without a capability gate.
 * This is a programmer error, never a halt.
 */
export class MissingCapabilityGateError extends Error {
  readonly code = 'MISSING_CAPABILITY_GATE';
  readonly action: string;

  constructor(action: string) {
    super(`${action} requires a capability adapter gate`);
    this.name = 'MissingCapabilityGateError';
    this.action = action;
  }
}

/**
 * Raised when a capability gate does not allow the call. Nothing is written.
 */
export class CapabilityDeniedError extends Error {
  readonly code = 'CAPABILITY_DENIED';
  readonly action: string;
  readonly invocationId: string;

  constructor(action: string, invocationId: string) {
    super(`${action} denied: adapter gate is not allowed (invocation ${invocationId})`);
    this.name = 'CapabilityDeniedError';
    this.action = action;
    this.invocationId = invocationId;
  }
}
