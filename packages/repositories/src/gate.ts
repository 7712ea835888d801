import type { CapabilityAdapterGate } from '@ledgerline/protocol';
import { CapabilityDeniedError, MissingCapabilityGateError } from './errors.js';

/**
 * Fail unless the gate is present and allows the action.
 * Every log implementation calls this before touching storage.
 */
export function enforceCapabilityGate(
  action: string,
  gate: CapabilityAdapterGate | null | undefined
): void {
  if (!gate) {
    throw new MissingCapabilityGateError(action);
  }
  if (!gate.allowed) {
    throw new CapabilityDeniedError(action, gate.invocationId);
  }
}
