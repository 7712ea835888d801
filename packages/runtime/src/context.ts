// Runtime context - everything an operation needs besides its arguments

import { randomUUID } from 'node:crypto';
import type { Id, Timestamp } from '@ledgerline/protocol';
import type { LogContext } from '@ledgerline/repositories';
import type { RuntimeLogger } from './logging.js';
import { consoleLogger } from './logging.js';

/**
 * Injected into every runtime operation.
 * Clock and id generator are explicit so tests get exact values.
 */
export type RuntimeContext = {
  logs: LogContext;
  logger: RuntimeLogger;

  /**
   * Current time as an ISO 8601 string
   */
  now(): Timestamp;

  /**
   * Fresh unique id with the given prefix (e.g. "pred:")
   */
  newId(prefix: string): Id;
};

export type CreateRuntimeContextOptions = {
  logs: LogContext;
  logger?: RuntimeLogger;
  now?: () => Timestamp;
  newId?: (prefix: string) => Id;
};

export function createRuntimeContext(options: CreateRuntimeContextOptions): RuntimeContext {
  return {
    logs: options.logs,
    logger: options.logger ?? consoleLogger,
    now: options.now ?? (() => new Date().toISOString()),
    newId: options.newId ?? ((prefix) => `${prefix}${randomUUID()}`),
  };
}

/**
 * Clock starting at `timestamp` that advances `stepSeconds` per call
 * (default 0: always the same instant).
 */
export function createFixedClock(
  timestamp: Timestamp,
  options?: { stepSeconds?: number }
): () => Timestamp {
  const start = Date.parse(timestamp);
  const step = (options?.stepSeconds ?? 0) * 1000;
  let calls = 0;
  return () => new Date(start + step * calls++).toISOString();
}

/**
 * Id generator yielding `${prefix}1`, `${prefix}2`, ... with one counter per prefix.
 */
export function createSequentialIds(): (prefix: string) => Id {
  const counters = new Map<string, number>();
  return (prefix) => {
    const next = (counters.get(prefix) ?? 0) + 1;
    counters.set(prefix, next);
    return `${prefix}${next}`;
  };
}
