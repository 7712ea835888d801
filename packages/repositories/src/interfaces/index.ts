// Repository interfaces

export type { AppendOnlyLog } from './append-only-log.js';
export type { LogContext } from './log-context.js';
