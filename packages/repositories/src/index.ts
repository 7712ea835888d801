// @ledgerline/repositories
// Append-only log interfaces and implementations.
//
// This package defines the "contract" for persistence. The implementations
// (filesystem NDJSON, Postgres, in-memory) fulfill it, so the runtime works
// with any storage backend.
//
// Key concepts:
// - AppendOnlyLog is the only way state becomes durable
// - LogContext bundles the prediction and halt streams for dependency injection
// - Every append takes a capability gate and enforces it before any I/O

export * from './interfaces/index.js';
export * from './errors.js';
export { enforceCapabilityGate } from './gate.js';
export * from './filesystem/log.js';
export * from './in-memory/index.js';
export * as postgres from './postgres/index.js';
