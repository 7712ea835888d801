// Protocol types - re-exports

export * from './common.js';
export * from './observations.js';
export * from './observer.js';
export * from './predictions.js';
export * from './invariants.js';
export * from './halts.js';
export * from './repairs.js';
export * from './interventions.js';
export * from './outbox.js';
export * from './capabilities.js';
export * from './freshness.js';
export * from './schema-selection.js';
export * from './episodes.js';
export * from './artifacts.js';
export * from './log-events.js';
