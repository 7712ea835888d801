// @ledgerline/protocol
// Data model, contract validation and NDJSON helpers shared by every package.

export * from './types/index.js';

// Validation
export * from './validation/guards.js';
export * from './validation/schemas.js';
export * from './validation/halts.js';
export * from './validation/contracts.js';

// NDJSON
export * from './bundle/ndjson.js';
