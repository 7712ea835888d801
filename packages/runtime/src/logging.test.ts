// Tests for level filtering

import { describe, it, expect } from 'vitest';
import { createCapturingLogger, createConsoleLogger } from './logging.js';

describe('createConsoleLogger', () => {
  it('drops entries below the configured level', () => {
    const base = createCapturingLogger();
    const logger = createConsoleLogger('warn', base);

    logger.debug('Mission loop phase');
    logger.info('Intervention decision');
    logger.warn('Invariant gate halted', { haltId: 'halt:1' });
    logger.error('Append failed');

    expect(base.entries.map((entry) => [entry.level, entry.message, entry.data])).toEqual([
      ['warn', 'Invariant gate halted', { haltId: 'halt:1' }],
      ['error', 'Append failed', undefined],
    ]);
  });

  it('passes nothing through when silent', () => {
    const base = createCapturingLogger();
    const logger = createConsoleLogger('silent', base);

    logger.error('Append failed');

    expect(base.entries).toEqual([]);
  });
});
