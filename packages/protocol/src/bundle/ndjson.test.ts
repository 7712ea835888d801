// Tests for NDJSON helpers

import { describe, it, expect, vi } from 'vitest';
import {
  countNdjsonLines,
  iterateNdjsonObjects,
  stringifyCanonical,
  stringifyNdjsonLine,
} from './ndjson.js';

describe('iterateNdjsonObjects', () => {
  it('numbers objects among non-empty lines, as evidence refs do', () => {
    const content = '{"a":1}\n\n{"b":2}\n';
    const lines = [...iterateNdjsonObjects(content)];

    expect(lines).toEqual([
      { lineNumber: 1, record: { a: 1 } },
      { lineNumber: 2, record: { b: 2 } },
    ]);
    expect(lines[1].lineNumber).toBe(countNdjsonLines(content));
  });

  it('reports skips by the same numbering when blank lines sit in between', () => {
    const onSkip = vi.fn();
    const content = '\n{"a":1}\n\n\n{broken\n';

    [...iterateNdjsonObjects(content, onSkip)];

    expect(onSkip).toHaveBeenCalledTimes(1);
    expect(onSkip).toHaveBeenCalledWith(2, 'invalid_json');
  });

  it('skips invalid JSON and non-object lines', () => {
    const onSkip = vi.fn();
    const content = '{"a":1}\n{broken\n[1,2]\n"text"\n{"b":2}';
    const lines = [...iterateNdjsonObjects(content, onSkip)];

    expect(lines.map((line) => line.record)).toEqual([{ a: 1 }, { b: 2 }]);
    expect(onSkip).toHaveBeenCalledWith(2, 'invalid_json');
    expect(onSkip).toHaveBeenCalledWith(3, 'not_an_object');
    expect(onSkip).toHaveBeenCalledWith(4, 'not_an_object');
  });
});

describe('countNdjsonLines', () => {
  it('counts non-empty lines', () => {
    expect(countNdjsonLines('')).toBe(0);
    expect(countNdjsonLines('{"a":1}\n{"b":2}\n')).toBe(2);
    expect(countNdjsonLines('{"a":1}\n\n{"b":2}')).toBe(2);
  });
});

describe('stringifyNdjsonLine', () => {
  it('terminates with a newline', () => {
    expect(stringifyNdjsonLine({ a: 1 })).toBe('{"a":1}\n');
  });
});

describe('stringifyCanonical', () => {
  it('sorts keys at every depth', () => {
    expect(stringifyCanonical({ b: 1, a: { d: [{ z: 1, y: 2 }], c: 3 } })).toBe(
      '{"a":{"c":3,"d":[{"y":2,"z":1}]},"b":1}'
    );
  });

  it('drops undefined properties', () => {
    expect(stringifyCanonical({ a: undefined, b: null })).toBe('{"b":null}');
  });
});
