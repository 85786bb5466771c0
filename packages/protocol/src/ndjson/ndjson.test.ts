// Tests for NDJSON helpers

import { describe, it, expect } from 'vitest';
import {
  parseNdjson,
  parseNdjsonDetailed,
  stringifyNdjson,
} from './ndjson.js';

describe('parseNdjson', () => {
  it('should return an empty array for blank content', () => {
    expect(parseNdjson('')).toEqual([]);
    expect(parseNdjson('\n\n')).toEqual([]);
  });

  it('should parse one object per line and skip blank lines', () => {
    const items = parseNdjson<{ n: number }>('{"n":1}\n\n{"n":2}\n');

    expect(items).toEqual([{ n: 1 }, { n: 2 }]);
  });

  it('should throw with the line number on a malformed line', () => {
    expect(() => parseNdjson('{"n":1}\nnot json\n{"n":3}\n')).toThrow(
      /Failed to parse NDJSON at line 2/
    );
  });

  it('should throw on a torn tail unless tolerated', () => {
    expect(() => parseNdjson('{"n":1}\n{"n":')).toThrow(/line 2/);
    expect(parseNdjson('{"n":1}\n{"n":', { tolerateTornTail: true })).toEqual([{ n: 1 }]);
  });

  it('should still throw on a malformed newline-terminated last line', () => {
    expect(() => parseNdjson('{"n":1}\n{"n":\n', { tolerateTornTail: true })).toThrow(/line 2/);
  });

  it('should still throw on a malformed line in the middle', () => {
    expect(() => parseNdjson('{"n":\n{"n":2}', { tolerateTornTail: true })).toThrow(/line 1/);
  });
});

describe('parseNdjsonDetailed', () => {
  it('should report the dropped fragment', () => {
    const result = parseNdjsonDetailed('{"n":1}\n{"n"', { tolerateTornTail: true });

    expect(result.items).toEqual([{ n: 1 }]);
    expect(result.droppedTail).toBe('{"n"');
  });

  it('should report null when nothing was dropped', () => {
    expect(parseNdjsonDetailed('{"n":1}\n').droppedTail).toBeNull();
  });
});

describe('stringifyNdjson', () => {
  it('should terminate every line with a newline', () => {
    expect(stringifyNdjson([{ a: 1 }, { b: 2 }])).toBe('{"a":1}\n{"b":2}\n');
  });

  it('should produce an empty string for no items', () => {
    expect(stringifyNdjson([])).toBe('');
  });
});
