import { describe, it, expect } from 'vitest';
import { mergeExtensions } from '../../src/core/deep-merge.js';

describe('mergeExtensions', () => {
  it('merges nested objects and replaces everything else', () => {
    const base = { a: { b: 1, c: 2 }, d: [1, 2], e: 'keep' };
    const extensions = { a: { c: 3 }, d: [3] };

    expect(mergeExtensions(base, extensions)).toEqual({
      a: { b: 1, c: 3 },
      d: [3],
      e: 'keep',
    });
  });

  it('lets a scalar extension replace an object', () => {
    expect(mergeExtensions({ a: { b: 1 } }, { a: 5 })).toEqual({ a: 5 });
  });

  it('does not mutate its inputs', () => {
    const base = { a: { b: 1 } };
    const extensions = { a: { c: 2 } };
    mergeExtensions(base, extensions);
    expect(base).toEqual({ a: { b: 1 } });
    expect(extensions).toEqual({ a: { c: 2 } });
  });
});
