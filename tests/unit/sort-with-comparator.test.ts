import { describe, it, expect, vi } from 'vitest';
import { sortWithComparator } from '../../src/hooks/sort-with-comparator.js';
import { comparing } from '../../src/hooks/capabilities.js';
import { createTestContext } from '../helpers/test-context.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

const ascending = comparing<number>((a, b) => a - b);

/** Deterministic pseudo-random integers (LCG) for property-style checks. */
function generate(seed: number, count: number): number[] {
  const values: number[] = [];
  let state = seed;
  for (let i = 0; i < count; i++) {
    state = (state * 1103515245 + 12345) % 2147483648;
    values.push(state % 100);
  }
  return values;
}

describe('sortWithComparator', () => {
  it('sorts in place under the comparator', () => {
    const { context } = createTestContext();
    const buffer = [5, 3, 9, 1, 4];

    expectOk(sortWithComparator(context, buffer, buffer.length, ascending), 'sort');

    expect(buffer).toEqual([1, 3, 4, 5, 9]);
    expect(context.register.lastError()).toBe('Success');
  });

  it('follows a descending order', () => {
    const { context } = createTestContext();
    const buffer = [2, 8, 5];

    sortWithComparator(context, buffer, 3, comparing<number>((a, b) => b - a));

    expect(buffer).toEqual([8, 5, 2]);
  });

  it('touches only the first `length` elements', () => {
    const { context } = createTestContext();
    const buffer = [3, 2, 1, 0];

    sortWithComparator(context, buffer, 3, ascending);

    expect(buffer).toEqual([1, 2, 3, 0]);
  });

  it('sorts typed arrays', () => {
    const { context } = createTestContext();
    const buffer = Int32Array.from([40, -2, 7]);

    sortWithComparator(context, buffer, buffer.length, ascending);

    expect(Array.from(buffer)).toEqual([-2, 7, 40]);
  });

  it('yields a non-decreasing buffer for generated inputs', () => {
    const { context } = createTestContext();
    for (const seed of [1, 7, 42, 1234]) {
      const buffer = generate(seed, 25);
      const expected = [...buffer].sort((a, b) => a - b);

      sortWithComparator(context, buffer, buffer.length, ascending);

      expect(buffer).toEqual(expected);
    }
  });

  it('leaves an already sorted buffer untouched, ties included', () => {
    const { context } = createTestContext();
    const buffer = [
      { key: 1, id: 'a' },
      { key: 1, id: 'b' },
      { key: 2, id: 'c' },
    ];
    const compare = vi.fn((a: { key: number }, b: { key: number }) => a.key - b.key);

    sortWithComparator(context, buffer, buffer.length, { compare });

    expect(buffer.map((entry) => entry.id)).toEqual(['a', 'b', 'c']);
    expect(compare).toHaveBeenCalledTimes(2);
  });

  describe('argument checks', () => {
    it('needs a buffer', () => {
      const { context } = createTestContext();
      const error = expectErr(sortWithComparator(context, null, 3, ascending), 'sort');
      expect(error).toMatchObject({ _tag: 'NullReference', argument: 'buffer' });
    });

    it('needs a comparator', () => {
      const { context } = createTestContext();
      const error = expectErr(sortWithComparator(context, [1], 1, undefined), 'sort');
      expect(error).toMatchObject({ _tag: 'NullReference', argument: 'comparator' });
    });

    it('treats a zero length as absent', () => {
      const { context } = createTestContext();
      const error = expectErr(sortWithComparator(context, [2, 1], 0, ascending), 'sort');
      expect(error).toMatchObject({ _tag: 'NullReference', argument: 'length' });
      expect(context.register.lastError()).toBe('NullReference');
    });

    it.each([-1, 1.5])('rejects length %s', (length) => {
      const { context } = createTestContext();
      const error = expectErr(sortWithComparator(context, [2, 1], length, ascending), 'sort');
      expect(error._tag).toBe('InvalidArgument');
    });

    it('rejects a length past the end of the buffer', () => {
      const { context } = createTestContext();
      const error = expectErr(sortWithComparator(context, [3, 2, 1], 10, ascending), 'sort');
      expect(error).toMatchObject({ _tag: 'IndexOutOfBounds', index: 10, bound: 3 });
    });
  });
});
