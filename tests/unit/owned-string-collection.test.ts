import { describe, it, expect } from 'vitest';
import { TextEncoder } from 'node:util';
import { OwnedStringCollection } from '../../src/collections/owned-string-collection.js';
import { TrackingAllocator } from '../fakes/index.js';
import { createTestContext } from '../helpers/test-context.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

describe('OwnedStringCollection', () => {
  it('refuses a third string at capacity 2 and keeps what it has', () => {
    const { context, logger } = createTestContext();
    const strings = expectOk(OwnedStringCollection.create(context, 2), 'create');

    expectOk(strings.append('first'), 'append first');
    expectOk(strings.append('second'), 'append second');
    expect(strings.size()).toBe(2);

    const error = expectErr(strings.append('third'), 'append third');

    expect(error._tag).toBe('IndexOutOfBounds');
    expect(strings.size()).toBe(2);
    expect(expectOk(strings.get(1), 'get(1)')).toBe('second');
    expect(logger.hasEntry('warn', 'collection full')).toBe(true);
  });

  describe('deep copy on insert', () => {
    it('is unaffected by later writes to the caller bytes', () => {
      const { context } = createTestContext();
      const strings = expectOk(OwnedStringCollection.create(context, 1), 'create');
      const bytes = new TextEncoder().encode('hello');

      strings.append(bytes);
      bytes[0] = 0x6a;
      bytes.fill(0, 1);

      expect(expectOk(strings.get(0), 'get')).toBe('hello');
    });

    it('allocates the encoded length plus a terminator per element', () => {
      const { context, allocator } = createTestContext();
      const strings = expectOk(OwnedStringCollection.create(context, 2), 'create');

      strings.append('abc');
      strings.append('héllo');

      const elements = allocator.allocations().filter((h) => h.purpose === 'element');
      expect(elements.map((h) => h.bytes)).toEqual([4, 7]);
      expect(expectOk(strings.get(1), 'get')).toBe('héllo');
    });
    it('returns a string with an unpaired surrogate exactly as given', () => {
      const { context, allocator } = createTestContext();
      const strings = expectOk(OwnedStringCollection.create(context, 1), 'create');
      const text = 'ab\uD800cd';

      expectOk(strings.append(text), 'append');

      expect(expectOk(strings.get(0), 'get')).toBe(text);
      // the surrogate counts as three UTF-8 bytes
      expect(allocator.allocations().filter((h) => h.purpose === 'element').map((h) => h.bytes)).toEqual([8]);
    });

    it('keeps a leading byte-order mark from a byte view', () => {
      const { context } = createTestContext();
      const strings = expectOk(OwnedStringCollection.create(context, 1), 'create');

      strings.append(new Uint8Array([0xef, 0xbb, 0xbf, 0x61]));

      expect(expectOk(strings.get(0), 'get')).toBe('\uFEFFa');
    });

    it('refuses malformed UTF-8 without allocating for it', () => {
      const { context, allocator } = createTestContext();
      const strings = expectOk(OwnedStringCollection.create(context, 1), 'create');

      const error = expectErr(strings.append(new Uint8Array([0x61, 0xff])), 'append');

      expect(error).toMatchObject({ _tag: 'InvalidArgument', argument: 'item', value: '2 bytes' });
      expect(context.register.lastError()).toBe('InvalidArgument');
      expect(strings.size()).toBe(0);
      expect(allocator.allocations().filter((h) => h.purpose === 'element')).toHaveLength(0);
    });
  });

  it('leaves the count alone when an element cannot be allocated', () => {
    const allocator = new TrackingAllocator();
    // header, buffer, "first"; then nothing more
    allocator.failAfter(3);
    const { context } = createTestContext(allocator);
    const strings = expectOk(OwnedStringCollection.create(context, 2), 'create');
    strings.append('first');

    const error = expectErr(strings.append('second'), 'append second');

    expect(error).toMatchObject({ _tag: 'OutOfMemory', purpose: 'element' });
    expect(context.register.lastError()).toBe('OutOfMemory');
    expect(strings.size()).toBe(1);
    expect(expectErr(strings.get(1), 'get(1)')._tag).toBe('IndexOutOfBounds');
  });

  it('rejects an absent string', () => {
    const { context } = createTestContext();
    const strings = expectOk(OwnedStringCollection.create(context, 1), 'create');

    expect(expectErr(strings.append(undefined), 'append')).toMatchObject({ _tag: 'NullReference', argument: 'item' });
    expect(strings.size()).toBe(0);
  });

  describe('release', () => {
    it('gives back every element, then the buffer, then the container', () => {
      const { context, allocator } = createTestContext();
      const strings = expectOk(OwnedStringCollection.create(context, 4), 'create');
      strings.append('a');
      strings.append('bb');
      strings.append('ccc');

      expectOk(strings.release(), 'release');

      expect(allocator.releases().map((h) => h.purpose)).toEqual([
        'element',
        'element',
        'element',
        'buffer',
        'container',
      ]);
      expect(allocator.liveCount).toBe(0);
      expect(allocator.invalidReleases).toHaveLength(0);
    });

    it('frees nothing on a second call', () => {
      const { context, allocator } = createTestContext();
      const strings = expectOk(OwnedStringCollection.create(context, 2), 'create');
      strings.append('only');
      strings.release();
      const eventsAfterFirst = allocator.events.length;

      const error = expectErr(strings.release(), 'second release');

      expect(error._tag).toBe('NullReference');
      expect(allocator.events).toHaveLength(eventsAfterFirst);
      expect(allocator.invalidReleases).toHaveLength(0);
    });
  });

  describe('join', () => {
    it('joins stored strings in order', () => {
      const { context } = createTestContext();
      const strings = expectOk(OwnedStringCollection.create(context, 3), 'create');
      strings.append('a');
      strings.append('b');
      strings.append('c');

      expect(expectOk(strings.join('-'), 'join')).toBe('a-b-c');
    });

    it('returns an empty string for an empty collection', () => {
      const { context } = createTestContext();
      const strings = expectOk(OwnedStringCollection.create(context, 3), 'create');

      expect(expectOk(strings.join(', '), 'join')).toBe('');
    });

    it('needs a separator', () => {
      const { context } = createTestContext();
      const strings = expectOk(OwnedStringCollection.create(context, 1), 'create');

      expect(expectErr(strings.join(null), 'join')).toMatchObject({ _tag: 'NullReference', argument: 'separator' });
    });

    it('reports a released collection before a missing separator', () => {
      const { context } = createTestContext();
      const strings = expectOk(OwnedStringCollection.create(context, 1), 'create');
      strings.release();

      expect(expectErr(strings.join(null), 'join')).toMatchObject({ _tag: 'NullReference', argument: 'collection' });
    });
  });

  describe('split', () => {
    it('keeps non-empty tokens in a collection sized to fit', () => {
      const { context } = createTestContext();

      const strings = expectOk(OwnedStringCollection.split(context, 'a,b,,c', ','), 'split');

      expect(strings.capacity).toBe(3);
      expect(strings.size()).toBe(3);
      expect(expectOk(strings.join('|'), 'join')).toBe('a|b|c');
    });

    it('splits on a multi-character delimiter', () => {
      const { context } = createTestContext();

      const strings = expectOk(OwnedStringCollection.split(context, 'one::two', '::'), 'split');

      expect(expectOk(strings.get(1), 'get')).toBe('two');
    });

    it('returns an empty collection of capacity 1 for empty text', () => {
      const { context } = createTestContext();

      const strings = expectOk(OwnedStringCollection.split(context, '', ','), 'split');

      expect(strings.capacity).toBe(1);
      expect(strings.size()).toBe(0);
    });

    it('validates its arguments', () => {
      const { context } = createTestContext();

      expect(expectErr(OwnedStringCollection.split(context, null, ','), 'split')).toMatchObject({
        _tag: 'NullReference',
        argument: 'text',
      });
      expect(expectErr(OwnedStringCollection.split(context, 'abc', undefined), 'split')).toMatchObject({
        _tag: 'NullReference',
        argument: 'delimiter',
      });
      expect(expectErr(OwnedStringCollection.split(context, 'abc', ''), 'split')._tag).toBe('InvalidArgument');
      expect(context.register.lastError()).toBe('InvalidArgument');
    });

    it('releases the partial collection when a token cannot be copied', () => {
      const allocator = new TrackingAllocator();
      // header, buffer, "a"; "b" is refused
      allocator.failAfter(3);
      const { context } = createTestContext(allocator);

      const error = expectErr(OwnedStringCollection.split(context, 'a b', ' '), 'split');

      expect(error._tag).toBe('OutOfMemory');
      expect(allocator.releases().map((h) => h.purpose)).toEqual(['element', 'buffer', 'container']);
      expect(allocator.liveCount).toBe(0);
    });
  });
});
