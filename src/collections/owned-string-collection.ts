import { TextDecoder, TextEncoder } from 'node:util';
import { err, ok, type Result } from 'neverthrow';
import type { LibraryContext } from '../core/library-context.js';
import type { AllocationHandle } from '../ports/allocator.port.js';
import type { LibraryError } from '../errors/library-error.js';
import { Err } from '../errors/factories.js';
import type { ElementPolicy } from './element-policy.js';
import { FixedCapacityCollection, allocateStorage, type CollectionStorage } from './fixed-capacity-collection.js';

/** One pointer per slot. */
export const STRING_SLOT_BYTES = 8;

/** Accepted input: a string, or a borrowed view of UTF-8 bytes. */
export type StringSource = string | Uint8Array;

/** The collection's own copy of one string, plus the allocation that accounts for it. */
export interface OwnedText {
  readonly text: string;
  readonly allocation: AllocationHandle;
}

const encoder = new TextEncoder();
const strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function decodeStrict(bytes: Uint8Array): string | null {
  try {
    return strictDecoder.decode(bytes);
  } catch {
    return null;
  }
}

/**
 * Copy on adopt: byte views are decoded into a fresh string (malformed UTF-8
 * is refused), strings are kept as given. The element allocation (UTF-8
 * length + terminator) is reserved before anything is stored.
 */
const ownedStringPolicy: ElementPolicy<StringSource, OwnedText, string> = {
  slotBytes: STRING_SLOT_BYTES,
  adopt: (source, allocator, operation) => {
    if (typeof source === 'string') {
      return allocator
        .allocate(encoder.encode(source).byteLength + 1, 'element', operation)
        .map((allocation) => ({ text: source, allocation }));
    }

    const text = decodeStrict(source);
    if (text === null) {
      return err(Err.invalidArgument(operation, 'item', `${source.byteLength} bytes`, 'well-formed UTF-8'));
    }
    return allocator
      .allocate(source.byteLength + 1, 'element', operation)
      .map((allocation) => ({ text, allocation }));
  },
  view: (stored) => stored.text,
  dispose: (stored, allocator) => {
    allocator.release(stored.allocation);
  },
};

/**
 * Strings owned by the collection.
 *
 * Every element is the collection's own at insertion; a caller's byte view is
 * never retained. `release()` gives back each element, then the pointer
 * buffer, then the container.
 */
export class OwnedStringCollection extends FixedCapacityCollection<StringSource, OwnedText, string> {
  private constructor(context: LibraryContext, storage: CollectionStorage) {
    super(context, storage, ownedStringPolicy, 'OwnedStringCollection');
  }

  static create(context: LibraryContext, capacity: number): Result<OwnedStringCollection, LibraryError> {
    return context.register.record(OwnedStringCollection.allocate(context, capacity, 'OwnedStringCollection.create'));
  }

  /**
   * Non-empty tokens of `text` between occurrences of `delimiter`, in a
   * collection sized to fit them (capacity at least 1).
   */
  static split(
    context: LibraryContext,
    text: string | null | undefined,
    delimiter: string | null | undefined
  ): Result<OwnedStringCollection, LibraryError> {
    return context.register.record(OwnedStringCollection.splitInto(context, text, delimiter));
  }

  join(separator: string | null | undefined): Result<string, LibraryError> {
    const operation = this.operation('join');
    return this.context.register.record(
      this.elements(operation).andThen((values) =>
        separator === null || separator === undefined
          ? err(Err.nullReference(operation, 'separator'))
          : ok(values.join(separator))
      )
    );
  }

  private static allocate(
    context: LibraryContext,
    capacity: number,
    operation: string
  ): Result<OwnedStringCollection, LibraryError> {
    return allocateStorage(context, capacity, STRING_SLOT_BYTES, operation).map(
      (storage) => new OwnedStringCollection(context, storage)
    );
  }

  private static splitInto(
    context: LibraryContext,
    text: string | null | undefined,
    delimiter: string | null | undefined
  ): Result<OwnedStringCollection, LibraryError> {
    const operation = 'OwnedStringCollection.split';
    if (text === null || text === undefined) return err(Err.nullReference(operation, 'text'));
    if (delimiter === null || delimiter === undefined) return err(Err.nullReference(operation, 'delimiter'));
    if (delimiter.length === 0) {
      return err(Err.invalidArgument(operation, 'delimiter', '""', 'a non-empty string'));
    }

    const tokens = text.split(delimiter).filter((token) => token.length > 0);
    const created = OwnedStringCollection.allocate(context, Math.max(1, tokens.length), operation);
    if (created.isErr()) return err(created.error);

    const collection = created.value;
    for (const token of tokens) {
      const appended = collection.tryAppend(token);
      if (appended.isErr()) {
        collection.teardown(operation);
        return err(appended.error);
      }
    }
    return ok(collection);
  }
}
