import { err, ok, type Result } from 'neverthrow';
import type { AllocatorPort } from '../ports/allocator.port.js';
import type { LibraryError } from '../errors/library-error.js';
import { Err } from '../errors/factories.js';

/**
 * How a collection takes ownership of, exposes, and gives back one element.
 *
 * - `adopt` copies the caller's item into storage the collection owns. It may
 *   allocate; on failure nothing is kept.
 * - `view` is what `get` hands out. Valid until the collection is released.
 * - `dispose` gives back whatever `adopt` allocated.
 */
export interface ElementPolicy<TIn, TStored, TOut> {
  /** Bytes one slot occupies in the element buffer. */
  readonly slotBytes: number;
  adopt(item: TIn, allocator: AllocatorPort, operation: string): Result<TStored, LibraryError>;
  view(stored: TStored): TOut;
  dispose(stored: TStored, allocator: AllocatorPort): void;
}

export const VALUE_SLOT_BYTES = 8;

/**
 * Plain values, copied with structuredClone. Nothing allocated per element.
 * A value structuredClone refuses (functions, symbols, class instances with
 * private state) is an InvalidArgument.
 */
export function valuePolicy<T>(): ElementPolicy<T, T, T> {
  return {
    slotBytes: VALUE_SLOT_BYTES,
    adopt: (item, _allocator, operation) => {
      try {
        return ok(structuredClone(item));
      } catch {
        return err(Err.invalidArgument(operation, 'item', typeof item, 'a structured-cloneable value'));
      }
    },
    view: (stored) => stored,
    dispose: () => undefined,
  };
}
