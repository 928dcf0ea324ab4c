import type { Result } from 'neverthrow';
import type { LibraryContext } from '../core/library-context.js';
import type { LibraryError } from '../errors/library-error.js';
import type { Comparator, IndexableBuffer } from './capabilities.js';
import { checkBufferArgs } from './buffer-bounds.js';

/**
 * Sort `buffer[0..length)` in place under `comparator`.
 *
 * Insertion sort: stable, and a buffer that is already in order is left as is.
 * A comparator that throws propagates; the buffer may then be partly sorted.
 */
export function sortWithComparator<T>(
  context: LibraryContext,
  buffer: IndexableBuffer<T> | null | undefined,
  length: number,
  comparator: Comparator<T> | null | undefined
): Result<void, LibraryError> {
  const checked = checkBufferArgs('sortWithComparator', buffer, length, comparator, 'comparator');

  return context.register.record(
    checked.map(({ buffer: target, capability }) => {
      for (let i = 1; i < length; i++) {
        const current = target[i];
        let j = i - 1;
        while (j >= 0 && capability.compare(target[j], current) > 0) {
          target[j + 1] = target[j];
          j--;
        }
        target[j + 1] = current;
      }
      context.logger.debug({ length }, 'buffer sorted');
    })
  );
}
