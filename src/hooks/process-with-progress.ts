import type { Result } from 'neverthrow';
import type { LibraryContext } from '../core/library-context.js';
import type { LibraryError } from '../errors/library-error.js';
import type { ElementTransform, IndexableBuffer, ProgressObserver } from './capabilities.js';
import { checkBufferArgs } from './buffer-bounds.js';

export const doubleValue: ElementTransform = (value) => value * 2;

/**
 * Transform `buffer[0..length)` in place, reporting after each element.
 *
 * The observer sees (i + 1) / length for element i: strictly increasing, and
 * exactly 1 after the last element.
 */
export function processWithProgress(
  context: LibraryContext,
  buffer: IndexableBuffer<number> | null | undefined,
  length: number,
  observer: ProgressObserver | null | undefined,
  transform: ElementTransform = doubleValue
): Result<void, LibraryError> {
  const checked = checkBufferArgs('processWithProgress', buffer, length, observer, 'observer');

  return context.register.record(
    checked.map(({ buffer: target, capability }) => {
      for (let i = 0; i < length; i++) {
        target[i] = transform(target[i], i);
        capability.onProgress((i + 1) / length);
      }
      context.logger.debug({ length }, 'buffer processed');
    })
  );
}
