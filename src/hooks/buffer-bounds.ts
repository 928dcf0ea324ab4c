import { err, ok, type Result } from 'neverthrow';
import type { LibraryError } from '../errors/library-error.js';
import { Err } from '../errors/factories.js';
import type { IndexableBuffer } from './capabilities.js';

/**
 * Shared argument checks for the buffer hooks, first applicable cause wins:
 * absent buffer, absent capability, zero length (NullReference); a length that
 * is not a whole number (InvalidArgument); a length past the end of the
 * buffer (IndexOutOfBounds).
 */
export function checkBufferArgs<T, C>(
  operation: string,
  buffer: IndexableBuffer<T> | null | undefined,
  length: number,
  capability: C | null | undefined,
  capabilityName: string
): Result<{ readonly buffer: IndexableBuffer<T>; readonly capability: C }, LibraryError> {
  if (buffer === null || buffer === undefined) return err(Err.nullReference(operation, 'buffer'));
  if (capability === null || capability === undefined) return err(Err.nullReference(operation, capabilityName));
  if (length === 0) return err(Err.nullReference(operation, 'length'));

  if (!Number.isInteger(length) || length < 0) {
    return err(Err.invalidArgument(operation, 'length', String(length), 'a positive integer'));
  }
  if (length > buffer.length) {
    return err(Err.indexOutOfBounds(operation, length, buffer.length));
  }

  return ok({ buffer, capability });
}
