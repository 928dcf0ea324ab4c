import type { Result } from 'neverthrow';
import type { OutOfMemoryError } from '../errors/library-error.js';

/**
 * Allocator port.
 *
 * Every piece of storage a collection owns is accounted for here: the
 * container header, the slot buffer, and each owned element. Collections
 * never touch a heap budget directly.
 *
 * Guarantees:
 * - Synchronous
 * - `allocate` fails with OutOfMemory instead of throwing
 * - `release` is total: an unknown or already-released handle returns false
 */
export type AllocationPurpose = 'container' | 'buffer' | 'element';

export interface AllocationHandle {
  readonly id: number;
  readonly bytes: number;
  readonly purpose: AllocationPurpose;
}

export interface AllocatorPort {
  allocate(bytes: number, purpose: AllocationPurpose, operation: string): Result<AllocationHandle, OutOfMemoryError>;

  /** @returns true when the handle was live and is now released */
  release(handle: AllocationHandle): boolean;
}
