import { err, ok, type Result } from 'neverthrow';
import type { AllocationHandle, AllocationPurpose, AllocatorPort } from '../ports/allocator.port.js';
import type { OutOfMemoryError } from '../errors/library-error.js';
import { Err } from '../errors/factories.js';

/**
 * Heap accounting allocator.
 *
 * With a limit, a request that would take `bytesInUse` past it fails with
 * OutOfMemory. Without one every request succeeds.
 */
export class HeapAllocator implements AllocatorPort {
  private readonly live = new Map<number, AllocationHandle>();
  private nextId = 1;
  private inUse = 0;

  constructor(private readonly limitBytes: number | null = null) {}

  get bytesInUse(): number {
    return this.inUse;
  }

  get liveAllocations(): number {
    return this.live.size;
  }

  allocate(bytes: number, purpose: AllocationPurpose, operation: string): Result<AllocationHandle, OutOfMemoryError> {
    if (this.limitBytes !== null && this.inUse + bytes > this.limitBytes) {
      return err(Err.outOfMemory(operation, bytes, this.limitBytes - this.inUse, purpose));
    }

    const handle: AllocationHandle = Object.freeze({ id: this.nextId++, bytes, purpose });
    this.live.set(handle.id, handle);
    this.inUse += bytes;
    return ok(handle);
  }

  release(handle: AllocationHandle): boolean {
    if (!this.live.delete(handle.id)) return false;
    this.inUse -= handle.bytes;
    return true;
  }
}
