import { err, ok, type Result } from 'neverthrow';
import type { LibraryContext } from '../core/library-context.js';
import type { Logger } from '../core/logging/types.js';
import type { AllocationHandle } from '../ports/allocator.port.js';
import type { LibraryError } from '../errors/library-error.js';
import { Err } from '../errors/factories.js';
import { isCapacity, type Capacity } from '../runtime/brand.js';
import { valuePolicy, type ElementPolicy } from './element-policy.js';

/** Bytes accounted for the collection header (count, capacity, buffer pointer). */
export const CONTAINER_HEADER_BYTES = 24;

/**
 * Storage a collection owns from construction until release.
 * Only `allocateStorage` produces one.
 */
export interface CollectionStorage {
  readonly capacity: Capacity;
  readonly container: AllocationHandle;
  readonly buffer: AllocationHandle;
}

type LiveState<TStored> = {
  readonly kind: 'live';
  readonly storage: CollectionStorage;
  readonly slots: Array<TStored | undefined>;
  count: number;
};

type CollectionState<TStored> = LiveState<TStored> | { readonly kind: 'released' };

/**
 * Reserve the container header and the slot buffer.
 * A header already reserved is given back if the buffer cannot be.
 */
export function allocateStorage(
  context: LibraryContext,
  capacity: number,
  slotBytes: number,
  operation: string
): Result<CollectionStorage, LibraryError> {
  if (!isCapacity(capacity)) {
    return err(Err.invalidArgument(operation, 'capacity', String(capacity), 'a positive integer'));
  }

  const { allocator } = context;
  const containerRes = allocator.allocate(CONTAINER_HEADER_BYTES, 'container', operation);
  if (containerRes.isErr()) return err(containerRes.error);

  const bufferRes = allocator.allocate(capacity * slotBytes, 'buffer', operation);
  if (bufferRes.isErr()) {
    allocator.release(containerRes.value);
    return err(bufferRes.error);
  }

  return ok({ capacity, container: containerRes.value, buffer: bufferRes.value });
}

/**
 * Append-only, index-addressable container whose capacity never changes.
 *
 * Invariant: 0 <= count <= capacity; the slot array is sized once and never
 * reallocated, so a full collection reports IndexOutOfBounds instead of growing.
 *
 * Every public method writes the context's error register exactly once.
 * A released collection behaves as an absent handle (NullReference).
 */
export class FixedCapacityCollection<TIn, TStored = TIn, TOut = TStored> {
  readonly capacity: Capacity;
  protected readonly logger: Logger;
  private state: CollectionState<TStored>;

  protected constructor(
    protected readonly context: LibraryContext,
    storage: CollectionStorage,
    private readonly policy: ElementPolicy<TIn, TStored, TOut>,
    private readonly label: string
  ) {
    this.capacity = storage.capacity;
    this.logger = context.logger.child({ collection: label });
    this.state = {
      kind: 'live',
      storage,
      slots: new Array<TStored | undefined>(storage.capacity).fill(undefined),
      count: 0,
    };
    this.logger.debug({ capacity: storage.capacity }, 'collection created');
  }

  /**
   * Collection of plain values copied with structuredClone.
   * InvalidArgument unless capacity is a positive integer; OutOfMemory if the
   * header or buffer cannot be reserved.
   */
  static withCapacity<T>(
    context: LibraryContext,
    capacity: number
  ): Result<FixedCapacityCollection<T, T, T>, LibraryError> {
    return FixedCapacityCollection.withPolicy(context, capacity, valuePolicy<T>());
  }

  static withPolicy<TIn, TStored, TOut>(
    context: LibraryContext,
    capacity: number,
    policy: ElementPolicy<TIn, TStored, TOut>
  ): Result<FixedCapacityCollection<TIn, TStored, TOut>, LibraryError> {
    const label = 'FixedCapacityCollection';
    return context.register.record(
      allocateStorage(context, capacity, policy.slotBytes, `${label}.create`).map(
        (storage) => new FixedCapacityCollection(context, storage, policy, label)
      )
    );
  }

  get isReleased(): boolean {
    return this.state.kind === 'released';
  }

  /** @returns the slot index the item was stored at */
  append(item: TIn | null | undefined): Result<number, LibraryError> {
    return this.context.register.record(this.tryAppend(item));
  }

  get(index: number): Result<TOut, LibraryError> {
    return this.context.register.record(this.peek(index, this.operation('get')));
  }

  /** Stored element count. A released handle reads as 0 and records NullReference. */
  size(): number {
    const state = this.state;
    if (state.kind === 'released') {
      this.context.register.record(err(Err.nullReference(this.operation('size'), 'collection')));
      return 0;
    }
    this.context.register.setError('Success');
    return state.count;
  }

  /**
   * Give back every element, then the buffer, then the container.
   * The handle is absent afterwards; a second call records NullReference and frees nothing.
   */
  release(): Result<void, LibraryError> {
    return this.context.register.record(this.teardown(this.operation('release')));
  }

  // ═══════════════════════════════════════════════════════════════════
  // Unrecorded building blocks for specializations
  // ═══════════════════════════════════════════════════════════════════

  protected operation(name: string): string {
    return `${this.label}.${name}`;
  }

  protected tryAppend(item: TIn | null | undefined): Result<number, LibraryError> {
    const operation = this.operation('append');
    const state = this.state;
    if (state.kind === 'released') return err(Err.nullReference(operation, 'collection'));
    if (item === null || item === undefined) return err(Err.nullReference(operation, 'item'));

    if (state.count >= this.capacity) {
      this.logger.warn({ capacity: this.capacity }, 'append rejected: collection full');
      return err(Err.indexOutOfBounds(operation, state.count, this.capacity));
    }

    const adopted = this.policy.adopt(item, this.context.allocator, operation);
    if (adopted.isErr()) {
      this.logger.warn({ err: adopted.error, count: state.count }, 'append rejected: element not copied');
      return err(adopted.error);
    }

    const index = state.count;
    state.slots[index] = adopted.value;
    state.count = index + 1;
    return ok(index);
  }

  protected peek(index: number, operation: string): Result<TOut, LibraryError> {
    const state = this.state;
    if (state.kind === 'released') return err(Err.nullReference(operation, 'collection'));
    if (!Number.isInteger(index) || index < 0 || index >= state.count) {
      return err(Err.indexOutOfBounds(operation, index, state.count));
    }

    const stored = state.slots[index];
    if (stored === undefined) return err(Err.indexOutOfBounds(operation, index, state.count));
    return ok(this.policy.view(stored));
  }

  /** Views of every stored element, in slot order. */
  protected elements(operation: string): Result<readonly TOut[], LibraryError> {
    const state = this.state;
    if (state.kind === 'released') return err(Err.nullReference(operation, 'collection'));

    const views: TOut[] = [];
    for (let i = 0; i < state.count; i++) {
      const stored = state.slots[i];
      if (stored !== undefined) views.push(this.policy.view(stored));
    }
    return ok(views);
  }

  protected teardown(operation: string): Result<void, LibraryError> {
    const state = this.state;
    if (state.kind === 'released') return err(Err.nullReference(operation, 'collection'));

    const { allocator } = this.context;
    let disposed = 0;
    for (let i = 0; i < state.count; i++) {
      const stored = state.slots[i];
      // An empty slot is skipped; the remaining tiers still run.
      if (stored !== undefined) {
        this.policy.dispose(stored, allocator);
        disposed++;
      }
      state.slots[i] = undefined;
    }
    allocator.release(state.storage.buffer);
    allocator.release(state.storage.container);

    this.state = { kind: 'released' };
    this.logger.debug({ disposed }, 'collection released');
    return ok(undefined);
  }
}
