import { ok, type Result } from 'neverthrow';
import type { LibraryContext } from '../core/library-context.js';
import type { LibraryError } from '../errors/library-error.js';
import type { ElementPolicy } from './element-policy.js';
import { FixedCapacityCollection, allocateStorage, type CollectionStorage } from './fixed-capacity-collection.js';

/** Two-dimensional point record. Field order is part of the published layout. */
export interface Point2D {
  readonly x: number;
  readonly y: number;
}

export const POINT2D_FIELDS = ['x', 'y'] as const satisfies readonly (keyof Point2D)[];

/** Two float64 coordinates. */
export const POINT2D_BYTES = 16;

const pointPolicy: ElementPolicy<Point2D, Point2D, Point2D> = {
  slotBytes: POINT2D_BYTES,
  adopt: (point) => ok(Object.freeze({ x: point.x, y: point.y })),
  view: (stored) => stored,
  dispose: () => undefined,
};

/**
 * Points held by value. `get` returns the stored record itself (frozen), not a copy.
 */
export class OwnedRecordCollection extends FixedCapacityCollection<Point2D> {
  private constructor(context: LibraryContext, storage: CollectionStorage) {
    super(context, storage, pointPolicy, 'OwnedRecordCollection');
  }

  static create(context: LibraryContext, capacity: number): Result<OwnedRecordCollection, LibraryError> {
    return context.register.record(
      allocateStorage(context, capacity, POINT2D_BYTES, 'OwnedRecordCollection.create').map(
        (storage) => new OwnedRecordCollection(context, storage)
      )
    );
  }

  /** Euclidean distance between the points stored at `from` and `to`. */
  distance(from: number, to: number): Result<number, LibraryError> {
    const operation = this.operation('distance');
    return this.context.register.record(
      this.peek(from, operation).andThen((a) =>
        this.peek(to, operation).map((b) => Math.hypot(b.x - a.x, b.y - a.y))
      )
    );
  }
}
