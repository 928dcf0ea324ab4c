/**
 * Extension points passed by reference into the buffer hooks.
 */

/** Caller-owned, index-addressable storage: arrays and typed arrays alike. */
export interface IndexableBuffer<T> {
  [index: number]: T;
  readonly length: number;
}

/** Total order: negative when a sorts first, zero on a tie, positive otherwise. */
export interface Comparator<T> {
  compare(a: T, b: T): number;
}

export interface ProgressObserver {
  /** Called once per processed element with a fraction in (0, 1]. */
  onProgress(fraction: number): void;
}

export type ElementTransform = (value: number, index: number) => number;

export function comparing<T>(compare: (a: T, b: T) => number): Comparator<T> {
  return { compare };
}

export function observing(onProgress: (fraction: number) => void): ProgressObserver {
  return { onProgress };
}
