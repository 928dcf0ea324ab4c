/**
 * Library Errors - Discriminated Unions
 *
 * Errors are data, not exceptions. One member per failure kind; every member
 * names the public operation that produced it.
 */

import type { AllocationPurpose } from '../ports/allocator.port.js';

export type LibraryError =
  | NullReferenceError
  | InvalidArgumentError
  | DivisionByZeroError
  | OutOfMemoryError
  | IndexOutOfBoundsError
  | ParseFailedError;

export interface NullReferenceError {
  readonly _tag: 'NullReference';
  readonly operation: string;
  readonly argument: string;
  readonly message: string;
}

export interface InvalidArgumentError {
  readonly _tag: 'InvalidArgument';
  readonly operation: string;
  readonly argument: string;
  readonly value: string;
  readonly expected: string;
  readonly message: string;
}

export interface DivisionByZeroError {
  readonly _tag: 'DivisionByZero';
  readonly operation: string;
  readonly dividend: number;
  readonly message: string;
}

export interface OutOfMemoryError {
  readonly _tag: 'OutOfMemory';
  readonly operation: string;
  readonly requestedBytes: number;
  /** Remaining budget at the time of the request; null when unbounded. */
  readonly availableBytes: number | null;
  readonly purpose: AllocationPurpose;
  readonly message: string;
}

export interface IndexOutOfBoundsError {
  readonly _tag: 'IndexOutOfBounds';
  readonly operation: string;
  readonly index: number;
  readonly bound: number;
  readonly message: string;
}

export interface ParseFailedError {
  readonly _tag: 'ParseError';
  readonly operation: string;
  readonly input: string;
  /** Length of the longest prefix that parsed. */
  readonly consumed: number;
  readonly message: string;
}
