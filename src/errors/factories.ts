import type { AllocationPurpose } from '../ports/allocator.port.js';
import type { ConfigInvalidError, ConfigIssue } from './app-error.js';
import type {
  DivisionByZeroError,
  IndexOutOfBoundsError,
  InvalidArgumentError,
  NullReferenceError,
  OutOfMemoryError,
  ParseFailedError,
} from './library-error.js';

export const Err = {
  nullReference: (operation: string, argument: string): NullReferenceError => ({
    _tag: 'NullReference',
    operation,
    argument,
    message: `${operation}: required argument "${argument}" is absent`,
  }),

  invalidArgument: (
    operation: string,
    argument: string,
    value: string,
    expected: string
  ): InvalidArgumentError => ({
    _tag: 'InvalidArgument',
    operation,
    argument,
    value,
    expected,
    message: `${operation}: invalid ${argument} (${value}). Expected: ${expected}`,
  }),

  divisionByZero: (operation: string, dividend: number): DivisionByZeroError => ({
    _tag: 'DivisionByZero',
    operation,
    dividend,
    message: `${operation}: cannot divide ${dividend} by zero`,
  }),

  outOfMemory: (
    operation: string,
    requestedBytes: number,
    availableBytes: number | null,
    purpose: AllocationPurpose
  ): OutOfMemoryError => ({
    _tag: 'OutOfMemory',
    operation,
    requestedBytes,
    availableBytes,
    purpose,
    message: availableBytes === null
      ? `${operation}: cannot allocate ${requestedBytes} bytes for ${purpose}`
      : `${operation}: cannot allocate ${requestedBytes} bytes for ${purpose} (${availableBytes} available)`,
  }),

  indexOutOfBounds: (operation: string, index: number, bound: number): IndexOutOfBoundsError => ({
    _tag: 'IndexOutOfBounds',
    operation,
    index,
    bound,
    message: `${operation}: index ${index} is out of bounds (bound ${bound})`,
  }),

  parseFailed: (operation: string, input: string, consumed: number): ParseFailedError => ({
    _tag: 'ParseError',
    operation,
    input,
    consumed,
    message: `${operation}: could not parse "${input}" (stopped after ${consumed} characters)`,
  }),

  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),
} as const;
