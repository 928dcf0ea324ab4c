/**
 * Error kinds recorded by the error register.
 *
 * Order, names and codes are a published contract: generated bindings key off
 * them, so new kinds are appended and existing ones are never renumbered.
 */
export const ERROR_KINDS = [
  'Success',
  'NullReference',
  'InvalidArgument',
  'DivisionByZero',
  'OutOfMemory',
  'IndexOutOfBounds',
  'ParseError',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/** Kinds a failed operation can report (everything except Success). */
export type FailureKind = Exclude<ErrorKind, 'Success'>;

export const ERROR_CODES = {
  Success: 0,
  NullReference: -1,
  InvalidArgument: -2,
  DivisionByZero: -3,
  OutOfMemory: -4,
  IndexOutOfBounds: -5,
  ParseError: -6,
} as const satisfies Record<ErrorKind, number>;

export type ErrorCode = (typeof ERROR_CODES)[ErrorKind];

const ERROR_MESSAGES: Readonly<Record<ErrorKind, string>> = {
  Success: 'Success',
  NullReference: 'Null reference',
  InvalidArgument: 'Invalid argument',
  DivisionByZero: 'Division by zero',
  OutOfMemory: 'Out of memory',
  IndexOutOfBounds: 'Index out of bounds',
  ParseError: 'Parse error',
};

export const UNKNOWN_ERROR_MESSAGE = 'Unknown error';

export function isErrorKind(value: unknown): value is ErrorKind {
  return ERROR_KINDS.some((kind) => kind === value);
}

export function errorKindFromCode(code: number): ErrorKind | undefined {
  return ERROR_KINDS.find((kind) => ERROR_CODES[kind] === code);
}

/**
 * Fixed human-readable message for a kind name or numeric code.
 * Total: anything outside the enumeration maps to "Unknown error".
 */
export function errorMessage(kind: string | number): string {
  const resolved = typeof kind === 'number' ? errorKindFromCode(kind) : kind;
  return isErrorKind(resolved) ? ERROR_MESSAGES[resolved] : UNKNOWN_ERROR_MESSAGE;
}
