import { err, ok, type Result } from 'neverthrow';
import type { LibraryContext } from '../core/library-context.js';
import type { LibraryError } from '../errors/library-error.js';
import { Err } from '../errors/factories.js';

// Longest valid prefix: leading whitespace, optional sign, then the number.
const INTEGER_PREFIX = /^\s*[+-]?\d+/;
const DECIMAL_PREFIX = /^\s*[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;

export const MAX_PRECISION = 10;

function parseWhole(
  operation: string,
  text: string | null | undefined,
  prefix: RegExp,
  accept: (value: number) => boolean
): Result<number, LibraryError> {
  if (text === null || text === undefined) return err(Err.nullReference(operation, 'text'));

  const match = prefix.exec(text);
  const consumed = match === null ? 0 : match[0].length;
  if (match === null || consumed !== text.length) {
    return err(Err.parseFailed(operation, text, consumed));
  }

  const value = Number(match[0]);
  return accept(value) ? ok(value) : err(Err.parseFailed(operation, text, consumed));
}

/**
 * Base-10 integer. The whole input must be consumed; values outside the
 * safe-integer range are a ParseError.
 */
export function parseInteger(context: LibraryContext, text: string | null | undefined): Result<number, LibraryError> {
  return context.register.record(parseWhole('parseInteger', text, INTEGER_PREFIX, Number.isSafeInteger));
}

export function parseDecimal(context: LibraryContext, text: string | null | undefined): Result<number, LibraryError> {
  return context.register.record(parseWhole('parseDecimal', text, DECIMAL_PREFIX, Number.isFinite));
}

export function formatDecimal(context: LibraryContext, value: number, precision: number): Result<string, LibraryError> {
  const valid = Number.isInteger(precision) && precision >= 0 && precision <= MAX_PRECISION;
  return context.register.record(
    valid
      ? ok(value.toFixed(precision))
      : err(Err.invalidArgument('formatDecimal', 'precision', String(precision), `an integer from 0 to ${MAX_PRECISION}`))
  );
}
