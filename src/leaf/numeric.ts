import { err, ok, type Result } from 'neverthrow';
import type { LibraryContext } from '../core/library-context.js';
import type { LibraryError } from '../errors/library-error.js';
import { Err } from '../errors/factories.js';

export function divide(context: LibraryContext, dividend: number, divisor: number): Result<number, LibraryError> {
  return context.register.record(
    divisor === 0 ? err(Err.divisionByZero('divide', dividend)) : ok(dividend / divisor)
  );
}

export function squareRoot(context: LibraryContext, value: number): Result<number, LibraryError> {
  return context.register.record(
    value < 0
      ? err(Err.invalidArgument('squareRoot', 'value', String(value), 'a non-negative number'))
      : ok(Math.sqrt(value))
  );
}
