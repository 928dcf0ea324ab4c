import type { AppError } from './app-error.js';
import type { LibraryError } from './library-error.js';
import { ERROR_CODES, errorMessage } from './error-kind.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatLibraryError(error: LibraryError): string {
  const headline = `${errorMessage(error._tag)} [${ERROR_CODES[error._tag]}] ${error.message}`;

  switch (error._tag) {
    case 'NullReference':
      return `${headline}\n  argument: ${error.argument}`;

    case 'InvalidArgument':
      return `${headline}\n  argument: ${error.argument}\n  value: ${error.value}`;

    case 'DivisionByZero':
      return `${headline}\n  dividend: ${error.dividend}`;

    case 'OutOfMemory': {
      const available = error.availableBytes === null ? 'unbounded' : String(error.availableBytes);
      return `${headline}\n  requested: ${error.requestedBytes} bytes (${error.purpose})\n  available: ${available}`;
    }

    case 'IndexOutOfBounds':
      return `${headline}\n  index: ${error.index}\n  bound: ${error.bound}`;

    case 'ParseError':
      return `${headline}\n  consumed: ${error.consumed} of ${error.input.length} characters`;

    default:
      return assertNever(error);
  }
}

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    default:
      return assertNever(error._tag);
  }
}
