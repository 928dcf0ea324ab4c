import type { Result } from 'neverthrow';
import type { LibraryError } from '../errors/library-error.js';
import { errorMessage, type ErrorKind } from '../errors/error-kind.js';

/**
 * Last-operation status slot.
 *
 * One register per LibraryContext, never process-wide. Every public operation
 * writes it exactly once before returning, success included, so a failure
 * from an earlier call is never visible after a later success.
 *
 * Callers that consume the returned Result never need to read it; it exists
 * for callers that only check status after the fact.
 */
export class ErrorRegister {
  private current: ErrorKind = 'Success';
  private failure: LibraryError | null = null;

  static message(kind: string | number): string {
    return errorMessage(kind);
  }

  setError(kind: ErrorKind): void {
    this.current = kind;
    if (kind === 'Success') this.failure = null;
  }

  lastError(): ErrorKind {
    return this.current;
  }

  /** Detail of the failure behind `lastError()`; null after a success. */
  lastFailure(): LibraryError | null {
    return this.failure;
  }

  record<T>(result: Result<T, LibraryError>): Result<T, LibraryError> {
    if (result.isErr()) {
      this.current = result.error._tag;
      this.failure = result.error;
    } else {
      this.setError('Success');
    }
    return result;
  }
}
