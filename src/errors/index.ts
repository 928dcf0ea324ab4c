export type { AppError, ConfigIssue, ConfigInvalidError, ValidatedAppConfig } from './app-error.js';
export type {
  LibraryError,
  NullReferenceError,
  InvalidArgumentError,
  DivisionByZeroError,
  OutOfMemoryError,
  IndexOutOfBoundsError,
  ParseFailedError,
} from './library-error.js';
export type { ErrorKind, ErrorCode, FailureKind } from './error-kind.js';
export {
  ERROR_KINDS,
  ERROR_CODES,
  UNKNOWN_ERROR_MESSAGE,
  errorMessage,
  errorKindFromCode,
  isErrorKind,
} from './error-kind.js';
export { Err } from './factories.js';
export { formatLibraryError, formatAppError } from './formatter.js';
