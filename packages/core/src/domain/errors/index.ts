export { RowsiftError, IOError, EmptyStreamError, MalformedQuotingError, DuplicateHeaderError, ConfigurationError } from './RowsiftError.js';
export type { RowsiftErrorCode } from './RowsiftError.js';
