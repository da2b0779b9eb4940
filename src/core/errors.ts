/**
 * Errors raised by the query criteria engine.
 *
 * Untrusted input (unknown or restricted field names, unparsable filter values)
 * never raises; these classes cover malformed wire dictionaries, invalid
 * construction arguments and invalid configuration.
 */

/**
 * Raised when a constructor or factory receives arguments outside its contract
 * (negative skip, empty field list, mapping to a field that does not exist)
 */
export class ArgumentError extends Error {
  readonly code = 'argument_error';
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'ArgumentError';
    this.details = details;
  }
}

/**
 * Raised when a serialized dictionary does not have the expected shape
 */
export class QueryParseError extends Error {
  readonly code = 'query_parse_error';
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'QueryParseError';
    this.details = details;
  }
}

/**
 * Raised when settings options fail validation
 */
export class ConfigurationError extends Error {
  readonly code = 'configuration_error';
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}
