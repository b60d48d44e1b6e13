/**
 * Protocol constants
 *
 * Field names are shared by the decoders and their tests so that renaming
 * a wire field is a single-point change.
 */

export const JSONRPC_VERSION = '2.0' as const;

/**
 * Wire field names used in decode diagnostics
 */
export const FIELD = {
  JSONRPC: 'jsonrpc',
  ID: 'id',
  METHOD: 'method',
  PARAMS: 'params',
  RESULT: 'result',
  ERROR: 'error',
  ERROR_CODE: 'error.code',
  ERROR_MESSAGE: 'error.message',
} as const;

export type FieldName = (typeof FIELD)[keyof typeof FIELD];

/**
 * Expected-type descriptions carried by InvalidFieldType
 */
export const EXPECTED = {
  OBJECT_OR_NULL: 'object or null',
  OBJECT: 'object',
  INT32: '32-bit integer',
} as const;

export type ExpectedType = (typeof EXPECTED)[keyof typeof EXPECTED];

/**
 * Signed 32-bit range for error codes
 */
export const INT32 = {
  MIN: -2147483648,
  MAX: 2147483647,
} as const;

/**
 * Signed 64-bit range for numeric identifiers
 */
export const INT64 = {
  MIN: -9223372036854775808n,
  MAX: 9223372036854775807n,
} as const;

/**
 * Literal substrings the fast-reject scan looks for
 */
export const FAST_REJECT_MARKERS = ['"jsonrpc"', '"2.0"'] as const;

export const DEFAULT_METRICS_PREFIX = 'mcp_envelope_';
