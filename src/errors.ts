/**
 * Decode failure taxonomy and thrown error types
 *
 * Decoders return DecodeError values; they never throw. The class hierarchy
 * below is for callers that want host-native exceptions (see bridge.ts).
 */

import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { JSONRPC_VERSION, type ExpectedType, type FieldName } from './constants.js';
import type { JsonObject } from './types/jsonrpc.js';

export type DecodeError =
  | { readonly kind: 'invalid_json'; readonly diagnostic: string }
  | { readonly kind: 'invalid_version'; readonly found: string }
  | { readonly kind: 'missing_field'; readonly field: FieldName }
  | { readonly kind: 'invalid_field_type'; readonly field: FieldName; readonly expected: ExpectedType }
  | { readonly kind: 'invalid_identifier' };

export type DecodeErrorKind = DecodeError['kind'];

export type DecodeResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: DecodeError };

export function ok<T>(value: T): DecodeResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: DecodeError): DecodeResult<T> {
  return { ok: false, error };
}

export const invalidJson = (diagnostic: string): DecodeError => ({ kind: 'invalid_json', diagnostic });

export const invalidVersion = (found: string): DecodeError => ({ kind: 'invalid_version', found });

export const missingField = (field: FieldName): DecodeError => ({ kind: 'missing_field', field });

export const invalidFieldType = (field: FieldName, expected: ExpectedType): DecodeError => ({
  kind: 'invalid_field_type',
  field,
  expected,
});

export const invalidIdentifier = (): DecodeError => ({ kind: 'invalid_identifier' });

/**
 * Human-readable message for a decode failure.
 *
 * The wording for missing_field and invalid_field_type is relied on by
 * callers; invalid_json embeds the parser's own text, which varies.
 */
export function describeDecodeError(error: DecodeError): string {
  switch (error.kind) {
    case 'invalid_json':
      return `Invalid JSON: ${error.diagnostic}`;
    case 'invalid_version':
      return `Invalid JSON-RPC version: expected '${JSONRPC_VERSION}', got '${error.found}'`;
    case 'missing_field':
      return `Missing required field: ${error.field}`;
    case 'invalid_field_type':
      return `Invalid field type for '${error.field}': expected ${error.expected}`;
    case 'invalid_identifier':
      return 'Invalid request ID: must be string, number, or null';
  }
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data: JsonObject;
}

/**
 * Map a decode failure onto the JSON-RPC error object a gateway sends back.
 *
 * Syntax failures are Parse errors; every structural failure is an
 * Invalid Request.
 */
export function toJsonRpcError(error: DecodeError): JsonRpcErrorObject {
  const code = error.kind === 'invalid_json' ? ErrorCode.ParseError : ErrorCode.InvalidRequest;
  const data: JsonObject = { kind: error.kind };

  switch (error.kind) {
    case 'invalid_version':
      data.found = error.found;
      break;
    case 'missing_field':
      data.field = error.field;
      break;
    case 'invalid_field_type':
      data.field = error.field;
      data.expected = error.expected;
      break;
  }

  return { code, message: describeDecodeError(error), data };
}

export class GatewayError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

/**
 * Thrown form of a DecodeError
 */
export class ParseError extends GatewayError {
  constructor(public readonly decodeError: DecodeError) {
    super(describeDecodeError(decodeError), 'PARSE_ERROR', { ...decodeError });
    this.name = 'ParseError';
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

/**
 * Helper function to get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isGatewayError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}
