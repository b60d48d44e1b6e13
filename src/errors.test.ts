/**
 * Tests for decode error utilities
 */

import { describe, it, expect } from 'vitest';
import {
  describeDecodeError,
  toJsonRpcError,
  ParseError,
  ConfigurationError,
  GatewayError,
  isGatewayError,
  getErrorDetails,
  invalidFieldType,
  invalidIdentifier,
  invalidJson,
  invalidVersion,
  missingField,
} from './errors.js';
import { EXPECTED, FIELD } from './constants.js';

describe('describeDecodeError', () => {
  it('names the missing field precisely', () => {
    expect(describeDecodeError(missingField(FIELD.METHOD))).toBe('Missing required field: method');
    expect(describeDecodeError(missingField(FIELD.ERROR_CODE))).toBe('Missing required field: error.code');
  });

  it('names the field and expected type for type errors', () => {
    expect(describeDecodeError(invalidFieldType(FIELD.PARAMS, EXPECTED.OBJECT_OR_NULL))).toBe(
      "Invalid field type for 'params': expected object or null"
    );
  });

  it('includes the offending version', () => {
    expect(describeDecodeError(invalidVersion('1.0'))).toBe(
      "Invalid JSON-RPC version: expected '2.0', got '1.0'"
    );
  });

  it('wraps the parser diagnostic', () => {
    expect(describeDecodeError(invalidJson('expected object'))).toBe('Invalid JSON: expected object');
  });

  it('describes invalid identifiers', () => {
    expect(describeDecodeError(invalidIdentifier())).toBe(
      'Invalid request ID: must be string, number, or null'
    );
  });
});

describe('toJsonRpcError', () => {
  it('maps syntax failures to Parse error', () => {
    expect(toJsonRpcError(invalidJson('Unexpected end of JSON input'))).toEqual({
      code: -32700,
      message: 'Invalid JSON: Unexpected end of JSON input',
      data: { kind: 'invalid_json' },
    });
  });

  it('maps structural failures to Invalid Request with context', () => {
    expect(toJsonRpcError(missingField(FIELD.ID))).toEqual({
      code: -32600,
      message: 'Missing required field: id',
      data: { kind: 'missing_field', field: 'id' },
    });
    expect(toJsonRpcError(invalidVersion('3.0'))).toEqual({
      code: -32600,
      message: "Invalid JSON-RPC version: expected '2.0', got '3.0'",
      data: { kind: 'invalid_version', found: '3.0' },
    });
    expect(toJsonRpcError(invalidFieldType(FIELD.PARAMS, EXPECTED.OBJECT_OR_NULL))).toEqual({
      code: -32600,
      message: "Invalid field type for 'params': expected object or null",
      data: { kind: 'invalid_field_type', field: 'params', expected: 'object or null' },
    });
    expect(toJsonRpcError(invalidIdentifier()).code).toBe(-32600);
  });
});

describe('ParseError', () => {
  it('carries the decode error and its message', () => {
    const error = new ParseError(missingField(FIELD.METHOD));

    expect(error).toBeInstanceOf(GatewayError);
    expect(error.name).toBe('ParseError');
    expect(error.code).toBe('PARSE_ERROR');
    expect(error.message).toBe('Missing required field: method');
    expect(error.decodeError).toEqual({ kind: 'missing_field', field: 'method' });
    expect(error.details).toEqual({ kind: 'missing_field', field: 'method' });
  });
});

describe('getErrorDetails', () => {
  it('includes code and details for gateway errors', () => {
    const error = new ConfigurationError('Invalid LOG_FORMAT', { variable: 'LOG_FORMAT' });
    const details = getErrorDetails(error);

    expect(isGatewayError(error)).toBe(true);
    expect(details).toMatchObject({
      name: 'ConfigurationError',
      code: 'CONFIGURATION_ERROR',
      message: 'Invalid LOG_FORMAT',
      details: { variable: 'LOG_FORMAT' },
    });
  });

  it('handles plain errors and non-errors', () => {
    expect(getErrorDetails(new TypeError('bad'))).toMatchObject({ name: 'TypeError', message: 'bad' });
    expect(getErrorDetails('oops')).toEqual({ message: 'oops' });
    expect(isGatewayError(new Error('x'))).toBe(false);
  });
});
