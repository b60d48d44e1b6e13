/**
 * Host-facing bridge
 *
 * Projects decoded records into plain objects and turns DecodeError values
 * into thrown ParseError exceptions for callers that prefer try/catch.
 * The decoders themselves never throw.
 */

import { JSONRPC_VERSION } from './constants.js';
import { ParseError, type DecodeResult } from './errors.js';
import { identifierToJson } from './identifier.js';
import { cloneJson, cloneObject } from './json-value.js';
import { decodeRequestBatch } from './batch.js';
import { decodeRequest } from './request-decoder.js';
import { decodeResponse } from './response-decoder.js';
import { isValidJsonRpc } from './jsonrpc-validator.js';
import type { Identifier, JsonObject, JsonRpcRequest, JsonRpcResponse, JsonValue } from './types/jsonrpc.js';

export interface NativeRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  id: string | number | bigint | null;
  method: string;
  params: JsonObject | null;
}

export interface NativeResponse {
  jsonrpc: typeof JSONRPC_VERSION;
  id: string | number | bigint | null;
  result: JsonValue;
}

export function toNativeId(id: Identifier): string | number | bigint | null {
  return identifierToJson(id);
}

export function toNativeRequest(request: JsonRpcRequest): NativeRequest {
  return {
    jsonrpc: request.protocolVersion,
    id: toNativeId(request.id),
    method: request.method,
    params: request.params ? cloneObject(request.params) : null,
  };
}

export function toNativeResponse(response: JsonRpcResponse): NativeResponse {
  return {
    jsonrpc: response.protocolVersion,
    id: toNativeId(response.id),
    result: cloneJson(response.result),
  };
}

function unwrap<T>(result: DecodeResult<T>): T {
  if (!result.ok) {
    throw new ParseError(result.error);
  }
  return result.value;
}

/**
 * Parse a request string, throwing ParseError on any violation
 */
export function parseRequest(input: string): NativeRequest {
  return toNativeRequest(unwrap(decodeRequest(input)));
}

/**
 * Parse a success response string, throwing ParseError on any violation
 */
export function parseResponse(input: string): NativeResponse {
  return toNativeResponse(unwrap(decodeResponse(input)));
}

/**
 * Parse several requests; throws for the first input that fails
 */
export function parseRequestsBatch(inputs: Iterable<string>): NativeRequest[] {
  const result = decodeRequestBatch(inputs);
  if (!result.ok) {
    throw new ParseError(result.error);
  }
  return result.value.map(toNativeRequest);
}

export function isValid(input: string): boolean {
  return isValidJsonRpc(input);
}
