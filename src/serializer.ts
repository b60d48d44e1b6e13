/**
 * Canonical re-serialization of decoded records
 *
 * Output order is `jsonrpc`, `id`, then the payload fields. Absent optional
 * fields are omitted rather than written as null.
 */

import { FIELD } from './constants.js';
import { identifierToJson } from './identifier.js';
import { stringifyJson } from './json-value.js';
import type {
  JsonObject,
  JsonRpcErrorResponse,
  JsonRpcMessage,
  JsonRpcRequest,
  JsonRpcResponse,
} from './types/jsonrpc.js';

export function requestToJson(request: JsonRpcRequest): JsonObject {
  const json: JsonObject = {
    [FIELD.JSONRPC]: request.protocolVersion,
    [FIELD.ID]: identifierToJson(request.id),
    [FIELD.METHOD]: request.method,
  };
  if (request.params !== undefined) {
    json[FIELD.PARAMS] = request.params;
  }
  return json;
}

export function responseToJson(response: JsonRpcResponse): JsonObject {
  return {
    [FIELD.JSONRPC]: response.protocolVersion,
    [FIELD.ID]: identifierToJson(response.id),
    [FIELD.RESULT]: response.result,
  };
}

export function errorResponseToJson(response: JsonRpcErrorResponse): JsonObject {
  const error: JsonObject = {
    code: response.error.code,
    message: response.error.message,
  };
  if (response.error.data !== undefined) {
    error.data = response.error.data;
  }
  return {
    [FIELD.JSONRPC]: response.protocolVersion,
    [FIELD.ID]: identifierToJson(response.id),
    [FIELD.ERROR]: error,
  };
}

export function encodeRequest(request: JsonRpcRequest): string {
  return stringifyJson(requestToJson(request));
}

export function encodeResponse(response: JsonRpcResponse): string {
  return stringifyJson(responseToJson(response));
}

export function encodeErrorResponse(response: JsonRpcErrorResponse): string {
  return stringifyJson(errorResponseToJson(response));
}

export function encodeMessage(decoded: JsonRpcMessage): string {
  switch (decoded.type) {
    case 'request':
      return encodeRequest(decoded.message);
    case 'response':
      return encodeResponse(decoded.message);
    case 'error':
      return encodeErrorResponse(decoded.message);
  }
}
