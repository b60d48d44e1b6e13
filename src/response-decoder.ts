/**
 * Response decoders
 *
 * Unlike requests, a response with no `id` field at all decodes with a null
 * identifier. Servers answer unparseable requests that way.
 */

import { EXPECTED, FIELD, INT32, JSONRPC_VERSION } from './constants.js';
import { checkEnvelope, parseEnvelope } from './envelope.js';
import { fail, invalidFieldType, missingField, ok, type DecodeResult } from './errors.js';
import { NULL_ID, decodeIdentifier } from './identifier.js';
import { cloneJson, getField, hasField, isJsonObject } from './json-value.js';
import { decodeRequestValue } from './request-decoder.js';
import type {
  ErrorData,
  Identifier,
  JsonObject,
  JsonRpcErrorResponse,
  JsonRpcMessage,
  JsonRpcResponse,
} from './types/jsonrpc.js';

export function decodeResponse(raw: string): DecodeResult<JsonRpcResponse> {
  const envelope = parseEnvelope(raw);
  if (!envelope.ok) return envelope;
  return decodeResponseFields(envelope.value);
}

export function decodeErrorResponse(raw: string): DecodeResult<JsonRpcErrorResponse> {
  const envelope = parseEnvelope(raw);
  if (!envelope.ok) return envelope;
  return decodeErrorResponseFields(envelope.value);
}

/**
 * Decode any single message, classified by which payload field it carries:
 * `method` first, then `result`, then `error`.
 */
export function decodeMessage(raw: string): DecodeResult<JsonRpcMessage> {
  const envelope = parseEnvelope(raw);
  if (!envelope.ok) return envelope;
  const obj = envelope.value;

  if (hasField(obj, FIELD.METHOD)) {
    const request = decodeRequestValue(obj);
    return request.ok ? ok<JsonRpcMessage>({ type: 'request', message: request.value }) : request;
  }
  if (hasField(obj, FIELD.RESULT)) {
    const response = decodeResponseFields(obj);
    return response.ok ? ok<JsonRpcMessage>({ type: 'response', message: response.value }) : response;
  }
  if (hasField(obj, FIELD.ERROR)) {
    const errorResponse = decodeErrorResponseFields(obj);
    return errorResponse.ok ? ok<JsonRpcMessage>({ type: 'error', message: errorResponse.value }) : errorResponse;
  }
  return fail(missingField(FIELD.METHOD));
}

function decodeOptionalId(obj: JsonObject): DecodeResult<Identifier> {
  return hasField(obj, FIELD.ID) ? decodeIdentifier(obj[FIELD.ID]) : ok(NULL_ID);
}

function decodeResponseFields(obj: JsonObject): DecodeResult<JsonRpcResponse> {
  const id = decodeOptionalId(obj);
  if (!id.ok) return id;

  // Any JSON type is a valid result, null included
  if (!hasField(obj, FIELD.RESULT)) {
    return fail(missingField(FIELD.RESULT));
  }

  return ok({
    protocolVersion: JSONRPC_VERSION,
    id: id.value,
    result: cloneJson(obj[FIELD.RESULT]),
  });
}

function decodeErrorResponseFields(obj: JsonObject): DecodeResult<JsonRpcErrorResponse> {
  const id = decodeOptionalId(obj);
  if (!id.ok) return id;

  const error = getField(obj, FIELD.ERROR);
  if (error === undefined) {
    return fail(missingField(FIELD.ERROR));
  }
  if (!isJsonObject(error)) {
    return fail(invalidFieldType(FIELD.ERROR, EXPECTED.OBJECT));
  }

  const code = getField(error, 'code');
  if (code === undefined) {
    return fail(missingField(FIELD.ERROR_CODE));
  }
  if (!isInt32(code)) {
    return fail(invalidFieldType(FIELD.ERROR_CODE, EXPECTED.INT32));
  }

  const message = getField(error, 'message');
  if (typeof message !== 'string') {
    return fail(missingField(FIELD.ERROR_MESSAGE));
  }

  const data = getField(error, 'data');
  const errorData: ErrorData = data === undefined
    ? { code, message }
    : { code, message, data: cloneJson(data) };

  return ok({ protocolVersion: JSONRPC_VERSION, id: id.value, error: errorData });
}

function isInt32(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= INT32.MIN && value <= INT32.MAX;
}
