/**
 * Request decoder
 *
 * Validation runs in a fixed order and stops at the first violation:
 * JSON syntax, object shape, `jsonrpc`, its value, `id`, `method`, `params`.
 * The order is what makes diagnostics deterministic.
 */

import { EXPECTED, FIELD, JSONRPC_VERSION } from './constants.js';
import { checkEnvelope, parseEnvelope } from './envelope.js';
import { fail, invalidFieldType, missingField, ok, type DecodeResult } from './errors.js';
import { decodeIdentifier } from './identifier.js';
import { cloneObject, getField, hasField, isJsonObject } from './json-value.js';
import type { JsonObject, JsonRpcRequest, JsonValue } from './types/jsonrpc.js';

export function decodeRequest(raw: string): DecodeResult<JsonRpcRequest> {
  const envelope = parseEnvelope(raw);
  if (!envelope.ok) return envelope;
  return decodeRequestFields(envelope.value);
}

/**
 * Decode a request from an already-parsed value tree
 */
export function decodeRequestValue(value: JsonValue): DecodeResult<JsonRpcRequest> {
  const envelope = checkEnvelope(value);
  if (!envelope.ok) return envelope;
  return decodeRequestFields(envelope.value);
}

function decodeRequestFields(obj: JsonObject): DecodeResult<JsonRpcRequest> {
  // Any JSON type satisfies presence, including null
  if (!hasField(obj, FIELD.ID)) {
    return fail(missingField(FIELD.ID));
  }
  const id = decodeIdentifier(obj[FIELD.ID]);
  if (!id.ok) return id;

  const method = getField(obj, FIELD.METHOD);
  if (typeof method !== 'string') {
    return fail(missingField(FIELD.METHOD));
  }

  const params = getField(obj, FIELD.PARAMS);
  if (params === undefined || params === null) {
    return ok({ protocolVersion: JSONRPC_VERSION, id: id.value, method });
  }
  if (!isJsonObject(params)) {
    return fail(invalidFieldType(FIELD.PARAMS, EXPECTED.OBJECT_OR_NULL));
  }

  return ok({
    protocolVersion: JSONRPC_VERSION,
    id: id.value,
    method,
    params: cloneObject(params),
  });
}
