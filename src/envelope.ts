/**
 * Envelope checks shared by every decoder: JSON syntax, top-level object,
 * and the `jsonrpc` version marker.
 */

import { FIELD, JSONRPC_VERSION } from './constants.js';
import { fail, invalidJson, invalidVersion, missingField, ok, type DecodeResult } from './errors.js';
import { getField, isJsonObject, parseJson } from './json-value.js';
import type { JsonObject, JsonValue } from './types/jsonrpc.js';

export const EXPECTED_OBJECT_DIAGNOSTIC = 'expected object';

export function parseEnvelope(raw: string): DecodeResult<JsonObject> {
  const parsed = parseJson(raw);
  if (!parsed.ok) return parsed;
  return checkEnvelope(parsed.value);
}

/**
 * Same checks as parseEnvelope for a tree that is already parsed
 */
export function checkEnvelope(value: JsonValue): DecodeResult<JsonObject> {
  if (!isJsonObject(value)) {
    return fail(invalidJson(EXPECTED_OBJECT_DIAGNOSTIC));
  }

  // A non-string marker is treated exactly like a missing one
  const version = getField(value, FIELD.JSONRPC);
  if (typeof version !== 'string') {
    return fail(missingField(FIELD.JSONRPC));
  }
  if (version !== JSONRPC_VERSION) {
    return fail(invalidVersion(version));
  }

  return ok(value);
}
