/**
 * Generic JSON value tree helpers
 *
 * The tokenizer is lossless-json, so integers beyond 2^53 keep every digit.
 * This module adapts it to DecodeResult and provides the structural checks
 * the decoders share.
 */

import { isInteger, parse, stringify } from 'lossless-json';
import { fail, invalidJson, ok, type DecodeResult } from './errors.js';
import type { JsonObject, JsonValue } from './types/jsonrpc.js';

/**
 * Number leaves: safe integers and non-integers become `number`, any other
 * integer becomes `bigint`.
 */
export function parseNumber(text: string): number | bigint {
  if (isInteger(text)) {
    const value = Number(text);
    return Number.isSafeInteger(value) ? value : BigInt(text);
  }
  return parseFloat(text);
}

function isJsonValue(value: unknown): value is JsonValue {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'bigint':
      return true;
    case 'object':
      if (value === null) {
        return true;
      }
      return Array.isArray(value) ? value.every(isJsonValue) : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Parse raw text into a generic value tree.
 * Syntax failures carry the parser's diagnostic verbatim.
 */
export function parseJson(raw: string): DecodeResult<JsonValue> {
  let value: unknown;
  try {
    value = parse(raw, undefined, parseNumber);
  } catch (error) {
    return fail(invalidJson(error instanceof Error ? error.message : String(error)));
  }
  return isJsonValue(value) ? ok(value) : fail(invalidJson('unsupported value in document'));
}

/**
 * Compact JSON text. `bigint` leaves are written as plain integer literals.
 */
export function stringifyJson(value: JsonValue): string {
  const text = stringify(value);
  if (text === undefined) {
    throw new TypeError('Value has no JSON representation');
  }
  return text;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Own-property lookup. Inherited names such as `toString` are never fields.
 */
export function getField(obj: JsonObject, name: string): JsonValue | undefined {
  return Object.prototype.hasOwnProperty.call(obj, name) ? obj[name] : undefined;
}

export function hasField(obj: JsonObject, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, name);
}

/**
 * Deep copy of a value tree.
 *
 * Object.fromEntries defines keys as own data properties, so a `__proto__`
 * key stays an ordinary entry.
 */
export function cloneJson(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(cloneJson);
  }
  if (isJsonObject(value)) {
    return cloneObject(value);
  }
  return value;
}

export function cloneObject(obj: JsonObject): JsonObject {
  return Object.fromEntries(Object.entries(obj).map(([key, item]): [string, JsonValue] => [key, cloneJson(item)]));
}
