/**
 * Identifier decoding
 *
 * Precedence is explicit: string, then integer number, then null. Anything
 * else (boolean, array, object, fractional or out-of-range number) is
 * rejected rather than coerced.
 */

import { INT64 } from './constants.js';
import { fail, invalidIdentifier, ok, type DecodeResult } from './errors.js';
import type { Identifier, JsonValue } from './types/jsonrpc.js';

export const NULL_ID: Identifier = Object.freeze({ kind: 'null' });

export function decodeIdentifier(value: JsonValue): DecodeResult<Identifier> {
  if (typeof value === 'string') {
    return ok<Identifier>({ kind: 'string', value });
  }
  if (typeof value === 'number') {
    if (Number.isSafeInteger(value)) {
      return ok<Identifier>({ kind: 'number', value });
    }
    return Number.isInteger(value) ? decodeBigIntIdentifier(BigInt(value)) : fail(invalidIdentifier());
  }
  if (typeof value === 'bigint') {
    return decodeBigIntIdentifier(value);
  }
  if (value === null) {
    return ok(NULL_ID);
  }
  return fail(invalidIdentifier());
}

// Canonical form: `number` whenever the value is safe, so equal ids compare equal.
function decodeBigIntIdentifier(value: bigint): DecodeResult<Identifier> {
  if (value < INT64.MIN || value > INT64.MAX) {
    return fail(invalidIdentifier());
  }
  const asNumber = Number(value);
  return ok<Identifier>({ kind: 'number', value: Number.isSafeInteger(asNumber) ? asNumber : value });
}

/**
 * Wire form of an identifier
 */
export function identifierToJson(id: Identifier): string | number | bigint | null {
  switch (id.kind) {
    case 'string':
      return id.value;
    case 'number':
      return id.value;
    case 'null':
      return null;
  }
}

export function identifiersEqual(a: Identifier, b: Identifier): boolean {
  if (a.kind === 'null' || b.kind === 'null') {
    return a.kind === b.kind;
  }
  return a.kind === b.kind && a.value === b.value;
}
