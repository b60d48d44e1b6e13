/**
 * All-or-nothing batch decoding
 *
 * Inputs are decoded strictly in order and the first failure ends the
 * batch, so "which input failed" is always the lowest failing index.
 */

import type { DecodeError, DecodeResult } from './errors.js';
import { decodeRequest } from './request-decoder.js';
import type { JsonRpcRequest } from './types/jsonrpc.js';

export type BatchDecodeResult =
  | { readonly ok: true; readonly value: JsonRpcRequest[] }
  | { readonly ok: false; readonly error: DecodeError; readonly index: number };

/**
 * Decode every input as a request.
 *
 * On failure only the error and the index of the failing input are
 * returned; requests decoded before it are discarded.
 */
export function decodeRequestBatch(inputs: Iterable<string>): BatchDecodeResult {
  const requests: JsonRpcRequest[] = [];
  let index = 0;

  for (const input of inputs) {
    const result: DecodeResult<JsonRpcRequest> = decodeRequest(input);
    if (!result.ok) {
      return { ok: false, error: result.error, index };
    }
    requests.push(result.value);
    index++;
  }

  return { ok: true, value: requests };
}
