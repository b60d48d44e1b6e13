/**
 * JSON-RPC admission filter and method predicates
 *
 * isValidJsonRpc is a cheap gate in front of the full decoders. It answers
 * "plausibly JSON-RPC 2.0" with a boolean and never reports why.
 */

import { FAST_REJECT_MARKERS, FIELD, JSONRPC_VERSION } from './constants.js';
import { getField, isJsonObject, parseJson } from './json-value.js';
import type { JsonRpcRequest } from './types/jsonrpc.js';

/**
 * Check whether raw text is plausibly a JSON-RPC 2.0 message.
 *
 * Step one is a plain substring scan for `"jsonrpc"` and `"2.0"`; only when
 * both appear is the text parsed and the top-level marker compared.
 *
 * Known precision gap: the scan is not JSON-aware. Markers inside unrelated
 * nested strings let text through to the parse, and a passing message may
 * still lack `id`, `method` or `result` (`{"jsonrpc":"2.0"}` passes).
 * An escaped marker such as `"2\u002e0"` is rejected by the scan.
 */
export function isValidJsonRpc(raw: string): boolean {
  for (const marker of FAST_REJECT_MARKERS) {
    if (!raw.includes(marker)) return false;
  }

  const parsed = parseJson(raw);
  if (!parsed.ok || !isJsonObject(parsed.value)) return false;

  return getField(parsed.value, FIELD.JSONRPC) === JSONRPC_VERSION;
}

/**
 * Check if request is an initialize request
 */
export function isInitializeRequest(request: JsonRpcRequest): boolean {
  return request.method === 'initialize';
}

/**
 * Check if request is a tool call request
 */
export function isToolCallRequest(request: JsonRpcRequest): boolean {
  return request.method === 'tools/call';
}

/**
 * Check if request is a tools/list request
 */
export function isToolsListRequest(request: JsonRpcRequest): boolean {
  return request.method === 'tools/list';
}
