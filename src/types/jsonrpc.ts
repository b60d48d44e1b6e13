/**
 * JSON-RPC 2.0 record types
 *
 * Decoded records are plain readonly data. They own deep copies of every
 * nested value, so they stay valid after the parsed tree is discarded.
 */

/** Integers outside the safe double range are carried as `bigint` */
export type JsonPrimitive = null | boolean | number | bigint | string;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Request/response correlation value.
 *
 * Disambiguation order when decoding: string, then integer number, then null.
 * Numbers span the signed 64-bit range: `number` inside the safe range,
 * `bigint` beyond it.
 */
export type Identifier =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'number'; readonly value: number | bigint }
  | { readonly kind: 'null' };

export type ProtocolVersion = '2.0';

export interface JsonRpcRequest {
  readonly protocolVersion: ProtocolVersion;
  readonly id: Identifier;
  readonly method: string;
  /** Absent and explicit `null` both decode to `undefined` */
  readonly params?: Readonly<JsonObject>;
}

export interface JsonRpcResponse {
  readonly protocolVersion: ProtocolVersion;
  readonly id: Identifier;
  readonly result: JsonValue;
}

export interface ErrorData {
  readonly code: number;
  readonly message: string;
  readonly data?: JsonValue;
}

export interface JsonRpcErrorResponse {
  readonly protocolVersion: ProtocolVersion;
  readonly id: Identifier;
  readonly error: ErrorData;
}

export type JsonRpcMessage =
  | { readonly type: 'request'; readonly message: JsonRpcRequest }
  | { readonly type: 'response'; readonly message: JsonRpcResponse }
  | { readonly type: 'error'; readonly message: JsonRpcErrorResponse };
