/**
 * Library exports for programmatic usage
 */
export { decodeRequest, decodeRequestValue } from './request-decoder.js';
export { decodeResponse, decodeErrorResponse, decodeMessage } from './response-decoder.js';
export { decodeIdentifier, identifierToJson, identifiersEqual, NULL_ID } from './identifier.js';
export { decodeRequestBatch, type BatchDecodeResult } from './batch.js';
export {
  isValidJsonRpc,
  isInitializeRequest,
  isToolCallRequest,
  isToolsListRequest,
} from './jsonrpc-validator.js';
export {
  encodeRequest,
  encodeResponse,
  encodeErrorResponse,
  encodeMessage,
  requestToJson,
  responseToJson,
  errorResponseToJson,
} from './serializer.js';
export {
  parseRequest,
  parseResponse,
  parseRequestsBatch,
  isValid,
  toNativeId,
  toNativeRequest,
  toNativeResponse,
  type NativeRequest,
  type NativeResponse,
} from './bridge.js';
export {
  describeDecodeError,
  toJsonRpcError,
  GatewayError,
  ParseError,
  ConfigurationError,
  isGatewayError,
  getErrorDetails,
  type DecodeError,
  type DecodeErrorKind,
  type DecodeResult,
  type JsonRpcErrorObject,
} from './errors.js';
export { FIELD, EXPECTED, JSONRPC_VERSION } from './constants.js';
export { MessageDecoder, type MessageDecoderOptions } from './decoder.js';
export { MethodParamsValidator, type ParamsValidationResult } from './method-params.js';
export { DecoderMetrics, type DecoderMetricsConfig } from './metrics.js';
export { ConsoleLogger, JsonLogger, LogLevel, type Logger } from './logger.js';
export { loadConfig, type DecoderConfig } from './config.js';
export type {
  Identifier,
  JsonValue,
  JsonObject,
  JsonRpcRequest,
  JsonRpcResponse,
  JsonRpcErrorResponse,
  JsonRpcMessage,
  ErrorData,
} from './types/jsonrpc.js';
