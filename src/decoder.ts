/**
 * Instrumented decoder facade
 *
 * Wraps the pure decoders with logging and metrics for use on a gateway's
 * request path. Results are exactly what the pure functions return.
 */

import { performance } from 'node:perf_hooks';
import { decodeRequestBatch, type BatchDecodeResult } from './batch.js';
import { describeDecodeError, type DecodeError, type DecodeResult } from './errors.js';
import { identifierToJson } from './identifier.js';
import { isValidJsonRpc } from './jsonrpc-validator.js';
import { ConsoleLogger, type Logger } from './logger.js';
import type { DecoderMetrics, MessageType } from './metrics.js';
import { decodeRequest } from './request-decoder.js';
import { decodeErrorResponse, decodeMessage, decodeResponse } from './response-decoder.js';
import type {
  JsonRpcErrorResponse,
  JsonRpcMessage,
  JsonRpcRequest,
  JsonRpcResponse,
} from './types/jsonrpc.js';

export interface MessageDecoderOptions {
  logger?: Logger;
  metrics?: DecoderMetrics;
}

export class MessageDecoder {
  private logger: Logger;
  private metrics?: DecoderMetrics;

  constructor(options: MessageDecoderOptions = {}) {
    this.logger = options.logger ?? new ConsoleLogger();
    this.metrics = options.metrics;
  }

  decodeRequest(raw: string): DecodeResult<JsonRpcRequest> {
    return this.instrument('request', () => decodeRequest(raw), request => ({
      id: identifierToJson(request.id),
      method: request.method,
      params: request.params,
    }));
  }

  decodeResponse(raw: string): DecodeResult<JsonRpcResponse> {
    return this.instrument('response', () => decodeResponse(raw), response => ({
      id: identifierToJson(response.id),
    }));
  }

  decodeErrorResponse(raw: string): DecodeResult<JsonRpcErrorResponse> {
    return this.instrument('error_response', () => decodeErrorResponse(raw), response => ({
      id: identifierToJson(response.id),
      code: response.error.code,
    }));
  }

  decodeMessage(raw: string): DecodeResult<JsonRpcMessage> {
    return this.instrument('message', () => decodeMessage(raw), decoded => ({
      type: decoded.type,
      id: identifierToJson(decoded.message.id),
    }));
  }

  decodeBatch(inputs: string[]): BatchDecodeResult {
    const start = performance.now();
    const result = decodeRequestBatch(inputs);
    const duration = (performance.now() - start) / 1000;

    if (result.ok) {
      this.metrics?.recordDecodeSuccess('batch', duration);
      this.logger.debug('Decoded request batch', { size: result.value.length });
    } else {
      this.metrics?.recordDecodeFailure('batch', result.error.kind, duration);
      this.logger.warn('Rejected request batch', {
        size: inputs.length,
        index: result.index,
        ...this.errorContext(result.error),
      });
    }
    return result;
  }

  /**
   * Admission filter; see isValidJsonRpc
   */
  isPlausible(raw: string): boolean {
    const passed = isValidJsonRpc(raw);
    this.metrics?.recordFastReject(passed);
    return passed;
  }

  private instrument<T>(
    messageType: MessageType,
    decode: () => DecodeResult<T>,
    describe: (value: T) => Record<string, unknown>
  ): DecodeResult<T> {
    const start = performance.now();
    const result = decode();
    const duration = (performance.now() - start) / 1000;

    if (result.ok) {
      this.metrics?.recordDecodeSuccess(messageType, duration);
      this.logger.debug(`Decoded ${messageType}`, describe(result.value));
    } else {
      this.metrics?.recordDecodeFailure(messageType, result.error.kind, duration);
      this.logger.warn(`Rejected ${messageType}`, this.errorContext(result.error));
    }
    return result;
  }

  private errorContext(error: DecodeError): Record<string, unknown> {
    return { kind: error.kind, reason: describeDecodeError(error) };
  }
}
