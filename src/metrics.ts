/**
 * Prometheus metrics for decode traffic
 *
 * Tracks:
 * - Decode attempts per message type and outcome
 * - Decode failures per error kind
 * - Decode duration
 * - Fast-reject filter verdicts
 */

import { Registry, Counter, Histogram } from 'prom-client';
import { DEFAULT_METRICS_PREFIX } from './constants.js';
import type { DecodeErrorKind } from './errors.js';

export type MessageType = 'request' | 'response' | 'error_response' | 'message' | 'batch';

export interface DecoderMetricsConfig {
  enabled: boolean;
  prefix?: string;
}

export class DecoderMetrics {
  private registry: Registry;
  private enabled: boolean;

  private decodeTotal: Counter;
  private decodeErrors: Counter;
  private decodeDuration: Histogram;
  private fastRejectTotal: Counter;

  constructor(config: DecoderMetricsConfig) {
    this.enabled = config.enabled;
    this.registry = new Registry();

    const prefix = config.prefix || DEFAULT_METRICS_PREFIX;

    this.decodeTotal = new Counter({
      name: `${prefix}decode_total`,
      help: 'Total number of decode attempts',
      labelNames: ['message_type', 'outcome'],
      registers: [this.registry],
    });

    this.decodeErrors = new Counter({
      name: `${prefix}decode_errors_total`,
      help: 'Total number of decode failures by error kind',
      labelNames: ['message_type', 'error_kind'],
      registers: [this.registry],
    });

    // Decodes are expected to finish in microseconds
    this.decodeDuration = new Histogram({
      name: `${prefix}decode_duration_seconds`,
      help: 'Decode duration in seconds',
      labelNames: ['message_type'],
      buckets: [0.00001, 0.00005, 0.0001, 0.0005, 0.001, 0.005, 0.01, 0.05],
      registers: [this.registry],
    });

    this.fastRejectTotal = new Counter({
      name: `${prefix}fast_reject_total`,
      help: 'Fast-reject filter verdicts',
      labelNames: ['result'],
      registers: [this.registry],
    });
  }

  /**
   * Record a successful decode
   */
  recordDecodeSuccess(messageType: MessageType, durationSeconds: number): void {
    if (!this.enabled) return;

    this.decodeTotal.inc({ message_type: messageType, outcome: 'success' });
    this.decodeDuration.observe({ message_type: messageType }, durationSeconds);
  }

  /**
   * Record a failed decode
   */
  recordDecodeFailure(messageType: MessageType, errorKind: DecodeErrorKind, durationSeconds: number): void {
    if (!this.enabled) return;

    this.decodeTotal.inc({ message_type: messageType, outcome: 'failure' });
    this.decodeErrors.inc({ message_type: messageType, error_kind: errorKind });
    this.decodeDuration.observe({ message_type: messageType }, durationSeconds);
  }

  recordFastReject(passed: boolean): void {
    if (!this.enabled) return;
    this.fastRejectTotal.inc({ result: passed ? 'pass' : 'reject' });
  }

  /**
   * Get metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    if (!this.enabled) {
      return '# Metrics disabled\n';
    }
    return this.registry.metrics();
  }

  /**
   * Get registry (for testing)
   */
  getRegistry(): Registry {
    return this.registry;
  }
}
