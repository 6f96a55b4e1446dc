/**
 * Metrics tracking for observability
 */

import { errorCodeName } from '../models/LocationError';
import type { QualityReason } from './validator';

export interface Metric {
  name: string;
  value: number;
  tags: Record<string, string>;
  timestamp: number;
}

export const METRIC_NAMES = {
  NORMALIZED: 'location.normalize.count',
  VALIDATION_WARNING: 'location.normalize.validation_warning',
  DURATION: 'location.normalize.duration_ms',
  ERROR_ADAPTED: 'location.error.adapted',
  MALFORMED_ERROR_CODE: 'location.error.malformed_code',
} as const;

// A warm instance keeps only the most recent records
export const MAX_BUFFERED_METRICS = 1000;

export class MetricsCollector {
  private metrics: Metric[] = [];

  constructor(private readonly maxEntries: number = MAX_BUFFERED_METRICS) {}

  record(name: string, value: number, tags: Record<string, string> = {}): void {
    this.metrics.push({
      name,
      value,
      tags,
      timestamp: Date.now(),
    });

    if (this.metrics.length > this.maxEntries) {
      this.metrics.splice(0, this.metrics.length - this.maxEntries);
    }
  }

  increment(name: string, tags: Record<string, string> = {}): void {
    this.record(name, 1, tags);
  }

  /**
   * Record a normalized location payload
   */
  recordNormalized(event: string, sample: boolean, synthetic: boolean): void {
    this.increment(METRIC_NAMES.NORMALIZED, {
      event: event || 'none',
      sample: String(sample),
      synthetic: String(synthetic),
    });
  }

  recordValidationWarning(reason: QualityReason): void {
    this.increment(METRIC_NAMES.VALIDATION_WARNING, { reason });
  }

  recordErrorAdapted(code: number): void {
    this.increment(METRIC_NAMES.ERROR_ADAPTED, {
      code: code.toString(),
      name: errorCodeName(code),
    });
  }

  /**
   * Record an error code the platform sent that is not an integer
   */
  recordMalformedErrorCode(code: string): void {
    this.increment(METRIC_NAMES.MALFORMED_ERROR_CODE, { code });
  }

  recordDuration(count: number, durationMs: number): void {
    this.record(METRIC_NAMES.DURATION, durationMs, {
      count: count.toString(),
    });
  }

  // For testing purposes
  getMetrics(): Metric[] {
    return [...this.metrics];
  }

  getMetricsByName(name: string): Metric[] {
    return this.metrics.filter((m) => m.name === name);
  }

  clearMetrics(): void {
    this.metrics = [];
  }
}

export const metrics = new MetricsCollector();
