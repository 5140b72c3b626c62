/**
 * Prometheus Metrics Exporter
 *
 * Integrates prom-client for admission monitoring:
 * - Decisions (counter with outcome label)
 * - Bans issued (counter with strategy label)
 * - Store failures (counter)
 * - Evaluation latency (histogram)
 *
 * Evaluation is one store round-trip per matched rule, so the histogram
 * buckets sit in the low milliseconds.
 */

import * as promClient from 'prom-client';
import type { IMetricsExporter } from '../interfaces/metrics-exporter.js';
import type { DecisionOutcome, StrategyKind } from '../types.js';

export class MetricsExporter implements IMetricsExporter {
  private registry: promClient.Registry;

  private decisionsCounter: promClient.Counter<'outcome'>;
  private bansCounter: promClient.Counter<'strategy'>;
  private storeErrorsCounter: promClient.Counter;
  private evaluationDurationHistogram: promClient.Histogram;

  constructor() {
    // Isolated from the global registry so several engines (and tests) coexist
    this.registry = new promClient.Registry();

    this.decisionsCounter = new promClient.Counter({
      name: 'admission_decisions_total',
      help: 'Total number of admission decisions',
      labelNames: ['outcome'] as const,
      registers: [this.registry],
    });

    this.bansCounter = new promClient.Counter({
      name: 'admission_bans_total',
      help: 'Total number of bans issued',
      labelNames: ['strategy'] as const,
      registers: [this.registry],
    });

    this.storeErrorsCounter = new promClient.Counter({
      name: 'admission_store_errors_total',
      help: 'Total number of failed store transactions',
      registers: [this.registry],
    });

    this.evaluationDurationHistogram = new promClient.Histogram({
      name: 'admission_evaluation_duration_seconds',
      help: 'Admission evaluation duration in seconds',
      buckets: [0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 1],
      registers: [this.registry],
    });
  }

  recordDecision(outcome: DecisionOutcome): void {
    this.decisionsCounter.labels(outcome).inc();
  }

  recordBan(strategy: StrategyKind): void {
    this.bansCounter.labels(strategy).inc();
  }

  recordStoreError(): void {
    this.storeErrorsCounter.inc();
  }

  recordEvaluationDuration(durationSeconds: number): void {
    this.evaluationDurationHistogram.observe(durationSeconds);
  }

  /**
   * Get all metrics in Prometheus text format
   */
  async getMetrics(): Promise<string> {
    return await this.registry.metrics();
  }

  /**
   * Content type for a /metrics response
   */
  get contentType(): string {
    return this.registry.contentType;
  }

  reset(): void {
    this.registry.resetMetrics();
  }
}
