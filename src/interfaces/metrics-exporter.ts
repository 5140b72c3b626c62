/**
 * Metrics Exporter Interface
 *
 * Admission metrics in Prometheus format. Metrics are ephemeral (reset on
 * process restart) and local to the process; aggregate across instances in
 * Prometheus.
 *
 * @see https://prometheus.io/docs/concepts/metric_types/
 */

import type { DecisionOutcome, StrategyKind } from '../types.js';

export interface IMetricsExporter {
  /**
   * Counts one evaluated request by outcome
   */
  recordDecision(outcome: DecisionOutcome): void;

  /**
   * Counts a ban issued by a hit (not hits rejected by an existing ban)
   */
  recordBan(strategy: StrategyKind): void;

  /**
   * Counts a failed store round-trip
   */
  recordStoreError(): void;

  /**
   * Records the wall time of one evaluation
   */
  recordEvaluationDuration(durationSeconds: number): void;

  /**
   * @returns Prometheus exposition format (text/plain)
   */
  getMetrics(): Promise<string>;

  /**
   * Resets all metrics to initial state
   *
   * Use case: Testing, manual reset
   */
  reset(): void;
}
