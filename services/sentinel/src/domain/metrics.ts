import { Counter, Histogram, Registry } from 'prom-client';
import type { EnforcementAction } from './policy';

export type CycleOutcome = 'completed' | 'scan_failed' | 'empty_scan';
export type Classification = 'new' | 'known';
export type EnforcementResult = 'applied' | 'already' | 'skipped' | 'failed';

export class SentinelMetrics {
  private readonly registry: Registry;
  private readonly cycles: Counter<string>;
  private readonly classifications: Counter<string>;
  private readonly enforcement: Counter<string>;
  private readonly driftCorrections: Counter<string>;
  private readonly cycleDuration: Histogram<string>;

  constructor(registry?: Registry) {
    this.registry = registry ?? new Registry();
    this.cycles = new Counter({
      name: 'sentinel_cycles_total',
      help: 'Reconciliation cycles by outcome',
      labelNames: ['outcome'],
      registers: [this.registry]
    });
    this.classifications = new Counter({
      name: 'sentinel_classifications_total',
      help: 'Devices classified per cycle',
      labelNames: ['kind', 'status'],
      registers: [this.registry]
    });
    this.enforcement = new Counter({
      name: 'sentinel_enforcement_actions_total',
      help: 'Gateway enforcement calls by action and result',
      labelNames: ['action', 'result'],
      registers: [this.registry]
    });
    this.driftCorrections = new Counter({
      name: 'sentinel_drift_corrections_total',
      help: 'Corrective calls issued by the drift check',
      labelNames: ['action'],
      registers: [this.registry]
    });
    this.cycleDuration = new Histogram({
      name: 'sentinel_cycle_duration_ms',
      help: 'Wall time of one reconciliation cycle',
      buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000],
      registers: [this.registry]
    });
  }

  recordCycle(outcome: CycleOutcome, durationMs: number) {
    this.cycles.labels(outcome).inc();
    this.cycleDuration.observe(durationMs);
  }

  recordClassification(kind: Classification, status: string) {
    this.classifications.labels(kind, status).inc();
  }

  recordEnforcement(action: EnforcementAction, result: EnforcementResult) {
    this.enforcement.labels(action, result).inc();
  }

  recordDriftCorrection(action: EnforcementAction) {
    this.driftCorrections.labels(action).inc();
  }

  getRegistry() {
    return this.registry;
  }
}
