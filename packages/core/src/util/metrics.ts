import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  READ: 'readMs',
  REPAIR: 'repairMs',
  WRITE: 'writeMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;

export interface MetricsSnapshot {
  readMs: number;
  repairMs: number;
  writeMs: number;
  filesScanned: number;
  filesChanged: number;
  filesFailed: number;
  literalsFound: number;
  literalsRepaired: number;
  literalsSkipped: number;
  repairActions: number;
}

type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];

type CounterKey = Exclude<keyof MetricsSnapshot, MetricsPhaseKey>;

const DEFAULT_COUNTERS: MetricsSnapshot = {
  readMs: 0,
  repairMs: 0,
  writeMs: 0,
  filesScanned: 0,
  filesChanged: 0,
  filesFailed: 0,
  literalsFound: 0,
  literalsRepaired: 0,
  literalsSkipped: 0,
  repairActions: 0,
};

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

export class RepairMetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly startedAt: Partial<Record<MetricsPhaseKey, number>> = {};
  private readonly counters: MetricsSnapshot;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.counters = { ...DEFAULT_COUNTERS };
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public begin(phase: MetricPhase): void {
    if (!this.enabled) return;
    const key = METRIC_PHASES[phase];
    if (this.startedAt[key] !== undefined) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }
    this.startedAt[key] = this.now();
  }

  public end(phase: MetricPhase): void {
    if (!this.enabled) return;
    const key = METRIC_PHASES[phase];
    const started = this.startedAt[key];
    if (started === undefined) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }
    this.counters[key] += this.now() - started;
    delete this.startedAt[key];
  }

  /** Time a synchronous or async section under `phase` */
  public async measure<T>(phase: MetricPhase, fn: () => T | Promise<T>): Promise<T> {
    this.begin(phase);
    try {
      return await fn();
    } finally {
      this.end(phase);
    }
  }

  public increment(counter: CounterKey, by = 1): void {
    if (!this.enabled) return;
    this.counters[counter] += by;
  }

  public snapshot(): MetricsSnapshot {
    return { ...this.counters };
  }
}
