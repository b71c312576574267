import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  GENERATE: 'generateMs',
  SERIALIZE: 'serializeMs',
  COMPILE: 'compileMs',
  VALIDATE: 'validateMs',
  INSTANTIATE: 'instantiateMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;
type PhaseKey = (typeof METRIC_PHASES)[MetricPhase];

export const METRIC_COUNTERS = [
  'classesGenerated',
  'definitionsEmitted',
  'validations',
  'validationFailures',
  'instancesBuilt',
  'cacheHits',
  'cacheMisses',
] as const;

export type MetricCounter = (typeof METRIC_COUNTERS)[number];

export type MetricsSnapshot = Record<PhaseKey, number> &
  Record<MetricCounter, number>;

interface IdleTimerState {
  total: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  total: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

function emptySnapshot(): MetricsSnapshot {
  return {
    generateMs: 0,
    serializeMs: 0,
    compileMs: 0,
    validateMs: 0,
    instantiateMs: 0,
    classesGenerated: 0,
    definitionsEmitted: 0,
    validations: 0,
    validationFailures: 0,
    instancesBuilt: 0,
    cacheHits: 0,
    cacheMisses: 0,
  };
}

export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly timers: Record<PhaseKey, TimerState>;
  private snapshot: MetricsSnapshot;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.snapshot = emptySnapshot();
    this.timers = {
      generateMs: { total: 0 },
      serializeMs: { total: 0 },
      compileMs: { total: 0 },
      validateMs: { total: 0 },
      instantiateMs: { total: 0 },
    };
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public begin(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }
    this.timers[key] = { total: current.total, startedAt: this.now() };
  }

  public end(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (!isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }
    const duration = Math.max(0, this.now() - current.startedAt);
    this.snapshot[key] += duration;
    this.timers[key] = { total: current.total + duration };
  }

  /**
   * Time a synchronous section. Nested calls for the same phase only count
   * the outermost one.
   */
  public measure<T>(phase: MetricPhase, fn: () => T): T {
    if (!this.enabled || isActiveTimerState(this.timers[METRIC_PHASES[phase]])) {
      return fn();
    }
    this.begin(phase);
    try {
      return fn();
    } finally {
      this.end(phase);
    }
  }

  public increment(counter: MetricCounter, by = 1): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot[counter] += by;
  }

  public snapshotMetrics(): MetricsSnapshot {
    return { ...this.snapshot };
  }

  public reset(): void {
    this.snapshot = emptySnapshot();
  }
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}
