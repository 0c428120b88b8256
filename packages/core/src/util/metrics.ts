import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  PARSE: 'parseMs',
  RENDER: 'renderMs',
  COUNT: 'countMs',
  ENUMERATE: 'enumerateMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;

type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];

export interface MetricsSnapshot {
  parseMs: number;
  renderMs: number;
  countMs: number;
  enumerateMs: number;
  valuesRendered: number;
  valuesEnumerated: number;
  renderSetAttempts: number;
  renderSetDuplicates: number;
  countCacheHits: number;
}

interface IdleTimerState {
  total: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  total: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

type CounterKey = Exclude<keyof MetricsSnapshot, MetricsPhaseKey>;

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly timers: Record<MetricsPhaseKey, TimerState>;
  private readonly counters: Record<CounterKey, number>;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.timers = {
      parseMs: { total: 0 },
      renderMs: { total: 0 },
      countMs: { total: 0 },
      enumerateMs: { total: 0 },
    };
    this.counters = {
      valuesRendered: 0,
      valuesEnumerated: 0,
      renderSetAttempts: 0,
      renderSetDuplicates: 0,
      countCacheHits: 0,
    };
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

    const duration = this.now() - current.startedAt;
    this.timers[key] = { total: current.total + safeDuration(duration) };
  }

  /**
   * Run `fn` inside a begin/end pair for `phase`.
   */
  public measure<T>(phase: MetricPhase, fn: () => T): T {
    this.begin(phase);
    try {
      return fn();
    } finally {
      this.end(phase);
    }
  }

  public addRendered(count: number): void {
    this.increment('valuesRendered', count);
  }

  public addEnumerated(count: number): void {
    this.increment('valuesEnumerated', count);
  }

  public addRenderSetAttempt(duplicate: boolean): void {
    this.increment('renderSetAttempts', 1);
    if (duplicate) this.increment('renderSetDuplicates', 1);
  }

  public addCountCacheHit(): void {
    this.increment('countCacheHits', 1);
  }

  public snapshotMetrics(): MetricsSnapshot {
    return {
      parseMs: this.timers.parseMs.total,
      renderMs: this.timers.renderMs.total,
      countMs: this.timers.countMs.total,
      enumerateMs: this.timers.enumerateMs.total,
      ...this.counters,
    };
  }

  private increment(key: CounterKey, count: number): void {
    if (!this.enabled) {
      return;
    }
    this.counters[key] += count;
  }
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}

function safeDuration(durationMs: number): number {
  return Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
}
