import { performance } from 'node:perf_hooks';
import pino from 'pino';
import type { ChannelOutcome, ChannelOutcomeStatus } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type ChannelState = {
  delivered: number;
  failed: number;
  skipped: number;
  lastStatus: ChannelOutcomeStatus | null;
  lastFailureReason: string | null;
  lastFailureAt: number | null;
};

type ChannelSnapshot = {
  delivered: number;
  failed: number;
  skipped: number;
  lastStatus: ChannelOutcomeStatus | null;
  lastFailureReason: string | null;
  lastFailureAt: string | null;
  latency: LatencyStats | null;
};

type SourceRestartSnapshot = {
  total: number;
  byReason: CounterMap;
  lastRestartAt: string | null;
  fatal: number;
};

type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    currentLevel: string;
    levelChanges: CounterMap;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  pipeline: CounterMap;
  channels: Record<string, ChannelSnapshot>;
  source: SourceRestartSnapshot;
  latency: Record<string, LatencyStats>;
  events: {
    lastAcceptedAt: string | null;
  };
};

const PIPELINE_COUNTERS = [
  'frames.received',
  'frames.admitted',
  'frames.throttled',
  'frames.failed',
  'samples.positive',
  'events.confirmed',
  'events.accepted',
  'events.suppressed',
  'snapshots.failed'
] as const;

type PipelineCounter = (typeof PIPELINE_COUNTERS)[number];

class MetricsRegistry {
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelChangeCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly pipelineCounters = new Map<PipelineCounter, number>();
  private readonly channels = new Map<string, ChannelState>();
  private readonly latencyStats = new Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>();
  private readonly restartReasons = new Map<string, number>();
  private restartTotal = 0;
  private lastRestartAt: number | null = null;
  private fatalTotal = 0;
  private lastAcceptedAt: number | null = null;
  private readonly resetListeners = new Set<() => void>();

  constructor() {
    this.resetPipelineCounters();
  }

  reset() {
    this.logLevelCounters.clear();
    this.logLevelChangeCounters.clear();
    this.currentLogLevel = 'info';
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.resetPipelineCounters();
    this.channels.clear();
    this.latencyStats.clear();
    this.restartReasons.clear();
    this.restartTotal = 0;
    this.lastRestartAt = null;
    this.fatalTotal = 0;
    this.lastAcceptedAt = null;
    for (const listener of this.resetListeners) {
      listener();
    }
  }

  onReset(listener: () => void) {
    this.resetListeners.add(listener);
    return () => {
      this.resetListeners.delete(listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (!previousNormalized || previousNormalized === normalized) {
      return;
    }
    this.logLevelChangeCounters.set(
      normalized,
      (this.logLevelChangeCounters.get(normalized) ?? 0) + 1
    );
  }

  increment(counter: PipelineCounter, amount = 1) {
    if (!Number.isFinite(amount)) {
      return;
    }
    this.pipelineCounters.set(counter, (this.pipelineCounters.get(counter) ?? 0) + amount);
  }

  getCounter(counter: PipelineCounter): number {
    return this.pipelineCounters.get(counter) ?? 0;
  }

  recordAcceptedEvent(at: number = Date.now()) {
    this.increment('events.accepted');
    this.lastAcceptedAt = at;
  }

  recordChannelOutcome(outcome: ChannelOutcome) {
    const state = this.getChannelState(outcome.channel);
    state.lastStatus = outcome.status;
    switch (outcome.status) {
      case 'delivered':
        state.delivered += 1;
        this.observeLatency(`channel.${outcome.channel}`, outcome.durationMs);
        break;
      case 'failed':
        state.failed += 1;
        state.lastFailureReason = outcome.reason;
        state.lastFailureAt = Date.now();
        this.observeLatency(`channel.${outcome.channel}`, outcome.durationMs);
        break;
      case 'skipped':
        state.skipped += 1;
        break;
    }
  }

  recordSourceRestart(reason: string) {
    this.restartTotal += 1;
    this.lastRestartAt = Date.now();
    this.restartReasons.set(reason, (this.restartReasons.get(reason) ?? 0) + 1);
  }

  recordSourceFatal() {
    this.fatalTotal += 1;
  }

  observeLatency(metric: string, durationMs: number) {
    if (!Number.isFinite(durationMs)) {
      return;
    }
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  async time<T>(metric: string, fn: () => Promise<T> | T): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  exportLogLevelMetrics() {
    return {
      byLevel: mapLogLevelCounters(this.logLevelCounters),
      currentLevel: this.currentLogLevel,
      levelChanges: mapFrom(this.logLevelChangeCounters),
      lastErrorAt: toIso(this.lastErrorAt),
      lastErrorMessage: this.lastErrorMessage
    };
  }

  snapshot(): MetricsSnapshot {
    const latency: Record<string, LatencyStats> = {};
    for (const [metric, stats] of this.latencyStats) {
      latency[metric] = toLatencySnapshot(stats);
    }

    const channels: Record<string, ChannelSnapshot> = {};
    for (const [channel, state] of this.channels) {
      const stats = this.latencyStats.get(`channel.${channel}`);
      channels[channel] = {
        delivered: state.delivered,
        failed: state.failed,
        skipped: state.skipped,
        lastStatus: state.lastStatus,
        lastFailureReason: state.lastFailureReason,
        lastFailureAt: toIso(state.lastFailureAt),
        latency: stats ? toLatencySnapshot(stats) : null
      };
    }

    return {
      createdAt: new Date().toISOString(),
      logs: this.exportLogLevelMetrics(),
      pipeline: mapFrom(this.pipelineCounters),
      channels,
      source: {
        total: this.restartTotal,
        byReason: mapFrom(this.restartReasons),
        lastRestartAt: toIso(this.lastRestartAt),
        fatal: this.fatalTotal
      },
      latency,
      events: {
        lastAcceptedAt: toIso(this.lastAcceptedAt)
      }
    };
  }

  private resetPipelineCounters() {
    this.pipelineCounters.clear();
    for (const counter of PIPELINE_COUNTERS) {
      this.pipelineCounters.set(counter, 0);
    }
  }

  private getChannelState(channel: string): ChannelState {
    const existing = this.channels.get(channel);
    if (existing) {
      return existing;
    }
    const created: ChannelState = {
      delivered: 0,
      failed: 0,
      skipped: 0,
      lastStatus: null,
      lastFailureReason: null,
      lastFailureAt: null
    };
    this.channels.set(channel, created);
    return created;
  }
}

function mapFrom(map: Map<string, number>): CounterMap {
  return Object.fromEntries(map.entries());
}

function mapLogLevelCounters(map: Map<string, number>): CounterMap {
  const entries = Array.from(map.entries()).sort(([a], [b]) => {
    const aValue = pino.levels.values[a] ?? Number.MAX_SAFE_INTEGER;
    const bValue = pino.levels.values[b] ?? Number.MAX_SAFE_INTEGER;
    return aValue - bValue;
  });
  return Object.fromEntries(entries);
}

function toLatencySnapshot(stats: { count: number; totalMs: number; minMs: number; maxMs: number }): LatencyStats {
  return {
    count: stats.count,
    totalMs: stats.totalMs,
    minMs: stats.count === 0 ? 0 : stats.minMs,
    maxMs: stats.maxMs,
    averageMs: stats.count === 0 ? 0 : stats.totalMs / stats.count
  };
}

function toIso(value: number | null): string | null {
  return value === null ? null : new Date(value).toISOString();
}

const defaultRegistry = new MetricsRegistry();

export type { ChannelSnapshot, LatencyStats, MetricsSnapshot, PipelineCounter };
export { MetricsRegistry };
export default defaultRegistry;
