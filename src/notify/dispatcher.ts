import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { Channel, ChannelOutcome, DispatchReport, MotionEvent, SnapshotRef, SnapshotStore } from '../types.js';

const DISPATCH_CHANNEL = 'dispatch';

interface EventDispatcherDependencies {
  channels: Channel[];
  snapshots?: SnapshotStore | null;
  log?: Logger;
  metrics?: MetricsRegistry;
}

function pad(value: number, width = 2) {
  return String(value).padStart(width, '0');
}

export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatEventMessage(date: Date): string {
  return `Motion detected at ${formatLocalTimestamp(date)}`;
}

/**
 * Fans one accepted event out to every channel at once. `dispatch` never
 * rejects; per-channel failures end up in the report.
 */
export class EventDispatcher extends EventEmitter {
  private readonly channels: Channel[];
  private readonly snapshots: SnapshotStore | null;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(dependencies: EventDispatcherDependencies) {
    super();
    this.channels = [...dependencies.channels];
    this.snapshots = dependencies.snapshots ?? null;
    this.log = dependencies.log ?? logger;
    this.metrics = dependencies.metrics ?? metrics;
  }

  async dispatch(frame: Buffer | null, timestamp: Date): Promise<DispatchReport> {
    const start = performance.now();
    const event: MotionEvent = {
      timestamp,
      message: formatEventMessage(timestamp),
      snapshot: frame ? await this.captureSnapshot(frame, timestamp) : null
    };

    const outcomes = await this.deliver(event, start);
    for (const outcome of outcomes) {
      this.metrics.recordChannelOutcome(outcome);
      this.logOutcome(outcome, event.message);
    }

    const report: DispatchReport = {
      timestamp: event.timestamp,
      message: event.message,
      snapshotPath: event.snapshot?.path ?? null,
      outcomes,
      durationMs: performance.now() - start
    };
    this.metrics.observeLatency('dispatch', report.durationMs);
    this.emit(DISPATCH_CHANNEL, report);
    return report;
  }

  private async deliver(event: MotionEvent, start: number): Promise<ChannelOutcome[]> {
    const settled = await Promise.allSettled(
      this.channels.map(channel => channel.send(event.message, event.snapshot))
    );

    return settled.map((result, index): ChannelOutcome => {
      const channel = this.channels[index]?.name ?? `channel-${index}`;
      if (result.status === 'fulfilled') {
        return result.value;
      }
      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
      return { status: 'failed', channel, reason, durationMs: performance.now() - start };
    });
  }

  private async captureSnapshot(frame: Buffer, timestamp: Date): Promise<SnapshotRef | null> {
    if (!this.snapshots) {
      return null;
    }
    try {
      const snapshot = await this.snapshots.persist(frame, timestamp);
      this.log.info({ path: snapshot.path }, 'Saved event snapshot');
      return snapshot;
    } catch (error) {
      this.metrics.increment('snapshots.failed');
      this.log.error({ err: error }, 'Failed to save event snapshot');
      return null;
    }
  }

  private logOutcome(outcome: ChannelOutcome, message: string) {
    switch (outcome.status) {
      case 'delivered':
        this.log.info(
          { channel: outcome.channel, statusCode: outcome.statusCode, durationMs: outcome.durationMs },
          `Notification delivered: ${message}`
        );
        break;
      case 'failed':
        this.log.warn(
          {
            channel: outcome.channel,
            statusCode: outcome.statusCode,
            reason: outcome.reason,
            durationMs: outcome.durationMs
          },
          'Notification failed'
        );
        break;
      case 'skipped':
        this.log.debug({ channel: outcome.channel }, 'Notification channel not configured');
        break;
    }
  }
}

export default EventDispatcher;
