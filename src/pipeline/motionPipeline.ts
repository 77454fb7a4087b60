import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { DispatchReport, MotionEvaluation, MotionSample, MotionSignal } from '../types.js';
import { CooldownGate } from './cooldownGate.js';
import { Debouncer } from './debouncer.js';
import { RateLimiter } from './rateLimiter.js';

export type FrameDecision = 'throttled' | 'failed' | 'observed' | 'suppressed' | 'accepted';

export type FrameResult = {
  decision: FrameDecision;
  evaluation: MotionEvaluation | null;
  sample: MotionSample | null;
};

export interface EventSink {
  dispatch(frame: Buffer | null, timestamp: Date): Promise<DispatchReport>;
}

interface MotionPipelineDependencies {
  detector: MotionSignal;
  dispatcher: EventSink;
  debouncer?: Debouncer;
  cooldown?: CooldownGate;
  rateLimiter?: RateLimiter;
  log?: Logger;
  metrics?: MetricsRegistry;
}

/**
 * Per-frame loop body. Runs synchronously in frame order; accepted events are
 * handed to the dispatcher and tracked until they settle, so frame handling
 * never waits on the network.
 */
export class MotionPipeline extends EventEmitter {
  readonly debouncer: Debouncer;
  readonly cooldown: CooldownGate;
  readonly rateLimiter: RateLimiter;
  private readonly detector: MotionSignal;
  private readonly dispatcher: EventSink;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly inFlight = new Set<Promise<DispatchReport | null>>();

  constructor(dependencies: MotionPipelineDependencies) {
    super();
    this.detector = dependencies.detector;
    this.dispatcher = dependencies.dispatcher;
    this.debouncer = dependencies.debouncer ?? new Debouncer();
    this.cooldown = dependencies.cooldown ?? new CooldownGate();
    this.rateLimiter = dependencies.rateLimiter ?? new RateLimiter();
    this.log = dependencies.log ?? logger;
    this.metrics = dependencies.metrics ?? metrics;
  }

  get pendingDispatches() {
    return this.inFlight.size;
  }

  /**
   * `now` is a monotonic instant used for rate limiting and cooldown; `at` is
   * the wall-clock time stamped on an accepted event.
   */
  handleFrame(frame: Buffer, now: number = performance.now(), at: Date = new Date()): FrameResult {
    this.metrics.increment('frames.received');

    if (!this.rateLimiter.admit(now)) {
      this.metrics.increment('frames.throttled');
      return { decision: 'throttled', evaluation: null, sample: null };
    }
    this.metrics.increment('frames.admitted');

    let evaluation: MotionEvaluation;
    try {
      evaluation = this.detector.evaluate(frame);
    } catch (error) {
      this.metrics.increment('frames.failed');
      this.log.warn({ err: error }, 'Failed to evaluate frame');
      return { decision: 'failed', evaluation: null, sample: null };
    }

    const sample: MotionSample = { ts: now, isMotion: evaluation.isMotion };
    if (sample.isMotion) {
      this.metrics.increment('samples.positive');
    }

    if (!this.debouncer.offer(sample.isMotion)) {
      return { decision: 'observed', evaluation, sample };
    }

    this.metrics.increment('events.confirmed');

    if (!this.cooldown.tryAcquire(now)) {
      this.metrics.increment('events.suppressed');
      this.log.debug(
        { remainingMs: this.cooldown.remainingMs(now) },
        'Motion confirmed during cooldown'
      );
      return { decision: 'suppressed', evaluation, sample };
    }

    this.metrics.recordAcceptedEvent(at.getTime());
    this.log.info({ areaPct: evaluation.areaPct }, 'Motion event accepted');
    this.track(frame, at);
    return { decision: 'accepted', evaluation, sample };
  }

  /**
   * Resolves once every dispatch started so far has settled, or with `false`
   * when `timeoutMs` elapses first.
   */
  async drain(timeoutMs?: number): Promise<boolean> {
    const pending = Array.from(this.inFlight);
    if (pending.length === 0) {
      return true;
    }

    const settled = Promise.allSettled(pending).then(() => true);
    if (timeoutMs === undefined) {
      return settled;
    }

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
      timer.unref();
    });

    try {
      return await Promise.race([settled, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private track(frame: Buffer, timestamp: Date) {
    const task: Promise<DispatchReport | null> = this.dispatcher
      .dispatch(frame, timestamp)
      .then(report => {
        this.emit('dispatch', report);
        return report;
      })
      .catch(error => {
        this.log.error({ err: error }, 'Event dispatch failed');
        return null;
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }
}

export default MotionPipeline;
