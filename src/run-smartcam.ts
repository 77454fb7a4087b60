import { performance } from 'node:perf_hooks';
import loggerModule, { setLogLevel, type Logger } from './logger.js';
import defaultMetrics, { type MetricsRegistry } from './metrics/index.js';
import { loadConfig, resolveShutdownConfig, type SmartCamConfig } from './config/index.js';
import { createChannels } from './notify/index.js';
import { EventDispatcher } from './notify/dispatcher.js';
import type { FetchLike } from './notify/http.js';
import { CooldownGate } from './pipeline/cooldownGate.js';
import { Debouncer } from './pipeline/debouncer.js';
import { MotionPipeline } from './pipeline/motionPipeline.js';
import { RateLimiter } from './pipeline/rateLimiter.js';
import type { Channel, MotionSignal, SnapshotStore } from './types.js';
import { MotionDetector } from './video/motionDetector.js';
import { FileSnapshotStore } from './video/snapshot.js';
import { VideoSource, type FatalEvent, type RecoverEvent, type VideoSourceOptions } from './video/source.js';

export interface SmartCamStartOptions {
  config?: SmartCamConfig;
  logger?: Logger;
  metrics?: MetricsRegistry;
  fetch?: FetchLike;
  channels?: Channel[];
  snapshots?: SnapshotStore | null;
  detector?: MotionSignal;
  commandFactory?: VideoSourceOptions['commandFactory'];
  /** Monotonic milliseconds for rate limiting and cooldown. */
  now?: () => number;
  /** Wall-clock time stamped on accepted events. */
  clock?: () => Date;
}

export type SmartCamRuntime = {
  config: SmartCamConfig;
  source: VideoSource;
  pipeline: MotionPipeline;
  dispatcher: EventDispatcher;
  /** Settles when the runtime stops; rejects when the source cannot be opened. */
  done: Promise<void>;
  stop: (options?: { drainTimeoutMs?: number }) => Promise<void>;
};

function createDeferred() {
  let resolvePromise: () => void = () => {};
  let rejectPromise: (error: Error) => void = () => {};
  const promise = new Promise<void>((resolve, reject) => {
    resolvePromise = resolve;
    rejectPromise = reject;
  });
  return {
    promise,
    resolve: () => resolvePromise(),
    reject: (error: Error) => rejectPromise(error)
  };
}

export function startSmartCam(options: SmartCamStartOptions = {}): SmartCamRuntime {
  const logger = options.logger ?? loggerModule;
  const metrics = options.metrics ?? defaultMetrics;
  const config = options.config ?? loadConfig();
  const now = options.now ?? (() => performance.now());
  const clock = options.clock ?? (() => new Date());

  try {
    setLogLevel(config.logging.level);
  } catch (error) {
    logger.warn({ err: error, level: config.logging.level }, 'Failed to apply configured log level');
  }

  const channels = options.channels ?? createChannels(config, { fetch: options.fetch });
  const snapshots =
    options.snapshots === undefined ? new FileSnapshotStore(config.snapshots.directory) : options.snapshots;

  const dispatcher = new EventDispatcher({ channels, snapshots, log: logger, metrics });

  const pipeline = new MotionPipeline({
    detector: options.detector ?? new MotionDetector(config.motion),
    dispatcher,
    debouncer: new Debouncer(config.pipeline.confirmFrames),
    cooldown: new CooldownGate(config.pipeline.cooldownSeconds * 1000),
    rateLimiter: new RateLimiter(config.pipeline.maxFps),
    log: logger,
    metrics
  });

  const source = new VideoSource({
    ...config.video,
    commandFactory: options.commandFactory,
    metrics
  });

  const finished = createDeferred();
  let stopPromise: Promise<void> | null = null;

  source.on('frame', (frame: Buffer) => {
    pipeline.handleFrame(frame, now(), clock());
  });

  source.on('error', (error: Error) => {
    logger.warn({ err: error, source: config.video.source }, 'Video source error');
  });

  source.on('recover', (event: RecoverEvent) => {
    logger.warn(
      { source: config.video.source, reason: event.reason, attempt: event.attempt, delayMs: event.delayMs },
      'Video source restarting'
    );
  });

  source.on('end', () => {
    logger.warn({ source: config.video.source }, 'Video source ended');
  });

  source.on('fatal', (event: FatalEvent) => {
    logger.error({ err: event.error, reason: event.reason, source: config.video.source }, 'Video source fatal error');
    finished.reject(event.error);
  });

  const stop = async (stopOptions: { drainTimeoutMs?: number } = {}) => {
    if (stopPromise) {
      await stopPromise;
      return;
    }

    stopPromise = (async () => {
      const drainTimeoutMs = stopOptions.drainTimeoutMs ?? resolveShutdownConfig(config).drainTimeoutMs;
      try {
        await source.stop();
        const drained = await pipeline.drain(drainTimeoutMs);
        if (!drained) {
          logger.warn(
            { pending: pipeline.pendingDispatches, drainTimeoutMs },
            'Abandoning in-flight notifications'
          );
        }
      } finally {
        const snapshot = metrics.snapshot();
        logger.info(
          { pipeline: snapshot.pipeline, channels: snapshot.channels, restarts: snapshot.source.total },
          'SmartCam stopped'
        );
        finished.resolve();
      }
    })();

    await stopPromise;
  };

  const enabled = channels.filter(channel => channel.enabled).map(channel => channel.name);
  logger.info(
    {
      source: config.video.source,
      channels: enabled,
      confirmFrames: config.pipeline.confirmFrames,
      cooldownSeconds: config.pipeline.cooldownSeconds,
      maxFps: config.pipeline.maxFps
    },
    'SmartCam starting'
  );
  if (enabled.length === 0) {
    logger.warn('No notification channels configured; events will only be logged');
  }

  source.start();

  return {
    config,
    source,
    pipeline,
    dispatcher,
    done: finished.promise,
    stop
  };
}

export default startSmartCam;
