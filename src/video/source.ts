import ffmpeg from 'fluent-ffmpeg';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import metrics, { type MetricsRegistry } from '../metrics/index.js';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const DEFAULT_START_TIMEOUT_MS = 10_000;
const DEFAULT_IDLE_TIMEOUT_MS = 5000;
const DEFAULT_RESTART_DELAY_MS = 500;
const DEFAULT_RESTART_MAX_DELAY_MS = 5000;
const DEFAULT_FORCE_KILL_TIMEOUT_MS = 3000;
const DEFAULT_MAX_BUFFER_BYTES = 5 * 1024 * 1024;

/** The slice of a fluent-ffmpeg command the source drives. */
export interface FrameCommand extends EventEmitter {
  pipe(destination: PassThrough, options?: { end?: boolean }): unknown;
  kill(signal: NodeJS.Signals): unknown;
}

export type VideoInput = {
  input: string;
  format: string | null;
  inputOptions: string[];
  framesPerSecond: number;
  ffmpegPath?: string;
};

export type VideoSourceOptions = {
  source: string;
  framesPerSecond: number;
  inputArgs?: string[];
  rtspTransport?: string;
  ffmpegPath?: string;
  startTimeoutMs?: number;
  idleTimeoutMs?: number;
  restartDelayMs?: number;
  restartMaxDelayMs?: number;
  forceKillTimeoutMs?: number;
  maxBufferBytes?: number;
  platform?: NodeJS.Platform;
  commandFactory?: (input: VideoInput) => FrameCommand;
  metrics?: MetricsRegistry;
};

export type RecoverEvent = {
  reason: string;
  attempt: number;
  delayMs: number;
};

export type FatalEvent = {
  reason: string;
  error: Error;
};

export class FrameSourceError extends Error {
  constructor(
    message: string,
    readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FrameSourceError';
  }
}

export function isCameraIndex(source: string) {
  return /^\d+$/.test(source.trim());
}

function isRtspInput(source: string) {
  return /^rtsps?:\/\//i.test(source.trim());
}

/**
 * Maps a configured source to ffmpeg input arguments. A bare digit string is a
 * local camera index; anything else is handed to ffmpeg as a URL or path.
 */
export function resolveVideoInput(
  options: Pick<VideoSourceOptions, 'source' | 'framesPerSecond' | 'inputArgs' | 'rtspTransport' | 'ffmpegPath'>,
  platform: NodeJS.Platform = process.platform
): VideoInput {
  const source = options.source.trim();
  const inputOptions: string[] = [];
  let input = source;
  let format: string | null = null;

  if (isCameraIndex(source)) {
    switch (platform) {
      case 'darwin':
        format = 'avfoundation';
        inputOptions.push('-framerate', String(options.framesPerSecond));
        break;
      case 'win32':
        format = 'dshow';
        input = `video=${source}`;
        break;
      default:
        format = 'v4l2';
        input = `/dev/video${source}`;
        break;
    }
  } else if (isRtspInput(source) && options.rtspTransport) {
    inputOptions.push('-rtsp_transport', options.rtspTransport);
  }

  if (options.inputArgs?.length) {
    inputOptions.push(...options.inputArgs);
  }

  return {
    input,
    format,
    inputOptions,
    framesPerSecond: options.framesPerSecond,
    ffmpegPath: options.ffmpegPath
  };
}

export function createFfmpegCommand(input: VideoInput): FrameCommand {
  const command = ffmpeg(input.input);
  if (input.ffmpegPath) {
    command.setFfmpegPath(input.ffmpegPath);
  }
  if (input.format) {
    command.inputFormat(input.format);
  }
  if (input.inputOptions.length > 0) {
    command.inputOptions(input.inputOptions);
  }

  return command
    .outputOptions('-vf', `fps=${input.framesPerSecond}`)
    .outputOptions('-f', 'image2pipe')
    .outputOptions('-vcodec', 'png');
}

/**
 * Push-based frame source over an ffmpeg `image2pipe` PNG stream.
 *
 * Until the first frame ever arrives every failure is fatal: the source stops
 * and emits `fatal`. Once frames have flowed, failures emit `error` and
 * `recover` and the command is restarted with exponential backoff.
 */
export class VideoSource extends EventEmitter {
  private command: FrameCommand | null = null;
  private commandCleanup: (() => void) | null = null;
  private stream: PassThrough | null = null;
  private streamCleanup: (() => void) | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private startTimer: NodeJS.Timeout | null = null;
  private idleTimer: NodeJS.Timeout | null = null;
  private restartTimer: NodeJS.Timeout | null = null;
  private stopPromise: Promise<void> | null = null;
  private shouldStop = false;
  private opened = false;
  private restartCount = 0;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly options: VideoSourceOptions) {
    super();
    this.metrics = options.metrics ?? metrics;
  }

  get isOpened() {
    return this.opened;
  }

  get isRunning() {
    return this.command !== null || this.restartTimer !== null;
  }

  start() {
    if (this.command || this.restartTimer) {
      return;
    }

    this.shouldStop = false;
    this.opened = false;
    this.restartCount = 0;
    this.startCommand();
  }

  async stop(): Promise<void> {
    if (this.stopPromise) {
      await this.stopPromise;
      return;
    }

    this.stopPromise = this.performStop().finally(() => {
      this.stopPromise = null;
    });

    await this.stopPromise;
  }

  private async performStop(): Promise<void> {
    this.shouldStop = true;
    this.clearTimers();
    this.cleanupStream();

    const command = this.detachCommand();
    if (!command) {
      return;
    }

    await new Promise<void>(resolve => {
      this.terminateCommand(command, resolve);
    });
  }

  private startCommand() {
    if (this.shouldStop) {
      return;
    }

    const input = resolveVideoInput(this.options, this.options.platform);
    const factory = this.options.commandFactory ?? createFfmpegCommand;

    let command: FrameCommand;
    try {
      command = factory(input);
    } catch (error) {
      this.handleFailure(this.isMissingBinary(error) ? 'ffmpeg-missing' : 'start-error', error);
      return;
    }

    this.command = command;

    const onError = (err: Error) => {
      if (this.command !== command) {
        return;
      }
      this.handleFailure(this.isMissingBinary(err) ? 'ffmpeg-missing' : 'ffmpeg-error', err);
    };

    const onEnd = () => {
      if (this.command !== command) {
        return;
      }
      this.emit('end');
      this.handleFailure('ffmpeg-ended', new Error('ffmpeg exited'));
    };

    command.once('error', onError);
    command.once('end', onEnd);
    this.commandCleanup = () => {
      command.off('error', onError);
      command.off('end', onEnd);
    };

    this.resetStartTimer();

    const stream = new PassThrough();
    try {
      command.pipe(stream, { end: true });
    } catch (error) {
      stream.destroy();
      this.handleFailure(this.isMissingBinary(error) ? 'ffmpeg-missing' : 'start-error', error);
      return;
    }
    this.consume(stream);
  }

  private consume(stream: PassThrough) {
    this.cleanupStream();
    this.stream = stream;
    this.buffer = Buffer.alloc(0);

    const onData = (chunk: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, chunk]);
      const { frames, remainder, corrupted } = extractFrames(
        this.buffer,
        this.options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES
      );
      this.buffer = remainder;

      for (const frame of frames) {
        if (!this.opened) {
          this.opened = true;
        }
        this.restartCount = 0;
        this.clearStartTimer();
        this.resetIdleTimer();
        this.emit('frame', frame);
        if (this.stream !== stream) {
          return;
        }
      }

      if (corrupted) {
        this.handleFailure('corrupted-frame', new Error('Corrupted frame encountered'));
      }
    };

    const onError = (err: Error) => {
      this.handleFailure('stream-error', err);
    };

    stream.on('data', onData);
    stream.once('error', onError);

    this.streamCleanup = () => {
      stream.off('data', onData);
      stream.off('error', onError);
    };
  }

  private handleFailure(reason: string, cause: unknown) {
    if (this.shouldStop || this.restartTimer) {
      return;
    }

    const error = cause instanceof Error ? cause : new Error(String(cause));

    this.clearTimers();
    this.cleanupStream();
    const command = this.detachCommand();
    if (command) {
      this.terminateCommand(command);
    }

    if (!this.opened) {
      this.shouldStop = true;
      this.metrics.recordSourceFatal();
      const fatal = new FrameSourceError(
        `Video source "${this.options.source}" could not be opened (${reason}): ${error.message}`,
        reason,
        { cause: error }
      );
      this.emit('fatal', { reason, error: fatal } satisfies FatalEvent);
      return;
    }

    this.emit('error', error);
    this.scheduleRecovery(reason);
  }

  private scheduleRecovery(reason: string) {
    this.restartCount += 1;
    const attempt = this.restartCount;
    const delayMs = computeRestartDelay(
      attempt,
      this.options.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS,
      this.options.restartMaxDelayMs ?? DEFAULT_RESTART_MAX_DELAY_MS
    );

    this.metrics.recordSourceRestart(reason);
    this.emit('recover', { reason, attempt, delayMs } satisfies RecoverEvent);

    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      this.startCommand();
    }, delayMs);
    this.restartTimer.unref();
  }

  private detachCommand(): FrameCommand | null {
    const command = this.command;
    this.commandCleanup?.();
    this.commandCleanup = null;
    this.command = null;
    return command;
  }

  /** SIGTERM, then SIGKILL once `forceKillTimeoutMs` passes without an exit. */
  private terminateCommand(command: FrameCommand, onExit?: () => void) {
    let settled = false;
    let killTimer: NodeJS.Timeout | null = null;
    const settle = () => {
      if (settled) {
        return;
      }
      settled = true;
      if (killTimer) {
        clearTimeout(killTimer);
        killTimer = null;
      }
      onExit?.();
    };

    command.once('end', settle);
    command.once('error', settle);
    command.kill('SIGTERM');

    const graceMs = this.options.forceKillTimeoutMs ?? DEFAULT_FORCE_KILL_TIMEOUT_MS;
    if (graceMs <= 0) {
      command.kill('SIGKILL');
      settle();
      return;
    }

    killTimer = setTimeout(() => {
      killTimer = null;
      command.kill('SIGKILL');
      settle();
    }, graceMs);
    killTimer.unref();
  }

  private cleanupStream() {
    if (!this.stream) {
      return;
    }

    this.streamCleanup?.();
    this.streamCleanup = null;

    if (!this.stream.destroyed) {
      this.stream.destroy();
    }

    this.stream = null;
    this.buffer = Buffer.alloc(0);
  }

  private resetStartTimer() {
    this.clearStartTimer();
    const timeout = this.options.startTimeoutMs ?? DEFAULT_START_TIMEOUT_MS;
    if (timeout <= 0) {
      return;
    }

    this.startTimer = setTimeout(() => {
      this.startTimer = null;
      this.handleFailure('start-timeout', new Error('Video source failed to start before timeout'));
    }, timeout);
    this.startTimer.unref();
  }

  private resetIdleTimer() {
    this.clearIdleTimer();
    const timeout = this.options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    if (timeout <= 0) {
      return;
    }

    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      this.handleFailure('stream-idle', new Error('Video source stream idle timeout'));
    }, timeout);
    this.idleTimer.unref();
  }

  private clearStartTimer() {
    if (this.startTimer) {
      clearTimeout(this.startTimer);
      this.startTimer = null;
    }
  }

  private clearIdleTimer() {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private clearTimers() {
    this.clearStartTimer();
    this.clearIdleTimer();
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
  }

  private isMissingBinary(error: unknown) {
    if (!(error instanceof Error)) {
      return false;
    }
    const code = 'code' in error ? error.code : undefined;
    return code === 'ENOENT' || /cannot find ffmpeg/i.test(error.message);
  }
}

export function computeRestartDelay(attempt: number, minDelayMs: number, maxDelayMs: number) {
  const min = Math.max(0, minDelayMs);
  const max = Math.max(min, maxDelayMs);
  return Math.min(max, Math.round(min * 2 ** Math.max(0, attempt - 1)));
}

export function extractFrames(buffer: Buffer, maxBufferBytes = DEFAULT_MAX_BUFFER_BYTES) {
  let working = buffer;
  const frames: Buffer[] = [];
  let corrupted = false;

  while (true) {
    const pngStart = working.indexOf(PNG_SIGNATURE);

    if (pngStart === -1) {
      if (working.length > maxBufferBytes) {
        corrupted = true;
        working = Buffer.alloc(0);
      }
      break;
    }

    if (pngStart > 0) {
      working = working.subarray(pngStart);
    }

    const frame = slicePng(working);
    if (!frame) {
      if (working.length > maxBufferBytes) {
        corrupted = true;
        working = Buffer.alloc(0);
      }
      break;
    }

    frames.push(frame.png);
    working = frame.remainder;
  }

  return { frames, remainder: working, corrupted };
}

export type SliceResult = {
  png: Buffer;
  remainder: Buffer;
};

export function slicePng(buffer: Buffer): SliceResult | null {
  if (buffer.length < PNG_SIGNATURE.length) {
    return null;
  }

  if (!buffer.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
    return null;
  }

  let offset = PNG_SIGNATURE.length;

  while (offset + 8 <= buffer.length) {
    const length = buffer.readUInt32BE(offset);
    const chunkType = buffer.toString('ascii', offset + 4, offset + 8);
    const chunkEnd = offset + 8 + length + 4;

    if (chunkEnd > buffer.length) {
      return null;
    }

    offset = chunkEnd;

    if (chunkType === 'IEND') {
      return {
        png: buffer.subarray(0, offset),
        remainder: buffer.subarray(offset)
      };
    }
  }

  return null;
}

export default VideoSource;
