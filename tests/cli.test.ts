import { EventEmitter } from 'node:events';
import { PassThrough, Writable } from 'node:stream';
import { describe, expect, it, vi } from 'vitest';
import { parseArgs, readPackageVersion, runCli } from '../src/cli.js';
import { applyConfigOverrides, loadConfig } from '../src/config/index.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { startSmartCam, type SmartCamStartOptions } from '../src/run-smartcam.js';
import type { VideoInput } from '../src/video/source.js';
import { createTestLogger } from './helpers/logger.js';

class MemoryStream extends Writable {
  public data = '';

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    this.data += chunk.toString();
    callback();
  }
}

class FakeCommand extends EventEmitter {
  public readonly killedSignals: NodeJS.Signals[] = [];

  pipe(destination: PassThrough) {
    return destination;
  }

  kill(signal: NodeJS.Signals) {
    this.killedSignals.push(signal);
    return this;
  }
}

function createIo() {
  return { stdout: new MemoryStream(), stderr: new MemoryStream() };
}

function createHarness() {
  const commands: FakeCommand[] = [];
  const inputs: VideoInput[] = [];
  const start = vi.fn((options: SmartCamStartOptions) =>
    startSmartCam({
      ...options,
      config: applyConfigOverrides(options.config ?? loadConfig(), { video: { forceKillTimeoutMs: 0 } }),
      channels: [],
      snapshots: null,
      logger: createTestLogger(),
      metrics: new MetricsRegistry(),
      commandFactory: input => {
        inputs.push(input);
        const command = new FakeCommand();
        commands.push(command);
        return command;
      }
    })
  );
  const signals = new EventEmitter();
  return { start, signals, commands, inputs };
}

describe('CliArgs', () => {
  it('maps flags onto configuration overrides', () => {
    const args = parseArgs([
      '--source',
      'rtsp://camera.local/stream',
      '--min-area=0.05',
      '--min-motion-frames',
      '3',
      '--cooldown',
      '10',
      '--save-dir',
      'snaps',
      '--max-fps',
      '4',
      '--no-alarm',
      '--webhook-url',
      'https://hooks.example.test/motion',
      '--telegram-token',
      'test-token',
      '--telegram-chat-id',
      '42',
      '--discord-webhook',
      'https://discord.example.test/api/webhooks/1/test-secret',
      '--log-level',
      'DEBUG'
    ]);

    expect(args.configPath).toBeNull();
    expect(args.overrides).toEqual({
      video: { source: 'rtsp://camera.local/stream' },
      motion: { minArea: 0.05 },
      pipeline: { confirmFrames: 3, cooldownSeconds: 10, maxFps: 4 },
      snapshots: { directory: 'snaps' },
      alarm: { enabled: false },
      notify: {
        webhook: { url: 'https://hooks.example.test/motion' },
        telegram: { token: 'test-token', chatId: '42' },
        discord: { webhookUrl: 'https://discord.example.test/api/webhooks/1/test-secret' }
      },
      logging: { level: 'debug' }
    });
  });

  it('accepts a configuration file path', () => {
    expect(parseArgs(['--config', 'smartcam.json']).configPath).toBe('smartcam.json');
  });

  it('rejects malformed input', () => {
    expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus');
    expect(() => parseArgs(['--cooldown'])).toThrow('Missing value for --cooldown');
    expect(() => parseArgs(['--cooldown', '--no-alarm'])).toThrow('Missing value for --cooldown');
    expect(() => parseArgs(['--cooldown', 'soon'])).toThrow('Invalid number for --cooldown: soon');
    expect(() => parseArgs(['--min-motion-frames', '2.5'])).toThrow(
      'Expected an integer for --min-motion-frames: 2.5'
    );
    expect(() => parseArgs(['--log-level', 'loud'])).toThrow(/^Invalid value for --log-level: loud/);
  });
});

describe('CliRun', () => {
  it('prints usage for --help', async () => {
    const io = createIo();

    await expect(runCli(['--help'], io)).resolves.toBe(0);
    expect(io.stdout.data.split('\n')[0]).toBe('SmartCam motion alerts');
  });

  it('prints the package version', async () => {
    const io = createIo();

    await expect(runCli(['--version'], io)).resolves.toBe(0);
    expect(io.stdout.data).toBe(`${readPackageVersion()}\n`);
    expect(readPackageVersion()).toBe('0.1.0');
  });

  it('exits with 1 on usage errors', async () => {
    const io = createIo();

    await expect(runCli(['--bogus'], io)).resolves.toBe(1);
    expect(io.stderr.data.startsWith('Unknown option: --bogus\n\nSmartCam motion alerts\n')).toBe(true);
  });

  it('exits with 1 when the merged configuration is invalid', async () => {
    const io = createIo();
    const { start, signals } = createHarness();

    await expect(runCli(['--min-area', '2'], io, { start, signals })).resolves.toBe(1);
    expect(io.stderr.data).toBe('Invalid configuration: config.motion.minArea must be <= 1\n');
    expect(start).not.toHaveBeenCalled();
  });

  it('exits with 1 when the video source cannot be opened', async () => {
    const io = createIo();
    const { start, signals, commands, inputs } = createHarness();

    const exit = runCli(['--source', 'porch.mp4'], io, { start, signals });
    commands[0].emit('error', new Error('porch.mp4: No such file or directory'));

    await expect(exit).resolves.toBe(1);
    expect(inputs[0].input).toBe('porch.mp4');
    expect(io.stderr.data).toBe(
      'SmartCam stopped: Video source "porch.mp4" could not be opened (ffmpeg-error): porch.mp4: No such file or directory\n'
    );
    expect(signals.listenerCount('SIGINT')).toBe(0);
    expect(signals.listenerCount('SIGTERM')).toBe(0);
  });

  it('stops cleanly on SIGINT', async () => {
    const io = createIo();
    const { start, signals, commands } = createHarness();

    const exit = runCli(['--source', 'porch.mp4'], io, { start, signals });
    expect(signals.listenerCount('SIGINT')).toBe(1);
    signals.emit('SIGINT');

    await expect(exit).resolves.toBe(0);
    expect(commands[0].killedSignals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(io.stderr.data).toBe('');
    expect(signals.listenerCount('SIGTERM')).toBe(0);
  });
});
