import { spawn as nodeSpawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import type { Channel, ChannelOutcome, SnapshotRef } from '../types.js';
import { TEXT_TIMEOUT_MS, skipped } from './http.js';

export const MAC_ALERT_SOUND = '/System/Library/Sounds/Glass.aiff';
const TERMINAL_BELL = '\u0007';

/** The part of a spawned child process the alarm waits on and kills. */
export interface AlarmProcess extends EventEmitter {
  kill(signal?: NodeJS.Signals): unknown;
}

type SpawnFn = (command: string, args: string[]) => AlarmProcess;

export type AlarmCommand = { command: string; args: string[] };

export type LocalAlarmOptions = {
  enabled: boolean;
  platform?: NodeJS.Platform;
  spawn?: SpawnFn;
  write?: (chunk: string) => void;
  timeoutMs?: number;
};

export function resolveAlarmCommand(platform: NodeJS.Platform): AlarmCommand | null {
  switch (platform) {
    case 'darwin':
      return { command: 'afplay', args: [MAC_ALERT_SOUND] };
    case 'win32':
      return { command: 'powershell', args: ['-NoProfile', '-Command', '[console]::beep(1000,500)'] };
    default:
      return null;
  }
}

/** Host-side audible alert, reported like any other channel. */
export class LocalAlarm implements Channel {
  readonly name = 'alarm';
  readonly enabled: boolean;
  private readonly platform: NodeJS.Platform;
  private readonly spawnFn: SpawnFn;
  private readonly write: (chunk: string) => void;
  private readonly timeoutMs: number;

  constructor(options: LocalAlarmOptions) {
    this.enabled = options.enabled;
    this.timeoutMs = options.timeoutMs ?? TEXT_TIMEOUT_MS;
    this.platform = options.platform ?? process.platform;
    this.spawnFn = options.spawn ?? ((command, args) => nodeSpawn(command, args, { stdio: 'ignore' }));
    this.write = options.write ?? (chunk => {
      process.stdout.write(chunk);
    });
  }

  async send(_message: string, _snapshot?: SnapshotRef | null): Promise<ChannelOutcome> {
    if (!this.enabled) {
      return skipped(this.name);
    }

    const start = performance.now();
    const command = resolveAlarmCommand(this.platform);

    if (!command) {
      try {
        this.write(TERMINAL_BELL);
        return { status: 'delivered', channel: this.name, statusCode: null, durationMs: performance.now() - start };
      } catch (error) {
        return this.failed(error, start);
      }
    }

    return new Promise<ChannelOutcome>(resolve => {
      let child: AlarmProcess;
      try {
        child = this.spawnFn(command.command, command.args);
      } catch (error) {
        resolve(this.failed(error, start));
        return;
      }

      let settled = false;
      const finish = (outcome: ChannelOutcome) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(outcome);
      };

      const timer = setTimeout(() => {
        child.kill('SIGKILL');
        finish(this.failed(new Error(`${command.command} timed out after ${this.timeoutMs}ms`), start));
      }, this.timeoutMs);
      timer.unref();

      child.once('error', (error: Error) => {
        finish(this.failed(error, start));
      });
      child.once('exit', (code: number | null) => {
        if (code === 0) {
          finish({ status: 'delivered', channel: this.name, statusCode: null, durationMs: performance.now() - start });
          return;
        }
        finish({
          status: 'failed',
          channel: this.name,
          reason: `${command.command} exited with code ${code ?? 'null'}`,
          durationMs: performance.now() - start
        });
      });
    });
  }

  private failed(error: unknown, start: number): ChannelOutcome {
    return {
      status: 'failed',
      channel: this.name,
      reason: error instanceof Error ? error.message : String(error),
      durationMs: performance.now() - start
    };
  }
}

export default LocalAlarm;
