import { EventEmitter } from 'node:events';
import { describe, expect, it, vi } from 'vitest';
import { MetricsRegistry } from '../src/metrics/index.js';
import { LocalAlarm, MAC_ALERT_SOUND, resolveAlarmCommand } from '../src/notify/alarm.js';
import { EventDispatcher } from '../src/notify/dispatcher.js';
import { GenericWebhookChannel } from '../src/notify/webhook.js';
import { createTestLogger } from './helpers/logger.js';

class FakeChild extends EventEmitter {
  public readonly killedSignals: (NodeJS.Signals | undefined)[] = [];

  kill(signal?: NodeJS.Signals) {
    this.killedSignals.push(signal);
    return true;
  }
}

function fakeSpawn() {
  const children: FakeChild[] = [];
  const spawn = vi.fn((_command: string, _args: string[]) => {
    const child = new FakeChild();
    children.push(child);
    return child;
  });
  return { spawn, children };
}

describe('LocalAlarm', () => {
  it('rings the terminal bell on platforms without a sound player', async () => {
    const write = vi.fn();
    const alarm = new LocalAlarm({ enabled: true, platform: 'linux', write });

    const outcome = await alarm.send('Motion detected');

    expect(write).toHaveBeenCalledWith('\u0007');
    expect(outcome).toMatchObject({ status: 'delivered', channel: 'alarm', statusCode: null });
  });

  it('plays the system sound on macOS', async () => {
    const { spawn, children } = fakeSpawn();
    const alarm = new LocalAlarm({ enabled: true, platform: 'darwin', spawn });

    const pending = alarm.send('Motion detected');
    children[0].emit('exit', 0);

    await expect(pending).resolves.toMatchObject({ status: 'delivered', channel: 'alarm' });
    expect(spawn).toHaveBeenCalledWith('afplay', [MAC_ALERT_SOUND]);
  });

  it('reports a non-zero exit as failed', async () => {
    const { spawn, children } = fakeSpawn();
    const alarm = new LocalAlarm({ enabled: true, platform: 'win32', spawn });

    const pending = alarm.send('Motion detected');
    children[0].emit('exit', 1);

    await expect(pending).resolves.toMatchObject({
      status: 'failed',
      reason: 'powershell exited with code 1'
    });
  });

  it('reports spawn errors as failed', async () => {
    const { spawn, children } = fakeSpawn();
    const alarm = new LocalAlarm({ enabled: true, platform: 'darwin', spawn });

    const pending = alarm.send('Motion detected');
    children[0].emit('error', new Error('spawn afplay ENOENT'));

    await expect(pending).resolves.toMatchObject({ status: 'failed', reason: 'spawn afplay ENOENT' });
  });

  it('kills a player that never exits and reports a timeout', async () => {
    const { spawn, children } = fakeSpawn();
    const alarm = new LocalAlarm({ enabled: true, platform: 'darwin', spawn, timeoutMs: 20 });

    await expect(alarm.send('Motion detected')).resolves.toMatchObject({
      status: 'failed',
      channel: 'alarm',
      reason: 'afplay timed out after 20ms'
    });
    expect(children[0].killedSignals).toEqual(['SIGKILL']);

    children[0].emit('exit', null);
  });

  it('lets the dispatch finish when the player hangs', async () => {
    const { spawn } = fakeSpawn();
    const alarm = new LocalAlarm({ enabled: true, platform: 'darwin', spawn, timeoutMs: 20 });
    const webhook = new GenericWebhookChannel({
      url: 'https://hooks.example.test/motion',
      fetch: async () => new Response('ok', { status: 200 })
    });
    const dispatcher = new EventDispatcher({
      channels: [webhook, alarm],
      log: createTestLogger(),
      metrics: new MetricsRegistry()
    });

    const report = await dispatcher.dispatch(null, new Date(2024, 0, 1, 12, 0, 0));

    expect(report.outcomes.map(outcome => outcome.status)).toEqual(['delivered', 'failed']);
  });

  it('is skipped when disabled', async () => {
    const { spawn } = fakeSpawn();
    const write = vi.fn();
    const alarm = new LocalAlarm({ enabled: false, platform: 'darwin', spawn, write });

    await expect(alarm.send('Motion detected')).resolves.toEqual({
      status: 'skipped',
      channel: 'alarm',
      reason: 'disabled'
    });
    expect(spawn).not.toHaveBeenCalled();
    expect(write).not.toHaveBeenCalled();
  });

  it('resolves the beep command per platform', () => {
    expect(resolveAlarmCommand('win32')).toEqual({
      command: 'powershell',
      args: ['-NoProfile', '-Command', '[console]::beep(1000,500)']
    });
    expect(resolveAlarmCommand('linux')).toBeNull();
  });
});
