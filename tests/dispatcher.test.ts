import { describe, expect, it, vi } from 'vitest';
import { MetricsRegistry } from '../src/metrics/index.js';
import { EventDispatcher, formatEventMessage, formatLocalTimestamp } from '../src/notify/dispatcher.js';
import { DiscordChannel } from '../src/notify/discord.js';
import { TelegramChannel } from '../src/notify/telegram.js';
import { GenericWebhookChannel } from '../src/notify/webhook.js';
import type { Channel, DispatchReport, SnapshotRef, SnapshotStore } from '../src/types.js';
import { createTestLogger } from './helpers/logger.js';

const WEBHOOK_URL = 'https://hooks.example.test/motion';
const DISCORD_URL = 'https://discord.example.test/api/webhooks/1/abc';
const FRAME = Buffer.from([0x89, 0x50, 0x4e, 0x47]);
const EVENT_TIME = new Date(2024, 0, 2, 3, 4, 5);

function routedFetch(statusByHost: Record<string, number>) {
  return vi.fn(async (url: string, _init: RequestInit) => {
    const status = statusByHost[new URL(url).host] ?? 200;
    return new Response(status === 404 ? 'Unknown Webhook' : 'ok', { status });
  });
}

function fakeSnapshots() {
  return {
    persist: vi.fn(async (frame: Buffer, _at: Date): Promise<SnapshotRef> => ({
      path: 'events/event_20240102_030405.png',
      fileName: 'event_20240102_030405.png',
      contentType: 'image/png',
      data: frame
    }))
  };
}

function createChannels(fetch: ReturnType<typeof routedFetch>) {
  return [
    new GenericWebhookChannel({ url: WEBHOOK_URL, fetch }),
    new TelegramChannel({ token: 'test-token', chatId: '42', fetch }),
    new DiscordChannel({ webhookUrl: DISCORD_URL, fetch })
  ];
}

describe('formatEventMessage', () => {
  it('renders the local timestamp', () => {
    expect(formatLocalTimestamp(EVENT_TIME)).toBe('2024-01-02 03:04:05');
    expect(formatEventMessage(EVENT_TIME)).toBe('Motion detected at 2024-01-02 03:04:05');
  });
});

describe('EventDispatcher', () => {
  it('DispatcherIsolatesChannelFailures when the image webhook returns 404', async () => {
    const fetch = routedFetch({ 'discord.example.test': 404 });
    const metrics = new MetricsRegistry();
    const dispatcher = new EventDispatcher({
      channels: createChannels(fetch),
      snapshots: fakeSnapshots(),
      log: createTestLogger(),
      metrics
    });

    const report = await dispatcher.dispatch(FRAME, EVENT_TIME);

    expect(report.message).toBe('Motion detected at 2024-01-02 03:04:05');
    expect(report.snapshotPath).toBe('events/event_20240102_030405.png');
    expect(report.outcomes.map(outcome => [outcome.channel, outcome.status])).toEqual([
      ['webhook', 'delivered'],
      ['telegram', 'delivered'],
      ['discord', 'failed']
    ]);
    expect(report.outcomes[2]).toMatchObject({ reason: 'HTTP 404: Unknown Webhook', statusCode: 404 });
    expect(fetch).toHaveBeenCalledTimes(3);

    const snapshot = metrics.snapshot();
    expect(snapshot.channels.discord.failed).toBe(1);
    expect(snapshot.channels.discord.lastFailureReason).toBe('HTTP 404: Unknown Webhook');
    expect(snapshot.channels.webhook.delivered).toBe(1);
  });

  it('DispatcherRepeatsDelivery for the same event dispatched twice', async () => {
    const fetch = routedFetch({});
    const dispatcher = new EventDispatcher({
      channels: createChannels(fetch),
      snapshots: null,
      log: createTestLogger(),
      metrics: new MetricsRegistry()
    });

    await dispatcher.dispatch(FRAME, EVENT_TIME);
    await dispatcher.dispatch(FRAME, EVENT_TIME);

    const urls = fetch.mock.calls.map(([url]) => url);
    expect(urls).toHaveLength(6);
    expect(urls.filter(url => url === WEBHOOK_URL)).toHaveLength(2);
    expect(urls.filter(url => url === DISCORD_URL)).toHaveLength(2);
    expect(urls.filter(url => url.endsWith('/sendMessage'))).toHaveLength(2);
  });

  it('reports a channel that throws as failed without affecting the others', async () => {
    const fetch = routedFetch({});
    const broken: Channel = {
      name: 'broken',
      enabled: true,
      send: async () => {
        throw new Error('socket hang up');
      }
    };
    const dispatcher = new EventDispatcher({
      channels: [broken, new GenericWebhookChannel({ url: WEBHOOK_URL, fetch })],
      log: createTestLogger(),
      metrics: new MetricsRegistry()
    });

    const report = await dispatcher.dispatch(null, EVENT_TIME);

    expect(report.outcomes[0]).toMatchObject({ status: 'failed', channel: 'broken', reason: 'socket hang up' });
    expect(report.outcomes[1]).toMatchObject({ status: 'delivered', channel: 'webhook' });
  });

  it('sends text only when the snapshot cannot be saved', async () => {
    const fetch = routedFetch({});
    const metrics = new MetricsRegistry();
    const log = createTestLogger();
    const snapshots: SnapshotStore = {
      persist: async () => {
        throw new Error('EACCES: permission denied');
      }
    };
    const dispatcher = new EventDispatcher({
      channels: [new TelegramChannel({ token: 'test-token', chatId: '42', fetch })],
      snapshots,
      log,
      metrics
    });

    const report = await dispatcher.dispatch(FRAME, EVENT_TIME);

    expect(report.snapshotPath).toBeNull();
    expect(fetch.mock.calls[0][0]).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(metrics.getCounter('snapshots.failed')).toBe(1);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      'Failed to save event snapshot'
    );
  });

  it('does not persist anything without a frame', async () => {
    const snapshots = fakeSnapshots();
    const dispatcher = new EventDispatcher({
      channels: [],
      snapshots,
      log: createTestLogger(),
      metrics: new MetricsRegistry()
    });

    const report = await dispatcher.dispatch(null, EVENT_TIME);

    expect(snapshots.persist).not.toHaveBeenCalled();
    expect(report.outcomes).toEqual([]);
  });

  it('marks unconfigured channels as skipped and emits the report', async () => {
    const fetch = routedFetch({});
    const metrics = new MetricsRegistry();
    const dispatcher = new EventDispatcher({
      channels: [
        new GenericWebhookChannel({ url: '', fetch }),
        new DiscordChannel({ webhookUrl: DISCORD_URL, fetch })
      ],
      snapshots: fakeSnapshots(),
      log: createTestLogger(),
      metrics
    });
    const reports: DispatchReport[] = [];
    dispatcher.on('dispatch', (report: DispatchReport) => reports.push(report));

    const report = await dispatcher.dispatch(FRAME, EVENT_TIME);

    expect(report.outcomes[0]).toEqual({ status: 'skipped', channel: 'webhook', reason: 'disabled' });
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(reports).toEqual([report]);
    expect(metrics.snapshot().channels.webhook.skipped).toBe(1);
  });
});
