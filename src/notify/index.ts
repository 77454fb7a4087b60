import type { SmartCamConfig } from '../config/index.js';
import type { Channel } from '../types.js';
import { LocalAlarm } from './alarm.js';
import { DiscordChannel } from './discord.js';
import type { FetchLike } from './http.js';
import { TelegramChannel } from './telegram.js';
import { GenericWebhookChannel } from './webhook.js';

export type CreateChannelsOptions = {
  fetch?: FetchLike;
  alarm?: Channel;
};

export function createChannels(config: SmartCamConfig, options: CreateChannelsOptions = {}): Channel[] {
  const { notify } = config;
  return [
    new GenericWebhookChannel({
      url: notify.webhook.url,
      timeoutMs: notify.textTimeoutMs,
      fetch: options.fetch
    }),
    new TelegramChannel({
      token: notify.telegram.token,
      chatId: notify.telegram.chatId,
      apiBaseUrl: notify.telegram.apiBaseUrl,
      textTimeoutMs: notify.textTimeoutMs,
      imageTimeoutMs: notify.imageTimeoutMs,
      fetch: options.fetch
    }),
    new DiscordChannel({
      webhookUrl: notify.discord.webhookUrl,
      username: notify.discord.username,
      textTimeoutMs: notify.textTimeoutMs,
      imageTimeoutMs: notify.imageTimeoutMs,
      fetch: options.fetch
    }),
    options.alarm ?? new LocalAlarm({ enabled: config.alarm.enabled, timeoutMs: notify.textTimeoutMs })
  ];
}

export { EventDispatcher, formatEventMessage, formatLocalTimestamp } from './dispatcher.js';
export { GenericWebhookChannel } from './webhook.js';
export { TelegramChannel, TELEGRAM_API_BASE } from './telegram.js';
export { DiscordChannel, DEFAULT_DISPLAY_NAME } from './discord.js';
export { LocalAlarm, resolveAlarmCommand } from './alarm.js';
export type { FetchLike } from './http.js';
