import type { Channel, ChannelOutcome, SnapshotRef } from '../types.js';
import {
  IMAGE_TIMEOUT_MS,
  TEXT_TIMEOUT_MS,
  hasValue,
  postWithTimeout,
  skipped,
  toChannelOutcome,
  type FetchLike
} from './http.js';

export const TELEGRAM_API_BASE = 'https://api.telegram.org';

export type TelegramChannelOptions = {
  token: string;
  chatId: string;
  apiBaseUrl?: string;
  textTimeoutMs?: number;
  imageTimeoutMs?: number;
  fetch?: FetchLike;
};

/**
 * Bot API delivery. With a snapshot the alert goes out as `sendPhoto` with the
 * message as caption, otherwise as a plain `sendMessage`.
 */
export class TelegramChannel implements Channel {
  readonly name = 'telegram';
  readonly enabled: boolean;

  constructor(private readonly options: TelegramChannelOptions) {
    this.enabled = hasValue(options.token) && hasValue(options.chatId);
  }

  async send(message: string, snapshot?: SnapshotRef | null): Promise<ChannelOutcome> {
    if (!this.enabled) {
      return skipped(this.name);
    }

    const chatId = this.options.chatId.trim();

    if (snapshot) {
      const form = new FormData();
      form.append('chat_id', chatId);
      form.append('caption', message);
      form.append('photo', new Blob([snapshot.data], { type: snapshot.contentType }), snapshot.fileName);
      const result = await postWithTimeout(this.methodUrl('sendPhoto'), {
        body: form,
        timeoutMs: this.options.imageTimeoutMs ?? IMAGE_TIMEOUT_MS,
        fetch: this.options.fetch
      });
      return toChannelOutcome(this.name, result);
    }

    const result = await postWithTimeout(this.methodUrl('sendMessage'), {
      body: new URLSearchParams({ chat_id: chatId, text: message }),
      timeoutMs: this.options.textTimeoutMs ?? TEXT_TIMEOUT_MS,
      fetch: this.options.fetch
    });
    return toChannelOutcome(this.name, result);
  }

  private methodUrl(method: 'sendPhoto' | 'sendMessage') {
    const base = (this.options.apiBaseUrl ?? TELEGRAM_API_BASE).replace(/\/+$/, '');
    return `${base}/bot${this.options.token.trim()}/${method}`;
  }
}

export default TelegramChannel;
