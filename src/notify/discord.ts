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

export const DEFAULT_DISPLAY_NAME = 'SmartCam';

export type DiscordChannelOptions = {
  webhookUrl: string;
  username?: string;
  textTimeoutMs?: number;
  imageTimeoutMs?: number;
  fetch?: FetchLike;
};

export class DiscordChannel implements Channel {
  readonly name = 'discord';
  readonly enabled: boolean;
  private readonly username: string;

  constructor(private readonly options: DiscordChannelOptions) {
    this.enabled = hasValue(options.webhookUrl);
    this.username = hasValue(options.username) ? options.username.trim() : DEFAULT_DISPLAY_NAME;
  }

  async send(message: string, snapshot?: SnapshotRef | null): Promise<ChannelOutcome> {
    if (!this.enabled) {
      return skipped(this.name);
    }

    const url = this.options.webhookUrl.trim();

    if (snapshot) {
      const form = new FormData();
      form.append('content', message);
      form.append('username', this.username);
      form.append('file', new Blob([snapshot.data], { type: snapshot.contentType }), snapshot.fileName);
      const result = await postWithTimeout(url, {
        body: form,
        timeoutMs: this.options.imageTimeoutMs ?? IMAGE_TIMEOUT_MS,
        fetch: this.options.fetch
      });
      return toChannelOutcome(this.name, result);
    }

    const result = await postWithTimeout(url, {
      body: JSON.stringify({ content: message, username: this.username }),
      headers: { 'Content-Type': 'application/json' },
      timeoutMs: this.options.textTimeoutMs ?? TEXT_TIMEOUT_MS,
      fetch: this.options.fetch
    });
    return toChannelOutcome(this.name, result);
  }
}

export default DiscordChannel;
