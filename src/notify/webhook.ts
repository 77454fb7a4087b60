import type { Channel, ChannelOutcome, SnapshotRef } from '../types.js';
import { TEXT_TIMEOUT_MS, hasValue, postWithTimeout, skipped, toChannelOutcome, type FetchLike } from './http.js';

export type GenericWebhookOptions = {
  url: string;
  timeoutMs?: number;
  fetch?: FetchLike;
};

/** Text-only JSON webhook (Slack-compatible `{ "text": ... }` payload). */
export class GenericWebhookChannel implements Channel {
  readonly name = 'webhook';
  readonly enabled: boolean;

  constructor(private readonly options: GenericWebhookOptions) {
    this.enabled = hasValue(options.url);
  }

  async send(message: string, _snapshot?: SnapshotRef | null): Promise<ChannelOutcome> {
    if (!this.enabled) {
      return skipped(this.name);
    }

    const result = await postWithTimeout(this.options.url.trim(), {
      body: JSON.stringify({ text: message }),
      headers: { 'Content-Type': 'application/json' },
      timeoutMs: this.options.timeoutMs ?? TEXT_TIMEOUT_MS,
      fetch: this.options.fetch
    });
    return toChannelOutcome(this.name, result);
  }
}

export default GenericWebhookChannel;
