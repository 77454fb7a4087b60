import { performance } from 'node:perf_hooks';
import type { ChannelOutcome } from '../types.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export const TEXT_TIMEOUT_MS = 5_000;
export const IMAGE_TIMEOUT_MS = 10_000;
const ERROR_BODY_LIMIT = 200;

export type HttpPostResult =
  | { ok: true; statusCode: number; durationMs: number }
  | { ok: false; reason: string; statusCode?: number; durationMs: number };

export type PostOptions = {
  body: NonNullable<RequestInit['body']>;
  headers?: Record<string, string>;
  timeoutMs: number;
  fetch?: FetchLike;
};

export function resolveFetch(candidate?: FetchLike): FetchLike {
  return candidate ?? ((input, init) => fetch(input, init));
}

/**
 * POSTs once with a hard timeout. Never throws: a status of 300 or more, a
 * network error and a timeout all come back as `{ ok: false }`.
 */
export async function postWithTimeout(url: string, options: PostOptions): Promise<HttpPostResult> {
  const fetchImpl = resolveFetch(options.fetch);
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
  const start = performance.now();

  try {
    const response = await fetchImpl(url, {
      method: 'POST',
      headers: options.headers,
      body: options.body,
      signal: controller.signal
    });
    const durationMs = performance.now() - start;

    if (response.status >= 300) {
      const text = await response.text().catch(() => '');
      return {
        ok: false,
        statusCode: response.status,
        reason: `HTTP ${response.status}: ${text.slice(0, ERROR_BODY_LIMIT)}`.trimEnd(),
        durationMs
      };
    }

    // release the connection
    await response.body?.cancel().catch(() => undefined);
    return { ok: true, statusCode: response.status, durationMs };
  } catch (error) {
    const durationMs = performance.now() - start;
    if (controller.signal.aborted) {
      return { ok: false, reason: `Request timed out after ${options.timeoutMs}ms`, durationMs };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, reason: message, durationMs };
  } finally {
    clearTimeout(timeoutId);
  }
}

export function toChannelOutcome(channel: string, result: HttpPostResult): ChannelOutcome {
  if (result.ok) {
    return {
      status: 'delivered',
      channel,
      statusCode: result.statusCode,
      durationMs: result.durationMs
    };
  }
  return {
    status: 'failed',
    channel,
    reason: result.reason,
    statusCode: result.statusCode,
    durationMs: result.durationMs
  };
}

export function skipped(channel: string): ChannelOutcome {
  return { status: 'skipped', channel, reason: 'disabled' };
}

export function hasValue(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}
