/**
 * JSON-over-HTTP helpers for upstream data sources.
 *
 * 429 and 5xx responses, timeouts and network failures become retryable
 * UpstreamUnavailableErrors; 404 reads as "no data"; any other 4xx or a body
 * that fails its schema is a permanent failure for that call.
 */
import type { z } from 'zod';
import { config } from './config.js';
import { UpstreamUnavailableError } from './errors.js';

export interface RequestOptions {
  timeoutMs?: number;
  query?: Record<string, string | number | undefined>;
  // Caller cancellation, on top of the per-request timeout
  signal?: AbortSignal;
}

export function buildUrl(baseUrl: string, path: string, query: RequestOptions['query'] = {}): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}${path}`);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

async function send(source: string, url: string, accept: string, options: RequestOptions): Promise<Response | null> {
  const timeoutMs = options.timeoutMs ?? config.upstream.requestTimeoutMs;
  const { signal } = options;
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const cancel = () => controller.abort();
  if (signal?.aborted) cancel();
  signal?.addEventListener('abort', cancel, { once: true });

  let response: Response;
  try {
    response = await fetch(url, {
      headers: { accept },
      signal: controller.signal,
    });
  } catch (error) {
    const reason =
      timedOut || (error instanceof Error && error.name === 'TimeoutError')
        ? `timed out after ${timeoutMs}ms`
        : signal?.aborted
          ? 'request canceled'
          : error instanceof Error
            ? error.message
            : String(error);
    throw new UpstreamUnavailableError(source, reason);
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', cancel);
  }

  if (response.status === 404) return null;
  if (response.status === 429 || response.status >= 500) {
    throw new UpstreamUnavailableError(source, `HTTP ${response.status}`);
  }
  if (!response.ok) {
    throw new UpstreamUnavailableError(source, `HTTP ${response.status}`, false);
  }
  return response;
}

export async function getJson<T extends z.ZodType>(
  source: string,
  url: string,
  schema: T,
  options: RequestOptions = {}
): Promise<z.output<T> | null> {
  const response = await send(source, url, 'application/json', options);
  if (!response) return null;

  let body: unknown;
  try {
    body = await response.json();
  } catch {
    throw new UpstreamUnavailableError(source, 'response was not valid JSON', false);
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new UpstreamUnavailableError(source, 'unexpected response shape', false);
  }
  return parsed.data;
}

export async function getText(source: string, url: string, options: RequestOptions = {}): Promise<string | null> {
  const response = await send(source, url, 'text/plain', options);
  return response ? (await response.text()).trim() : null;
}
