/**
 * HTTP client for the Zendesk REST API with a bounded timeout and a simple
 * retry on rate-limit responses.
 *
 * Every failure to get a successful response (network error, timeout,
 * non-2xx status, unparseable body) surfaces as SourceUnavailableError.
 */

import type { ZendeskCredentials } from '../config';
import { SourceUnavailableError } from '../errors';
import { createLogger } from '../logger';
import { zendeskRequestDuration } from '../metrics';

const logger = createLogger('zendesk-client');

export interface ZendeskClientOptions {
  /** Abort each request after this many ms (default: 10000). */
  timeoutMs?: number;
  /** Retry attempts on 429 (default: 2). */
  maxRetries?: number;
  /** Used when a 429 carries no usable Retry-After header (default: 10). */
  defaultRetryAfterSeconds?: number;
}

export interface ProbeResult {
  status: number;
  body: string;
}

export interface ZendeskClient {
  readonly domain: string;
  readonly user: string;
  request<T>(path: string): Promise<T>;
  /** Single GET that reports the upstream status instead of throwing on non-2xx. */
  probe(path: string): Promise<ProbeResult>;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

export function createZendeskClient(credentials: ZendeskCredentials, options: ZendeskClientOptions = {}): ZendeskClient {
  const { domain, user, apiKey } = credentials;
  const { timeoutMs = 10_000, maxRetries = 2, defaultRetryAfterSeconds = 10 } = options;
  const authorization = `Basic ${Buffer.from(`${user}/token:${apiKey}`).toString('base64')}`;

  function resolveUrl(path: string): string {
    return path.startsWith('http') ? path : `https://${domain}${path}`;
  }

  async function send(url: string): Promise<Response> {
    const stopTimer = zendeskRequestDuration.startTimer();
    try {
      const res = await fetch(url, {
        method: 'GET',
        headers: {
          'Content-Type': 'application/json',
          Authorization: authorization,
        },
        signal: AbortSignal.timeout(timeoutMs),
      });
      stopTimer({ status: String(res.status) });
      return res;
    } catch (err) {
      stopTimer({ status: isTimeout(err) ? 'timeout' : 'network_error' });
      if (isTimeout(err)) {
        throw new SourceUnavailableError(`Zendesk request timed out after ${timeoutMs}ms`, { url, cause: err });
      }
      const detail = err instanceof Error ? err.message : String(err);
      throw new SourceUnavailableError(`Could not reach Zendesk: ${detail}`, { url, cause: err });
    }
  }

  async function request<T>(path: string): Promise<T> {
    const url = resolveUrl(path);
    let retries = 0;

    while (true) {
      const res = await send(url);

      if (res.status === 429) {
        const rawRetryAfter = parseInt(res.headers.get('Retry-After') ?? String(defaultRetryAfterSeconds), 10);
        const retryAfter = Number.isNaN(rawRetryAfter) ? defaultRetryAfterSeconds : rawRetryAfter;
        if (retries >= maxRetries) {
          throw new SourceUnavailableError(`Zendesk rate limit exceeded after ${maxRetries} retries`, { status: 429, url });
        }
        retries++;
        logger.warn({ url, retryAfter, attempt: retries }, 'Zendesk rate limited, retrying');
        await sleep(retryAfter * 1000);
        continue;
      }

      if (!res.ok) {
        const errorBody = await res.text().catch(() => '');
        throw new SourceUnavailableError(
          `Zendesk API error: ${res.status} ${res.statusText}${errorBody ? ` - ${errorBody.slice(0, 200)}` : ''}`,
          { status: res.status, url },
        );
      }

      try {
        return (await res.json()) as T;
      } catch (err) {
        throw new SourceUnavailableError('Zendesk returned a non-JSON response', { status: res.status, url, cause: err });
      }
    }
  }

  async function probe(path: string): Promise<ProbeResult> {
    const res = await send(resolveUrl(path));
    const body = await res.text().catch(() => '');
    return { status: res.status, body };
  }

  return { domain, user, request, probe };
}
