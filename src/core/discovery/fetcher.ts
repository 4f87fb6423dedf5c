/**
 * Shared HTTP client for sitemap and recipe page requests
 */

import { HTTP_CONSTANTS } from "../constants";
import { RecipeRouletteError, TransportError } from "../errors";
import type { HttpRetryPolicy, RequestOptions } from "../types";
import { Logger } from "../utils/logger";
import { withRetry } from "../utils/retry";
import { timeoutScope, type TimeoutScope } from "../utils/time";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  headers?: Record<string, string>;
  retry?: Partial<HttpRetryPolicy>;
  /** Swappable transport, e.g. an in-process fake in tests */
  fetch?: FetchLike;
}

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  "user-agent": HTTP_CONSTANTS.USER_AGENT,
  accept: HTTP_CONSTANTS.ACCEPT_HEADER,
  "accept-language": HTTP_CONSTANTS.ACCEPT_LANGUAGE,
  "accept-encoding": HTTP_CONSTANTS.ACCEPT_ENCODING,
  connection: HTTP_CONSTANTS.CONNECTION,
};

export const DEFAULT_RETRY_POLICY: Readonly<HttpRetryPolicy> = {
  maxRetries: HTTP_CONSTANTS.MAX_RETRIES,
  baseDelayMs: HTTP_CONSTANTS.RETRY_BASE_DELAY_MS,
  backoffMultiplier: HTTP_CONSTANTS.RETRY_BACKOFF_MULTIPLIER,
  jitterMs: HTTP_CONSTANTS.RETRY_JITTER_MS,
  retryStatuses: HTTP_CONSTANTS.RETRY_STATUSES,
};

/**
 * Parses a Retry-After header (delta seconds or HTTP date)
 * @returns Delay in milliseconds, or undefined when absent/unparseable
 */
export function parseRetryAfter(
  value: string | null,
  now = Date.now(),
): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  const at = Date.parse(trimmed);
  return Number.isNaN(at) ? undefined : Math.max(0, at - now);
}

/**
 * GET-only HTTP client with fixed headers, per-request timeout and retries
 * with exponential backoff on network errors and retryable statuses.
 */
export class HttpClient {
  private readonly headers: Record<string, string>;
  private readonly policy: HttpRetryPolicy;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpClientOptions = {}) {
    this.headers = { ...DEFAULT_HEADERS, ...lowerKeys(options.headers) };
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  /**
   * Performs a GET and hands the successful response to `consume`. Headers
   * must arrive within `connectTimeoutMs` (default `timeoutMs`); after that
   * the request fails only when the body stalls for `timeoutMs`.
   * @throws TransportError on network failure, timeout or a non-2xx status
   *         once retries are exhausted, or when the body cannot be read
   */
  async request<T>(
    url: string,
    options: RequestOptions,
    consume: (response: Response, signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const { response, scope } = await withRetry(
      () => this.attempt(url, options),
      {
        ...this.policy,
        signal: options.signal,
        retryCondition: (error) => this.isRetryable(error, options.signal),
        delayHint: (error) =>
          error instanceof TransportError ? error.retryAfterMs : undefined,
        onRetry: (error, attempt, delayMs) =>
          Logger.debug(`Retrying ${url}`, {
            url,
            attempt,
            delayMs,
            error: error.message,
          }),
      },
    );

    try {
      return await consume(response, scope.signal);
    } catch (error) {
      if (error instanceof RecipeRouletteError) throw error;
      const timedOut = scope.timedOut();
      throw new TransportError(
        timedOut
          ? `No data for ${options.timeoutMs}ms: ${url}`
          : `Failed to read response body from ${url}`,
        { url, status: response.status, timedOut, cause: error },
      );
    } finally {
      scope.dispose();
    }
  }

  /** GET and read the body as text */
  getText(url: string, options: RequestOptions): Promise<string> {
    return this.request(url, options, (response) => response.text());
  }

  private async attempt(
    url: string,
    options: RequestOptions,
  ): Promise<{ response: Response; scope: TimeoutScope }> {
    const headerTimeoutMs = options.connectTimeoutMs ?? options.timeoutMs;
    const scope = timeoutScope(headerTimeoutMs, options.signal);
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        redirect: "follow",
        headers: { ...this.headers, ...lowerKeys(options.headers) },
        signal: scope.signal,
      });
    } catch (error) {
      scope.dispose();
      const timedOut = scope.timedOut();
      throw new TransportError(
        timedOut
          ? `No response after ${headerTimeoutMs}ms: ${url}`
          : `Request failed: ${url}`,
        { url, timedOut, cause: error },
      );
    }

    if (!response.ok) {
      scope.dispose();
      await discardBody(response);
      throw new TransportError(`HTTP ${response.status} for ${url}`, {
        url,
        status: response.status,
        retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
      });
    }

    scope.restart(options.timeoutMs);
    return { response: withProgressTimeout(response, scope), scope };
  }

  private isRetryable(error: Error, signal?: AbortSignal): boolean {
    if (signal?.aborted) return false;
    if (!(error instanceof TransportError)) return false;
    return (
      error.status === undefined ||
      this.policy.retryStatuses.includes(error.status)
    );
  }
}

function lowerKeys(
  headers: Record<string, string> | undefined,
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers ?? {})) {
    out[key.toLowerCase()] = value;
  }
  return out;
}

/**
 * Re-wraps the body so every chunk restarts the scope's countdown and a
 * timeout or caller abort errors the stream
 */
function withProgressTimeout(response: Response, scope: TimeoutScope): Response {
  if (!response.body) return response;
  const reader = response.body.getReader();
  const { signal } = scope;

  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      const onAbort = () => {
        controller.error(signal.reason);
        reader.cancel(signal.reason).catch((error: unknown) =>
          Logger.debug("Could not cancel response body", {
            url: response.url,
            error: error instanceof Error ? error.message : String(error),
          }),
        );
      };
      if (signal.aborted) onAbort();
      else signal.addEventListener("abort", onAbort, { once: true });
    },
    async pull(controller) {
      const { done, value } = await reader.read();
      if (signal.aborted) return;
      if (done) {
        controller.close();
        return;
      }
      scope.restart();
      controller.enqueue(value);
    },
    cancel(reason) {
      return reader.cancel(reason);
    },
  });

  return new Response(body, {
    status: response.status,
    statusText: response.statusText,
    headers: response.headers,
  });
}

async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    Logger.debug("Could not discard response body", {
      url: response.url,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
