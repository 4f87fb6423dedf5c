/**
 * Configuration-related types
 */

import type { RetryOptions } from "../utils/retry";

/** Sampler input; one explicit structure per run, no process-wide state */
export interface SamplerOptions {
  sitemapUrl: string;
  pathMarker: string; // substring that marks a recipe detail URL
  technique: string; // first filter keyword
  course: string; // second filter keyword
  maxSitemapUrls: number;
  maxAttempts: number; // page fetch budget
  targetMatches: number; // >= 1
  delayMs: number; // wait after every page fetch
  timeoutMs: number; // per request
  seed?: number; // deterministic shuffle when set
}

/** Sitemap reader input */
export interface SitemapReadOptions {
  sitemapUrl: string;
  pathMarker: string;
  maxUrls: number;
  timeoutMs: number;
  signal?: AbortSignal;
}

/** Per-request options */
export interface RequestOptions {
  /** Longest wait for the next body chunk; also the header wait unless connectTimeoutMs is set */
  timeoutMs: number;
  /** Longest wait for the response headers */
  connectTimeoutMs?: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

/** HTTP client retry policy: RetryOptions plus the statuses worth retrying */
export interface HttpRetryPolicy
  extends Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "backoffMultiplier" | "jitterMs"> {
  retryStatuses: readonly number[];
}
