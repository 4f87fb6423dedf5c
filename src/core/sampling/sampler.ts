/**
 * Random sampling of recipe pages against two keyword filters
 */

import { resolveSamplerOptions } from "../config/options";
import { HttpClient } from "../discovery/fetcher";
import { readSitemapUrls } from "../discovery/sitemap";
import { TransportError } from "../errors";
import { fetchRecipePage } from "../extraction/recipe-page";
import {
  makeRecipe,
  recipeKey,
  type Recipe,
  type RecipePage,
  type SamplerOptions,
  type SamplingReport,
} from "../types";
import { Logger } from "../utils/logger";
import { createRandom, shuffled } from "../utils/random";
import { elapsedMs, sleep as abortableSleep } from "../utils/time";

export interface SamplerDeps {
  client?: HttpClient;
  /** Aborting stops the run and returns the matches found so far */
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Both keywords (already lower-cased) must occur in the haystack */
export function matchesKeywords(haystack: string, keywords: readonly string[]): boolean {
  const hay = haystack.toLowerCase();
  return keywords.every((keyword) => hay.includes(keyword));
}

/**
 * Reads the sitemap, shuffles the candidates and fetches pages one at a time
 * until `targetMatches` recipes match both keywords or `maxAttempts` pages
 * have been tried.
 * @throws ValidationError for invalid options
 * @throws TransportError / SitemapParseError when the sitemap cannot be read
 */
export async function runSampling(
  options: Partial<SamplerOptions>,
  deps: SamplerDeps = {},
): Promise<SamplingReport> {
  const opts = resolveSamplerOptions(options);
  const client = deps.client ?? new HttpClient();
  const wait = deps.sleep ?? abortableSleep;
  const { signal } = deps;
  const startedAt = Date.now();

  const candidates = await readSitemapUrls(client, {
    sitemapUrl: opts.sitemapUrl,
    pathMarker: opts.pathMarker,
    maxUrls: opts.maxSitemapUrls,
    timeoutMs: opts.timeoutMs,
    signal,
  });

  const report: SamplingReport = {
    recipes: [],
    candidates: candidates.length,
    attempts: 0,
    failures: 0,
    interrupted: false,
  };
  if (candidates.length === 0) return report;

  const keywords = [opts.technique, opts.course].map((k) => k.trim().toLowerCase());
  const order = shuffled(candidates, createRandom(opts.seed));
  const matches = new Map<string, Recipe>();

  for (const url of order) {
    if (signal?.aborted) {
      report.interrupted = true;
      break;
    }
    if (report.attempts >= opts.maxAttempts) break;
    if (matches.size >= opts.targetMatches) break;

    report.attempts++;
    Logger.debug(`Attempt ${report.attempts}: ${url}`, { url });

    let page: RecipePage;
    try {
      page = await fetchRecipePage(client, url, { timeoutMs: opts.timeoutMs, signal });
    } catch (error) {
      if (signal?.aborted) {
        report.interrupted = true;
        break;
      }
      if (!(error instanceof TransportError)) throw error;
      report.failures++;
      Logger.pageFailed(url, report.attempts, error);
      await wait(opts.delayMs, signal);
      continue;
    }

    if (matchesKeywords(page.haystack, keywords)) {
      const recipe = makeRecipe(page.title, url);
      matches.set(recipeKey(recipe), recipe);
      Logger.matchFound(recipe.title, url, matches.size);
    }

    await wait(opts.delayMs, signal);
  }

  report.recipes = [...matches.values()];
  Logger.samplingFinished(report.attempts, report.recipes.length, report.interrupted, elapsedMs(startedAt));
  return report;
}

/**
 * Same as runSampling, returning only the matches in discovery order
 */
export async function sampleRecipes(
  options: Partial<SamplerOptions>,
  deps: SamplerDeps = {},
): Promise<Recipe[]> {
  const { recipes } = await runSampling(options, deps);
  return recipes;
}
