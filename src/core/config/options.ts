/**
 * Sampler option validation
 */

import { z } from "zod";
import { SAMPLING_CONSTANTS, SOURCE_CONSTANTS } from "../constants";
import { ValidationError } from "../errors";
import type { SamplerOptions } from "../types";

const count = z.number().int().nonnegative();

export const samplerOptionsSchema = z.object({
  sitemapUrl: z.string().url(),
  pathMarker: z.string().min(1),
  technique: z.string(),
  course: z.string(),
  maxSitemapUrls: count,
  maxAttempts: count,
  targetMatches: z
    .number()
    .int()
    .min(1, "targetMatches must be at least 1"),
  delayMs: z.number().nonnegative(),
  timeoutMs: z.number().positive(),
  // the shuffle generator keeps 32 bits of state
  seed: z.number().int().min(0).max(0xffffffff).optional(),
});

export const DEFAULT_SAMPLER_OPTIONS: Readonly<SamplerOptions> = {
  sitemapUrl: SOURCE_CONSTANTS.SITEMAP_URL,
  pathMarker: SOURCE_CONSTANTS.RECIPE_PATH_MARKER,
  technique: SOURCE_CONSTANTS.TECHNIQUE,
  course: SOURCE_CONSTANTS.COURSE,
  maxSitemapUrls: SAMPLING_CONSTANTS.MAX_SITEMAP_URLS,
  maxAttempts: SAMPLING_CONSTANTS.MAX_ATTEMPTS,
  targetMatches: SAMPLING_CONSTANTS.TARGET_MATCHES,
  delayMs: SAMPLING_CONSTANTS.DELAY_MS,
  timeoutMs: SAMPLING_CONSTANTS.TIMEOUT_MS,
};

/**
 * Fills defaults and validates
 * @throws ValidationError listing every invalid field
 */
export function resolveSamplerOptions(
  overrides: Partial<SamplerOptions> = {},
): SamplerOptions {
  const merged: Record<string, unknown> = { ...DEFAULT_SAMPLER_OPTIONS };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const result = samplerOptionsSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid sampler options: ${details}`);
  }
  return result.data;
}
