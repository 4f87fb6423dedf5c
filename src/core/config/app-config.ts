/**
 * Centralized application configuration (CLI layer only; the core takes
 * explicit options)
 */

import { SAMPLING_CONSTANTS, SOURCE_CONSTANTS } from "../constants";
import type { SamplerOptions } from "../types";
import { envInt, envNum, envOptionalInt, envStr } from "./env";

export class AppConfig {
  /**
   * Sampler options from RECIPE_* environment variables, falling back to the
   * built-in defaults. Read on every call so tests can change process.env.
   */
  static samplerDefaults(): SamplerOptions {
    return {
      sitemapUrl: envStr("RECIPE_SITEMAP_URL", SOURCE_CONSTANTS.SITEMAP_URL),
      pathMarker: envStr("RECIPE_PATH_MARKER", SOURCE_CONSTANTS.RECIPE_PATH_MARKER),
      technique: envStr("RECIPE_TECHNIQUE", SOURCE_CONSTANTS.TECHNIQUE),
      course: envStr("RECIPE_COURSE", SOURCE_CONSTANTS.COURSE),
      maxSitemapUrls: envInt("RECIPE_MAX_URLS", SAMPLING_CONSTANTS.MAX_SITEMAP_URLS),
      maxAttempts: envInt("RECIPE_ATTEMPTS", SAMPLING_CONSTANTS.MAX_ATTEMPTS),
      targetMatches: envInt("RECIPE_COUNT", SAMPLING_CONSTANTS.TARGET_MATCHES),
      delayMs: envNum("RECIPE_DELAY_MS", SAMPLING_CONSTANTS.DELAY_MS),
      timeoutMs: envNum("RECIPE_TIMEOUT_MS", SAMPLING_CONSTANTS.TIMEOUT_MS),
      seed: envOptionalInt("RECIPE_SEED"),
    };
  }

  /**
   * Get environment variable as boolean with default
   */
  static getBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) return defaultValue;
    return /^(1|true|yes|on)$/i.test(value);
  }
}
