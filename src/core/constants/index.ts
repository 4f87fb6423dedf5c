/**
 * Application constants
 */

// Recipe source defaults (Allerhande)
export const SOURCE_CONSTANTS = {
  SITEMAP_URL: "https://www.ah.nl/sitemaps/entities/allerhande/recipes.xml",
  RECIPE_PATH_MARKER: "/allerhande/recept/",
  TECHNIQUE: "koken",
  COURSE: "hoofdgerecht",
} as const;

// Sampling constants
export const SAMPLING_CONSTANTS = {
  MAX_SITEMAP_URLS: 8000,
  MAX_ATTEMPTS: 60,
  TARGET_MATCHES: 1,
  DELAY_MS: 600,
  TIMEOUT_MS: 14000,
  HAYSTACK_SEPARATOR: " | ",
} as const;

// HTTP constants
export const HTTP_CONSTANTS = {
  USER_AGENT:
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0 Safari/537.36",
  ACCEPT_HEADER:
    "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  ACCEPT_XML: "application/xml,text/xml;q=0.9,*/*;q=0.8",
  ACCEPT_LANGUAGE: "nl-NL,nl;q=0.9,en;q=0.8",
  // brotli stays off, same as the browser profile we mimic
  ACCEPT_ENCODING: "gzip, deflate",
  CONNECTION: "close",
  PAGE_CONNECT_TIMEOUT_MS: 6000,
  MAX_RETRIES: 4,
  RETRY_BASE_DELAY_MS: 600,
  RETRY_BACKOFF_MULTIPLIER: 2,
  RETRY_JITTER_MS: 250,
  RETRY_STATUSES: [429, 500, 502, 503, 504],
} as const;
