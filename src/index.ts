/**
 * Library entry point
 */

export {
  DEFAULT_SAMPLER_OPTIONS,
  resolveSamplerOptions,
} from "./core/config/options";
export {
  HttpClient,
  type FetchLike,
  type HttpClientOptions,
} from "./core/discovery/fetcher";
export { readSitemapUrls } from "./core/discovery/sitemap";
export * from "./core/errors";
export { fetchRecipePage, parseRecipePage } from "./core/extraction/recipe-page";
export { pickRandomRecipe } from "./core/sampling/picker";
export {
  runSampling,
  sampleRecipes,
  type SamplerDeps,
} from "./core/sampling/sampler";
export type {
  Recipe,
  RecipePage,
  SamplerOptions,
  SamplingReport,
  StructuredBlock,
} from "./core/types";
