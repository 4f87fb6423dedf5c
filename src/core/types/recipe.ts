/**
 * Recipe-related types
 */

/** A confirmed filter match */
export interface Recipe {
  readonly title: string;
  readonly url: string; // absolute, contains the recipe path marker
}

/** What the page fetcher extracts from one recipe page */
export interface RecipePage {
  title: string;
  haystack: string; // JSON-LD keywords/categories + visible text, " | "-joined
}

/** Outcome of one sampling run */
export interface SamplingReport {
  recipes: Recipe[]; // discovery order
  candidates: number; // URLs the sitemap yielded
  attempts: number; // page fetches started
  failures: number; // page fetches that hit a transport error
  interrupted: boolean;
}

export const recipeKey = (recipe: Pick<Recipe, "title" | "url">): string =>
  JSON.stringify([recipe.title, recipe.url]);

export const makeRecipe = (title: string, url: string): Recipe =>
  Object.freeze({ title, url });
