/**
 * Uniform random choice from a result set
 */

import { NoCandidatesError } from "../errors";
import type { Recipe } from "../types";
import { pickIndex, type RandomSource } from "../utils/random";

/**
 * @throws NoCandidatesError when `recipes` is empty
 */
export function pickRandomRecipe(
  recipes: Iterable<Recipe>,
  random: RandomSource = Math.random,
): Recipe {
  const pool = [...recipes];
  if (pool.length === 0) throw new NoCandidatesError();
  return pool[pickIndex(pool.length, random)];
}
