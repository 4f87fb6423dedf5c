/**
 * JSON-LD deserialization into StructuredBlock values
 */

import { z } from "zod";
import type { StructuredBlock } from "../types";
import { Logger } from "../utils/logger";

/** A field that may hold one string or a list; non-text list items are dropped */
const stringList = z
  .union([z.string(), z.array(z.unknown())])
  .transform((value): string[] =>
    typeof value === "string"
      ? [value]
      : value
          .filter((item): item is string | number =>
            typeof item === "string" || typeof item === "number",
          )
          .map(String),
  );

// a malformed field is treated as absent instead of rejecting the whole item
const optionalList = stringList.optional().catch(undefined);

const itemSchema = z.object({
  "@type": optionalList,
  keywords: optionalList,
  recipeCategory: optionalList,
});

const graphSchema = z.object({ "@graph": z.array(z.unknown()) });

/**
 * Flattens a parsed JSON-LD document: top-level arrays and @graph containers
 * yield their members.
 */
export function flattenJsonLd(data: unknown): unknown[] {
  const items = Array.isArray(data) ? data : [data];
  return items.flatMap((item) => {
    const graph = graphSchema.safeParse(item);
    return graph.success ? graph.data["@graph"] : [item];
  });
}

/**
 * Deserializes one JSON-LD item
 * @returns null when the item is not an object
 */
export function toStructuredBlock(item: unknown): StructuredBlock | null {
  const parsed = itemSchema.safeParse(item);
  if (!parsed.success) return null;

  const types = parsed.data["@type"] ?? [];
  if (!types.includes("Recipe")) return { kind: "other", types };

  return {
    kind: "recipe",
    keywords: parsed.data.keywords ?? [],
    categories: parsed.data.recipeCategory ?? [],
  };
}

/**
 * Parses the raw text of ld+json script blocks. Blocks that are not valid
 * JSON are skipped.
 */
export function parseJsonLdBlocks(sources: string[], url?: string): StructuredBlock[] {
  const blocks: StructuredBlock[] = [];
  for (const source of sources) {
    let data: unknown;
    try {
      data = JSON.parse(source);
    } catch (error) {
      Logger.debug("Skipping invalid JSON-LD block", {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      continue;
    }
    for (const item of flattenJsonLd(data)) {
      const block = toStructuredBlock(item);
      if (block) blocks.push(block);
    }
  }
  return blocks;
}

/** Keywords then categories of every Recipe block, in document order */
export function recipeTags(blocks: StructuredBlock[]): string[] {
  return blocks.flatMap((block) =>
    block.kind === "recipe" ? [...block.keywords, ...block.categories] : [],
  );
}
