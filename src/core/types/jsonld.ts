/**
 * Structured data (JSON-LD) types
 */

/** One JSON-LD item after deserialization */
export type StructuredBlock =
  | {
      kind: "recipe";
      keywords: string[]; // "keywords", string or list in the source
      categories: string[]; // "recipeCategory", string or list in the source
    }
  | {
      kind: "other";
      types: string[]; // "@type" values, empty when absent
    };
