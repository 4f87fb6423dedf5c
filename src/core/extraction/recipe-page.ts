/**
 * Recipe page extraction: title and search haystack
 */

import { load as loadHtml, type CheerioAPI } from "cheerio";
import { hasChildren, isTag, isText, type AnyNode } from "domhandler";
import { HTTP_CONSTANTS, SAMPLING_CONSTANTS } from "../constants";
import type { HttpClient } from "../discovery/fetcher";
import type { RecipePage, RequestOptions } from "../types";
import { parseJsonLdBlocks, recipeTags } from "./jsonld";

// never part of the visible text
const INVISIBLE_TAGS = new Set(["script", "style", "noscript", "template"]);

const collapse = (s: string): string => s.replace(/\s+/g, " ").trim();

function pushText(node: AnyNode, out: string[]): void {
  if (isText(node)) {
    const text = collapse(node.data);
    if (text) out.push(text);
    return;
  }
  if (isTag(node) && INVISIBLE_TAGS.has(node.name)) return;
  if (hasChildren(node)) {
    for (const child of node.children) pushText(child, out);
  }
}

/** Text of the first match, text nodes joined by single spaces */
function textOf($: CheerioAPI, selector: string): string {
  const parts: string[] = [];
  for (const node of $(selector).first().get()) pushText(node, parts);
  return parts.join(" ");
}

/**
 * Title priority: first <h1>, then <title>, then the URL itself
 */
export function extractTitle($: CheerioAPI, url: string): string {
  return textOf($, "h1") || textOf($, "title") || url;
}

/** Raw text of every ld+json script block */
export function jsonLdSources($: CheerioAPI): string[] {
  return $('script[type="application/ld+json"]')
    .toArray()
    .map((el) => $(el).text())
    .filter((text) => text.trim().length > 0);
}

/**
 * Extracts the title and the haystack (JSON-LD keywords and categories of
 * Recipe items, then the visible body text) from a recipe page.
 */
export function parseRecipePage(html: string, url: string): RecipePage {
  const $ = loadHtml(html);

  const tags = recipeTags(parseJsonLdBlocks(jsonLdSources($), url));
  const haystack = [...tags, textOf($, "body")]
    .filter(Boolean)
    .join(SAMPLING_CONSTANTS.HAYSTACK_SEPARATOR);

  return { title: extractTitle($, url), haystack };
}

/**
 * Fetches one recipe page and extracts title and haystack
 * @throws TransportError on HTTP or network failure after retries
 */
export async function fetchRecipePage(
  client: HttpClient,
  url: string,
  options: RequestOptions,
): Promise<RecipePage> {
  const html = await client.getText(url, {
    connectTimeoutMs: HTTP_CONSTANTS.PAGE_CONNECT_TIMEOUT_MS,
    ...options,
  });
  return parseRecipePage(html, url);
}
