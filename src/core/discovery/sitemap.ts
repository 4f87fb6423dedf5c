/**
 * Sitemap parsing and recipe URL discovery
 */

import { XMLParser } from "fast-xml-parser";
import { gunzipSync } from "node:zlib";
import * as sax from "sax";
import { HTTP_CONSTANTS } from "../constants";
import { SitemapParseError } from "../errors";
import type { SitemapReadOptions } from "../types";
import { Logger } from "../utils/logger";
import { elapsedMs } from "../utils/time";
import { isGzipUrl, isRecipeUrl } from "../utils/url";
import type { HttpClient } from "./fetcher";

interface SitemapScan {
  urls: string[];
  fallback: boolean;
}

/** "image:loc" -> "loc" */
const localName = (tag: string): string =>
  tag.slice(tag.lastIndexOf(":") + 1).toLowerCase();

/** Collects recipe <loc> values up to a cap */
class LocCollector {
  readonly urls: string[] = [];

  constructor(
    private readonly pathMarker: string,
    private readonly maxUrls: number,
  ) {}

  get full(): boolean {
    return this.urls.length >= this.maxUrls;
  }

  offer(raw: string): void {
    if (this.full) return;
    const loc = raw.trim();
    if (isRecipeUrl(loc, this.pathMarker)) this.urls.push(loc);
  }
}

// only the five XML entities are accepted
const SAX_OPTIONS = { trim: false, normalize: false, strictEntities: true };

/** Strict incremental parser that reports <loc> text to the collector */
class LocStream {
  private readonly parser = sax.parser(true, SAX_OPTIONS);
  private locText: string | null = null;
  failure: Error | null = null;

  constructor(collector: LocCollector) {
    this.parser.onerror = (error) => {
      this.failure ??= error;
    };
    this.parser.onopentag = (tag) => {
      if (localName(tag.name) === "loc") this.locText = "";
    };
    this.parser.ontext = (text) => {
      if (this.locText !== null) this.locText += text;
    };
    this.parser.oncdata = (text) => {
      if (this.locText !== null) this.locText += text;
    };
    this.parser.onclosetag = (name) => {
      if (this.locText === null || localName(name) !== "loc") return;
      collector.offer(this.locText);
      this.locText = null;
    };
  }

  write(chunk: string): void {
    if (this.failure) return;
    try {
      this.parser.write(chunk);
    } catch (error) {
      this.failure ??= error instanceof Error ? error : new Error(String(error));
    }
  }

  close(): void {
    if (this.failure) return;
    try {
      this.parser.close();
    } catch (error) {
      this.failure ??= error instanceof Error ? error : new Error(String(error));
    }
  }
}

const documentParser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: true,
});

function collectLocs(node: unknown, collector: LocCollector, isLoc: boolean): void {
  if (collector.full) return;
  if (typeof node === "string") {
    if (isLoc) collector.offer(node);
    return;
  }
  if (Array.isArray(node)) {
    for (const item of node) collectLocs(item, collector, isLoc);
    return;
  }
  if (node !== null && typeof node === "object") {
    for (const [key, value] of Object.entries(node)) {
      collectLocs(value, collector, localName(key) === "loc");
    }
  }
}

/**
 * Parses a complete sitemap document and rescans every <loc>
 * @throws SitemapParseError if the document is not well-formed XML
 */
export function scanSitemapDocument(
  xml: string,
  sitemapUrl: string,
  pathMarker: string,
  maxUrls: number,
): string[] {
  let doc: unknown;
  try {
    doc = documentParser.parse(xml, true);
  } catch (error) {
    throw new SitemapParseError(`Sitemap is not valid XML: ${sitemapUrl}`, sitemapUrl, error);
  }
  const collector = new LocCollector(pathMarker, maxUrls);
  collectLocs(doc, collector, false);
  return collector.urls;
}

/**
 * Decoded text chunks of the body. Leaving the loop early cancels the body.
 */
async function* textChunks(response: Response, url: string): AsyncGenerator<string> {
  if (isGzipUrl(url)) {
    const raw = Buffer.from(await response.arrayBuffer());
    // servers sometimes send .gz files already decoded
    const gzipped = raw.length > 1 && raw[0] === 0x1f && raw[1] === 0x8b;
    yield (gzipped ? gunzipSync(raw) : raw).toString("utf-8");
    return;
  }

  if (!response.body) return;
  const reader = response.body.getReader();
  const decoder = new TextDecoder("utf-8");
  let finished = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      const text = decoder.decode(value, { stream: true });
      if (text) yield text;
    }
    finished = true;
    const tail = decoder.decode();
    if (tail) yield tail;
  } finally {
    if (!finished) {
      await reader.cancel().catch((error: unknown) =>
        Logger.debug("Sitemap body cancel failed", {
          url,
          error: error instanceof Error ? error.message : String(error),
        }),
      );
    }
  }
}

async function scanResponse(
  response: Response,
  sitemapUrl: string,
  pathMarker: string,
  maxUrls: number,
): Promise<SitemapScan> {
  const collector = new LocCollector(pathMarker, maxUrls);
  const stream = new LocStream(collector);
  const buffered: string[] = [];

  for await (const chunk of textChunks(response, sitemapUrl)) {
    buffered.push(chunk);
    // after a failure keep reading so the fallback sees the whole document
    if (stream.failure) continue;
    stream.write(chunk);
    if (!stream.failure && collector.full) {
      return { urls: collector.urls, fallback: false };
    }
  }
  stream.close();

  if (!stream.failure) return { urls: collector.urls, fallback: false };

  Logger.warn("Streaming sitemap parse failed, parsing full document", {
    url: sitemapUrl,
    error: stream.failure.message,
  });
  return {
    urls: scanSitemapDocument(buffered.join(""), sitemapUrl, pathMarker, maxUrls),
    fallback: true,
  };
}

/**
 * Reads recipe URLs from a sitemap, in document order.
 * @returns At most `maxUrls` absolute URLs containing `pathMarker`
 * @throws TransportError when the sitemap cannot be fetched
 * @throws SitemapParseError when neither the streaming nor the full parse succeeds
 */
export async function readSitemapUrls(
  client: HttpClient,
  options: SitemapReadOptions,
): Promise<string[]> {
  const { sitemapUrl, pathMarker, maxUrls, timeoutMs, signal } = options;
  if (maxUrls <= 0) return [];

  const startedAt = Date.now();
  const scan = await client.request(
    sitemapUrl,
    { timeoutMs, signal, headers: { accept: HTTP_CONSTANTS.ACCEPT_XML } },
    (response) => scanResponse(response, sitemapUrl, pathMarker, maxUrls),
  );

  Logger.sitemapRead(sitemapUrl, scan.urls.length, elapsedMs(startedAt), scan.fallback);
  return scan.urls;
}
