import assert from "node:assert/strict";
import test from "node:test";
import { gzipSync } from "node:zlib";
import { HTTP_CONSTANTS } from "../src/core/constants";
import { readSitemapUrls, scanSitemapDocument } from "../src/core/discovery/sitemap";
import { SitemapParseError, TransportError } from "../src/core/errors";
import {
  chunkedResponse,
  dripResponse,
  fakeFetch,
  sitemapXml,
  stalledResponse,
  testClient,
  textResponse,
  type Route,
} from "./helpers/fake-fetch";

const SITEMAP = "https://recipes.test/sitemap.xml";
const MARKER = "/recepten/recept/";
const recipe = (id: string) => `https://recipes.test/recepten/recept/${id}`;

const read = (routes: Record<string, Route>, maxUrls = 100, sitemapUrl = SITEMAP) => {
  const fake = fakeFetch(routes);
  const urls = readSitemapUrls(testClient(fake), {
    sitemapUrl,
    pathMarker: MARKER,
    maxUrls,
    timeoutMs: 5_000,
  });
  return { fake, urls };
};

test("readSitemapUrls keeps trimmed recipe locations in document order", async () => {
  const xml = sitemapXml([
    `  ${recipe("R1-pasta")}\n`,
    "https://recipes.test/recepten/thema/zomer",
    recipe("R2-stoof"),
    "/recepten/recept/R3-relative",
  ]);
  const { fake, urls } = read({ [SITEMAP]: textResponse(xml) });

  assert.deepEqual(await urls, [recipe("R1-pasta"), recipe("R2-stoof")]);
  const headers = fake.inits[0].headers;
  assert.ok(headers && !Array.isArray(headers) && !(headers instanceof Headers));
  assert.equal(headers.accept, HTTP_CONSTANTS.ACCEPT_XML);
});

test("readSitemapUrls stops at maxUrls across chunk boundaries", async () => {
  const xml = sitemapXml(["R1", "R2", "R3", "R4", "R5"].map(recipe));
  const cut = xml.indexOf("R2") + 1;
  const { urls } = read({ [SITEMAP]: chunkedResponse([xml.slice(0, cut), xml.slice(cut)]) }, 2);

  assert.deepEqual(await urls, [recipe("R1"), recipe("R2")]);
});

test("readSitemapUrls handles namespaced image locations and CDATA", async () => {
  const xml = `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9" xmlns:image="http://www.google.com/schemas/sitemap-image/1.1">
  <url>
    <loc>${recipe("R1")}</loc>
    <image:image><image:loc>https://recipes.test/img/R1.jpg</image:loc></image:image>
  </url>
  <url><loc><![CDATA[${recipe("R2?x=1&y=2")}]]></loc></url>
  <url><loc>${recipe("R3?a=1&amp;b=2")}</loc></url>
</urlset>`;
  const { urls } = read({ [SITEMAP]: textResponse(xml) });

  assert.deepEqual(await urls, [recipe("R1"), recipe("R2?x=1&y=2"), recipe("R3?a=1&b=2")]);
});

test("readSitemapUrls falls back to a full parse when the stream parser rejects the document", async () => {
  const xml = `<?xml version="1.0" encoding="UTF-8"?>
<urlset>
  <url><loc>${recipe("R1")}</loc><note>&nbsp;</note></url>
  <url><loc>${recipe("R2")}</loc></url>
  <url><loc>${recipe("R3")}</loc></url>
</urlset>`;
  const { urls } = read({ [SITEMAP]: textResponse(xml) }, 2);

  assert.deepEqual(await urls, [recipe("R1"), recipe("R2")]);
});

test("readSitemapUrls throws SitemapParseError when the full parse fails too", async () => {
  const truncated = `<?xml version="1.0" encoding="UTF-8"?>
<urlset>
  <url><loc>${recipe("R1")}</loc></url>`;
  const { urls } = read({ [SITEMAP]: textResponse(truncated) });

  await assert.rejects(urls, (error: unknown) => {
    assert.ok(error instanceof SitemapParseError);
    assert.equal(error.code, "SITEMAP_PARSE_FAILURE");
    assert.equal(error.url, SITEMAP);
    return true;
  });
});

test("scanSitemapDocument rescans every loc up to the cap", () => {
  const xml = sitemapXml(["R1", "R2", "R3"].map(recipe));
  assert.deepEqual(scanSitemapDocument(xml, SITEMAP, MARKER, 10), ["R1", "R2", "R3"].map(recipe));
  assert.deepEqual(scanSitemapDocument(xml, SITEMAP, MARKER, 1), [recipe("R1")]);
});

test("readSitemapUrls propagates transport errors", async () => {
  const { urls } = read({ [SITEMAP]: textResponse("unavailable", 503) });

  await assert.rejects(urls, (error: unknown) =>
    error instanceof TransportError && error.status === 503 && error.url === SITEMAP,
  );
});

test("a body that breaks off mid-stream is a transport error", async () => {
  const broken: Route = () => {
    async function* body(): AsyncGenerator<Uint8Array> {
      yield new TextEncoder().encode(`<urlset><url><loc>${recipe("R1")}</loc></url>`);
      throw new Error("socket hang up");
    }
    return new Response(body());
  };
  const { urls } = read({ [SITEMAP]: broken });

  await assert.rejects(urls, TransportError);
});

test("a sitemap that keeps streaming is read past the timeout", async () => {
  const ids = ["R1", "R2", "R3", "R4"];
  const chunks = [
    '<?xml version="1.0" encoding="UTF-8"?>\n<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">\n',
    ...ids.map((id) => `  <url><loc>${recipe(id)}</loc></url>\n`),
    "</urlset>",
  ];
  const fake = fakeFetch({ [SITEMAP]: dripResponse(chunks, 40) });

  // six chunks 40ms apart take longer than the 150ms timeout in total
  const urls = await readSitemapUrls(testClient(fake), {
    sitemapUrl: SITEMAP,
    pathMarker: MARKER,
    maxUrls: 100,
    timeoutMs: 150,
  });
  assert.deepEqual(urls, ids.map(recipe));
});

test("a sitemap body that stalls times out", async () => {
  const fake = fakeFetch({ [SITEMAP]: stalledResponse(`<urlset><url><loc>${recipe("R1")}</loc></url>`) });
  const reading = readSitemapUrls(testClient(fake), {
    sitemapUrl: SITEMAP,
    pathMarker: MARKER,
    maxUrls: 100,
    timeoutMs: 50,
  });

  await assert.rejects(reading, (error: unknown) => {
    assert.ok(error instanceof TransportError);
    assert.equal(error.timedOut, true);
    assert.equal(error.message, `No data for 50ms: ${SITEMAP}`);
    return true;
  });
});

test("gzip sitemap files are decompressed", async () => {
  const gzUrl = "https://recipes.test/sitemap.xml.gz";
  const xml = sitemapXml([recipe("R1"), recipe("R2")]);
  const gz: Route = () => new Response(new Uint8Array(gzipSync(xml)));

  assert.deepEqual(await read({ [gzUrl]: gz }, 100, gzUrl).urls, [recipe("R1"), recipe("R2")]);
  // already decoded by the server
  assert.deepEqual(await read({ [gzUrl]: textResponse(xml) }, 100, gzUrl).urls, [recipe("R1"), recipe("R2")]);
});

test("an empty urlset yields no candidates", async () => {
  const { urls } = read({ [SITEMAP]: textResponse(sitemapXml([])) });
  assert.deepEqual(await urls, []);
});

test("maxUrls of 0 skips the request", async () => {
  const { fake, urls } = read({ [SITEMAP]: textResponse(sitemapXml([recipe("R1")])) }, 0);
  assert.deepEqual(await urls, []);
  assert.equal(fake.calls.length, 0);
});
