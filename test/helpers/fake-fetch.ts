import { HttpClient, type FetchLike, type HttpClientOptions } from "../../src/core/discovery/fetcher";
import { sleep } from "../../src/core/utils/time";

export type Route = (init: RequestInit) => Response | Promise<Response>;

export interface FakeFetch {
  fetch: FetchLike;
  /** Requested URLs in order */
  calls: string[];
  /** Init of every request in order */
  inits: RequestInit[];
}

/** In-process stand-in for fetch; unknown URLs answer 404 */
export function fakeFetch(routes: Record<string, Route>): FakeFetch {
  const calls: string[] = [];
  const inits: RequestInit[] = [];
  const fetch: FetchLike = async (url, init) => {
    calls.push(url);
    inits.push(init);
    const route = routes[url];
    return route ? route(init) : new Response("not found", { status: 404 });
  };
  return { fetch, calls, inits };
}

export const textResponse = (body: string, status = 200, headers: Record<string, string> = {}): Route =>
  () => new Response(body, { status, headers });

/** Responds with each entry in turn, repeating the last one */
export function sequence(...routes: Route[]): Route {
  let i = 0;
  return (init) => {
    const route = routes[Math.min(i, routes.length - 1)];
    i++;
    return route(init);
  };
}

/** Body delivered as separate chunks */
export function chunkedResponse(chunks: string[]): Route {
  return () => {
    const encoder = new TextEncoder();
    async function* body(): AsyncGenerator<Uint8Array> {
      for (const chunk of chunks) yield encoder.encode(chunk);
    }
    return new Response(body());
  };
}

/** Body chunks sent `intervalMs` apart */
export function dripResponse(chunks: string[], intervalMs: number): Route {
  return () => {
    const encoder = new TextEncoder();
    async function* body(): AsyncGenerator<Uint8Array> {
      for (const chunk of chunks) {
        await sleep(intervalMs);
        yield encoder.encode(chunk);
      }
    }
    return new Response(body());
  };
}

/** Sends `first`, then nothing more */
export function stalledResponse(first: string): Route {
  return () => {
    const encoder = new TextEncoder();
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode(first));
      },
    });
    return new Response(body);
  };
}

/** Never answers; rejects once the request signal aborts */
export const hangingResponse = (): Route => (init) =>
  new Promise<Response>((_resolve, reject) => {
    const { signal } = init;
    if (!signal) return;
    if (signal.aborted) reject(signal.reason);
    else signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });

export const networkError = (message = "fetch failed"): Route => () => {
  throw new TypeError(message);
};

/** Client without retry delays */
export function testClient(fake: FakeFetch, options: HttpClientOptions = {}): HttpClient {
  return new HttpClient({
    ...options,
    fetch: fake.fetch,
    retry: { maxRetries: 0, baseDelayMs: 0, jitterMs: 0, ...options.retry },
  });
}

export function sitemapXml(urls: string[]): string {
  const entries = urls.map((u) => `  <url><loc>${u}</loc></url>`).join("\n");
  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${entries}
</urlset>`;
}

export function recipeHtml(title: string, keywords: string[], body = ""): string {
  const ld = JSON.stringify({ "@context": "https://schema.org", "@type": "Recipe", name: title, keywords });
  return `<!doctype html><html><head><title>${title} | Test</title>
<script type="application/ld+json">${ld}</script></head>
<body><h1>${title}</h1><p>${body}</p></body></html>`;
}
