import fetch from "node-fetch";

// ---------------------------------------------------------------------------
// Minimal HTTP surface used by the registry and the release fetcher
// ---------------------------------------------------------------------------

/**
 * The subset of a node-fetch Response the runtime cache reads. Tests pass
 * in-process fakes that implement just this shape.
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  headers: { get(name: string): string | null };
  body: AsyncIterable<string | Buffer> | null;
  json(): Promise<unknown>;
}

export interface HttpRequestInit {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export type HttpClient = (url: string, init?: HttpRequestInit) => Promise<HttpResponse>;

export const USER_AGENT = "runtime-depot/0.1";

/** Default client backed by node-fetch; redirects are followed (GitHub assets live on a CDN). */
export const nodeFetchClient: HttpClient = (url, init = {}) =>
  fetch(url, {
    headers: { "User-Agent": USER_AGENT, ...init.headers },
    signal: init.signal,
  });
