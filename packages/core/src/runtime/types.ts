// Transport seam between the SDK and the network.
// Keep it fetch-shaped so tests and embedders can serve requests in process.

export type Transport = {
  /** Human-readable name, used in debug logs. */
  name: string;
  fetch: (url: string, init: RequestInit) => Promise<Response>;
};

export type FetchLike = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

/** In-process request handler, e.g. a hono app's `fetch`. */
export type RequestHandler = (request: Request) => Response | Promise<Response>;
