import type { FetchLike } from '../../src/lib/api/apiClient';

export interface RecordedRequest {
  method: string;
  path: string;
  query: Record<string, string>;
  headers: Headers;
  body: unknown;
}

export type RouteHandler = (request: RecordedRequest) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export const BASE_URL = 'https://api.test/v1';

/**
 * In-process stand-in for the backend, routed by "METHOD /path"
 */
export class FakeBackend {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, RouteHandler>();

  on(route: string, handler: RouteHandler): this {
    this.routes.set(route, handler);
    return this;
  }

  json(route: string, body: unknown, status = 200): this {
    return this.on(route, () => jsonResponse(body, status));
  }

  calls(route: string): RecordedRequest[] {
    return this.requests.filter((r) => `${r.method} ${r.path}` === route);
  }

  readonly fetch: FetchLike = async (input, init) => {
    const url = new URL(input);
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      path: url.pathname.replace(/^\/v1/, ''),
      query: Object.fromEntries(url.searchParams.entries()),
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    };
    this.requests.push(request);

    const handler = this.routes.get(`${request.method} ${request.path}`);
    if (!handler) {
      return jsonResponse({ message: `No route for ${request.path}` }, 404);
    }
    return handler(request);
  };
}
