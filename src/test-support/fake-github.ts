import { FetchLike } from '../github/http-client';

export type RouteHandler = (url: URL, init?: RequestInit) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

export function notFound(): Response {
  return jsonResponse({ message: 'Not Found' }, 404);
}

/**
 * In-process stand-in for api.github.com, routed by method and path.
 * Unknown routes answer 404.
 */
export class FakeGitHub {
  readonly calls: string[] = [];
  readonly requests: Array<{ url: string; init?: RequestInit }> = [];
  private routes = new Map<string, RouteHandler>();

  on(path: string, handler: RouteHandler, method = 'GET'): this {
    this.routes.set(`${method} ${path}`, handler);
    return this;
  }

  json(path: string, body: unknown, status = 200, method = 'GET'): this {
    return this.on(path, () => jsonResponse(body, status), method);
  }

  /**
   * List endpoint honouring `per_page` and `page`
   */
  list(path: string, items: readonly unknown[]): this {
    return this.on(path, (url) => {
      const perPage = Number(url.searchParams.get('per_page') || 30);
      const page = Number(url.searchParams.get('page') || 1);
      return jsonResponse(items.slice((page - 1) * perPage, page * perPage));
    });
  }

  /**
   * Answer with each response in turn, repeating the last one
   */
  sequence(path: string, responses: Array<() => Response>, method = 'GET'): this {
    let index = 0;
    return this.on(
      path,
      () => {
        const next = responses[Math.min(index, responses.length - 1)];
        index++;
        return next();
      },
      method
    );
  }

  fail(path: string, message = 'socket hang up'): this {
    return this.on(path, () => {
      throw new TypeError(message);
    });
  }

  callsTo(path: string): string[] {
    return this.calls.filter((call) => new URL(call).pathname === path);
  }

  fetch: FetchLike = async (input, init) => {
    this.calls.push(input);
    this.requests.push({ url: input, init });
    const url = new URL(input);
    const method = init?.method || 'GET';
    const handler = this.routes.get(`${method} ${url.pathname}`);
    if (!handler) {
      return notFound();
    }
    return handler(url, init);
  };
}

export const noSleep = async (): Promise<void> => {};
