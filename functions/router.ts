import type { EdgeHandler } from './_shared/edge-handler.ts';
import { errorResponse } from './_shared/http.ts';

export type RouteTable = Readonly<Record<string, EdgeHandler>>;

export function createRouter(routes: RouteTable): EdgeHandler {
  const handlers = new Map(Object.entries(routes));

  return async (request: Request): Promise<Response> => {
    const { pathname } = new URL(request.url);
    const handler = handlers.get(pathname);
    if (!handler) {
      return errorResponse('Not Found', 404);
    }
    return handler(request);
  };
}
