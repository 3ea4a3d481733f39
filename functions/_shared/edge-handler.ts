import { PasswordGenerationError } from '@keysmith/shared';
import { errorResponse, HttpError, jsonResponse } from './http.ts';
import { QrExportError } from './qr.ts';

export type EdgeHandlerContext = {
  request: Request;
};

export type EdgeHandler = (request: Request) => Promise<Response>;

type EdgeHandlerOptions = {
  method?: string;
  onError?: (error: unknown) => Response | null;
};

function mapDefaultEdgeError(error: unknown): Response {
  if (error instanceof HttpError) {
    return errorResponse(error.message, error.status, error.code);
  }
  if (error instanceof PasswordGenerationError) {
    return errorResponse(error.message, 422, error.code);
  }
  if (error instanceof QrExportError) {
    return errorResponse(error.message, 422, error.code);
  }

  console.error('[edge-handler] unhandled error', error);
  const message = error instanceof Error ? error.message : 'Internal server error';
  return errorResponse(message, 500, 'internal_error');
}

export function createEdgeHandler(
  handler: (context: EdgeHandlerContext) => Promise<Response>,
  options?: EdgeHandlerOptions,
): EdgeHandler {
  return async (request: Request): Promise<Response> => {
    if (request.method === 'OPTIONS') {
      return jsonResponse({ ok: true });
    }

    if (options?.method && request.method !== options.method) {
      return errorResponse('Method not allowed', 405);
    }

    try {
      return await handler({ request });
    } catch (error) {
      const mapped = options?.onError?.(error);
      return mapped ?? mapDefaultEdgeError(error);
    }
  };
}
