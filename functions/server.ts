import { serve, type ServerType } from '@hono/node-server';
import type { EdgeHandler } from './_shared/edge-handler.ts';
import type { ServerConfig } from './_shared/env.ts';
import { generatePasswordHandler } from './generate_password/index.ts';
import { generateQrHandler } from './generate_qr/index.ts';
import { createRouter, type RouteTable } from './router.ts';
import { scorePasswordHandler } from './score_password/index.ts';

export const API_ROUTES: RouteTable = {
  '/api/v1/generate': generatePasswordHandler,
  '/api/v1/score': scorePasswordHandler,
  '/api/v1/qr': generateQrHandler,
};

export type PasswordService = {
  config: ServerConfig;
  fetch: EdgeHandler;
  listen: () => Promise<ServerType>;
};

export function createPasswordService(config: ServerConfig): PasswordService {
  const fetch = createRouter(API_ROUTES);

  return {
    config,
    fetch,
    listen: () =>
      new Promise<ServerType>((resolve, reject) => {
        const server = serve({ fetch, port: config.port, hostname: config.hostname }, (info) => {
          console.log(`Starting password generator on http://${config.hostname}:${info.port}`);
          resolve(server);
        });
        server.once('error', reject);
      }),
  };
}
