import { resolveServerConfig } from './_shared/env.ts';
import { createPasswordService } from './server.ts';

createPasswordService(resolveServerConfig())
  .listen()
  .catch((error: unknown) => {
    console.error('[main] failed to start', error);
    process.exitCode = 1;
  });
