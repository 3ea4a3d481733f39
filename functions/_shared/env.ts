import { parseArgs } from 'node:util';
import { z } from 'zod';

export type ServerConfig = Readonly<{
  port: number;
  hostname: string;
}>;

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 3000,
  hostname: '0.0.0.0',
};

const serverConfigSchema = z.object({
  port: z.coerce
    .number()
    .int('Port must be a whole number')
    .min(1, 'Port must be between 1 and 65535')
    .max(65535, 'Port must be between 1 and 65535'),
  hostname: z.string().trim().min(1, 'Host must not be empty'),
});

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        port: { type: 'string', short: 'p' },
        host: { type: 'string', short: 'H' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid config: ${message}`);
  }
}

// Flags win over PORT/HOST, which win over the defaults.
export function resolveServerConfig(
  argv: string[] = process.argv.slice(2),
  environment: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const flags = readFlags(argv);
  const parsed = serverConfigSchema.safeParse({
    port: flags.port ?? (environment.PORT || DEFAULT_SERVER_CONFIG.port),
    hostname: flags.host ?? (environment.HOST || DEFAULT_SERVER_CONFIG.hostname),
  });

  if (!parsed.success) {
    throw new Error(`Invalid config: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`);
  }
  return parsed.data;
}
