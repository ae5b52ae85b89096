// apps/server/src/config.ts
//
// Environment configuration, validated with Zod.
// `dotenv/config` is loaded by the entry point before this runs.

import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  /** JSON seed file of {name, clue}; defaults to the bundled word list. */
  WORDS_FILE: z.string().min(1).optional(),
  /** Allowed CORS origin; any origin when unset. */
  CORS_ORIGIN: z.string().min(1).optional(),
});

export type Config = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return envSchema.parse(env);
}
