import { z } from 'zod';
import { resolveTimeZone } from './utils/time';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  DATABASE_PATH: z.string().trim().min(1, 'DATABASE_PATH is required'),
  LOCAL_TZ: z.string().optional(),
  ENVIRONMENT: z.string().trim().min(1).default('development'),
  ANTHROPIC_API_KEY: z.string().trim().optional(),
  ANTHROPIC_MODEL: z.string().trim().optional(),
});

export interface Config {
  port: number;
  databasePath: string;
  timeZone: string;
  environment: string;
  anthropicApiKey?: string;
  anthropicModel?: string;
}

/**
 * Read process configuration once at startup. Throws when a required
 * setting is missing so the server never starts half-configured.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }

  const env = parsed.data;
  return {
    port: env.PORT,
    databasePath: env.DATABASE_PATH,
    timeZone: resolveTimeZone(env.LOCAL_TZ),
    environment: env.ENVIRONMENT,
    anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
    anthropicModel: env.ANTHROPIC_MODEL || undefined,
  };
}
