import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z.union([
  z.boolean(),
  z
    .string()
    .transform(value => value.trim().toLowerCase())
    .transform(value => ['1', 'true', 'yes', 'on'].includes(value))
]);

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  // Signs the cookie that carries the session's mobile override
  SESSION_SECRET: z.string().min(1, 'SESSION_SECRET must not be empty').default('development-session-secret'),
  VIEWS_DIR: z.string().min(1).default('views'),
  // 'false' or 'none' disables the fallback format
  MOBILE_FALL_BACK: z
    .string()
    .trim()
    .transform(value => (['false', 'none', ''].includes(value.toLowerCase()) ? false : value))
    .default('html'),
  MOBILE_SKIP_XHR_REQUESTS: booleanFlag.default(true)
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Parses an environment record, failing with the flattened field errors.
 *
 * @throws Error if any variable is invalid
 */
export function parseEnv(source: NodeJS.ProcessEnv): EnvConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
    throw new Error('Failed to parse environment variables');
  }

  return parsed.data;
}

export const env: EnvConfig = parseEnv(process.env);
