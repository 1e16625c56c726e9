import { config } from 'dotenv';
import { z } from 'zod';

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    TIMEZONE: z.string().default('UTC')
  })
  .transform((value) => ({
    ...value,
    TIMEZONE: value.TIMEZONE || 'UTC'
  }));

export type AppEnv = z.infer<typeof envSchema>;

let cachedEnv: AppEnv | null = null;

export const loadEnv = (options?: { path?: string }): AppEnv => {
  if (!cachedEnv) {
    config({ path: options?.path });
    const parsed = envSchema.safeParse(process.env);
    if (!parsed.success) {
      const formatted = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join(', ');
      throw new Error(`Invalid environment configuration: ${formatted}`);
    }
    cachedEnv = parsed.data;
  }
  return cachedEnv;
};

export const getEnv = (): AppEnv => {
  if (!cachedEnv) {
    throw new Error('Environment not loaded. Call loadEnv() during startup.');
  }
  return cachedEnv;
};

export const resetEnvCacheForTesting = () => {
  cachedEnv = null;
};
