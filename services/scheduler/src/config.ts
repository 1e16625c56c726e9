import { z } from 'zod';
import { loadEnv, type AppEnv } from '@velvetqueue/shared/env';

const booleanFlag = z
  .string()
  .default('true')
  .transform((value) => ['true', '1', 'yes'].includes(value.trim().toLowerCase()));

// Environment schema
const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),

  // Database
  DATABASE_PATH: z.string().default('./velvetqueue.db'),

  // Media served by this service
  PUBLIC_BASE_URL: z.string().url('PUBLIC_BASE_URL must be a valid URL').default('http://localhost:8000'),
  MEDIA_ROOT: z.string().default('.'),

  // Instagram Graph API
  INSTAGRAM_USER_ID: z.string().optional(),
  INSTAGRAM_ACCESS_TOKEN: z.string().optional(),
  INSTAGRAM_API_VERSION: z.string().default('v21.0'),
  INSTAGRAM_GRAPH_URL: z.string().url().default('https://graph.facebook.com'),

  // Image hosting
  FREEIMAGE_API_URL: z.string().url().default('https://freeimage.host/api/1/upload'),
  FREEIMAGE_API_KEY: z.string().optional(),

  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  PUBLISH_PROCESSING_WAIT_MS: z.coerce.number().int().min(0).default(60000),

  // Scheduler
  SCHEDULER_ENABLED: booleanFlag,
  SCHEDULER_INTERVAL_SECONDS: z.coerce
    .number()
    .int()
    .min(5)
    .max(30)
    .refine((value) => 60 % value === 0, 'SCHEDULER_INTERVAL_SECONDS must divide 60')
    .default(15),
  SCHEDULER_BATCH_SIZE: z.coerce.number().int().positive().default(10),

  ALLOWED_ORIGINS: z.string().default('http://localhost:3000'),
});

export type Config = z.infer<typeof envSchema>;

export interface EnvCredentials {
  userId?: string;
  accessToken?: string;
}

export class ConfigManager {
  private readonly _config: Config;
  private readonly _base: AppEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this._base = loadEnv();
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
      const formatted = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join(', ');
      throw new Error(`Invalid scheduler configuration: ${formatted}`);
    }
    this._config = parsed.data;
  }

  get config(): Config {
    return this._config;
  }

  get timezone(): string {
    return this._base.TIMEZONE;
  }

  get allowedOrigins(): string[] {
    return this._config.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0);
  }

  get instagramCredentials(): EnvCredentials {
    return {
      userId: this._config.INSTAGRAM_USER_ID,
      accessToken: this._config.INSTAGRAM_ACCESS_TOKEN,
    };
  }
}

let instance: ConfigManager | null = null;

export const getConfig = (): ConfigManager => {
  if (!instance) {
    instance = new ConfigManager();
  }
  return instance;
};
