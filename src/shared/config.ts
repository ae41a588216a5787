import { z } from 'zod';
import { ConfigError } from './errors.js';

const optionalUrl = z
  .string()
  .trim()
  .transform((v) => (v === '' ? undefined : v))
  .pipe(z.string().url().optional())
  .optional();

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v === '' ? undefined : v))
  .optional();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  DB_PATH: z.string().min(1).default('./data/reelgrade.db'),
  AUTH_SECRET: z.string().min(16),
  RUBRIC_PATH: z.string().min(1).default('./config/rubric.json'),

  CONTENT_SERVICE_URL: optionalUrl,
  CONTENT_SERVICE_KEY: optionalString,
  ANNOTATION_SERVICE_URL: optionalUrl,
  ANNOTATION_SERVICE_KEY: optionalString,
  ANALYTICS_URL: optionalUrl,
  STORAGE_ROOT: z.string().min(1).default('./data/objects'),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),

  SLACK_WEBHOOK_URL: optionalUrl,
  PUBLIC_BASE_URL: optionalUrl,

  STRIPE_SECRET_KEY: optionalString,
  STRIPE_WEBHOOK_SECRET: optionalString,
  STRIPE_PRICE_1000: optionalString,
  STRIPE_PRICE_3000: optionalString,

  JOB_TIMEOUT_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  COLLABORATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(2 * 60 * 1000),
  COLLABORATOR_RETRIES: z.coerce.number().int().min(0).max(5).default(1),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(500),
  CACHE_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  STALE_JOB_THRESHOLD_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((i) => i.path.join('.')))];
    throw new ConfigError(`Invalid environment: ${keys.join(', ')}`, keys);
  }
  return parsed.data;
}
