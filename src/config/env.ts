/**
 * Environment Configuration
 *
 * Loads .env via dotenv and validates process.env with zod. Startup fails
 * with every offending variable listed when the configuration is invalid.
 */

import dotenv from 'dotenv';
import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value : undefined));

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: positiveInt(8000),

  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DB_POOL_MAX: positiveInt(10),

  WEBHOOK_SECRET: z.string().min(1, 'WEBHOOK_SECRET is required'),
  WEBHOOK_SIGNATURE_HEADER: z
    .string()
    .default('x-kt-webhook-signature')
    .transform((value) => value.toLowerCase()),

  TELEGRAM_BOT_TOKEN: z.string().min(1, 'TELEGRAM_BOT_TOKEN is required'),
  TELEGRAM_CHAT_ID: z.string().min(1, 'TELEGRAM_CHAT_ID is required'),
  ALERT_SEND_TIMEOUT_MS: positiveInt(10_000),
  SPEEDING_ALERT_THRESHOLD_MPH: z.coerce.number().nonnegative().default(5),

  FLEET_API_BASE_URL: z.string().url().default('https://api.gomotive.com'),
  FLEET_API_KEY: optionalString,
  FLEET_API_TIMEOUT_MS: positiveInt(5_000),

  DASHBOARD_USERNAME: z.string().min(1, 'DASHBOARD_USERNAME is required'),
  DASHBOARD_PASSWORD: z.string().min(1, 'DASHBOARD_PASSWORD is required'),
  ALLOWED_ORIGINS: optionalString,
  RATE_LIMIT_QUERY: positiveInt(60),
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  env: Env['NODE_ENV'];
  port: number;
  database: { url: string; poolMax: number };
  webhook: { secret: string; signatureHeader: string };
  telegram: { botToken: string; chatId: string; sendTimeoutMs: number };
  alerts: { speedingThresholdMph: number };
  fleetApi: { baseUrl: string; apiKey?: string; timeoutMs: number };
  dashboard: { username: string; password: string; allowedOrigins: string[]; rateLimitPerMinute: number };
}

export function parseConfig(source: NodeJS.ProcessEnv): AppConfig {
  const result = EnvSchema.safeParse(source);

  if (!result.success) {
    const problems = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Invalid environment configuration:\n  ${problems.join('\n  ')}`);
  }

  const env = result.data;

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    database: { url: env.DATABASE_URL, poolMax: env.DB_POOL_MAX },
    webhook: { secret: env.WEBHOOK_SECRET, signatureHeader: env.WEBHOOK_SIGNATURE_HEADER },
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      chatId: env.TELEGRAM_CHAT_ID,
      sendTimeoutMs: env.ALERT_SEND_TIMEOUT_MS,
    },
    alerts: { speedingThresholdMph: env.SPEEDING_ALERT_THRESHOLD_MPH },
    fleetApi: { baseUrl: env.FLEET_API_BASE_URL, apiKey: env.FLEET_API_KEY, timeoutMs: env.FLEET_API_TIMEOUT_MS },
    dashboard: {
      username: env.DASHBOARD_USERNAME,
      password: env.DASHBOARD_PASSWORD,
      allowedOrigins: env.ALLOWED_ORIGINS ? env.ALLOWED_ORIGINS.split(',').map((o) => o.trim()) : [],
      rateLimitPerMinute: env.RATE_LIMIT_QUERY,
    },
  };
}

/**
 * Load .env into process.env, then validate
 */
export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
