/**
 * Centralized configuration with runtime validation
 * All environment variables validated at startup via Zod
 */
import { z } from 'zod';
import 'dotenv/config';

const configSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3040),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // Redis (push update stream + peer store)
  REDIS_HOST: z.string().default('127.0.0.1'),
  REDIS_PORT: z.coerce.number().default(6379),
  REDIS_USERNAME: z.string().optional(),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().default(0),
  REDIS_TLS: z.enum(['true', 'false', '1', '0', '']).default('').transform(v => v === 'true' || v === '1'),

  // Call API
  CALL_API_URL: z.string().url().default('http://127.0.0.1:8080'),
  CALL_API_KEY: z.string().default(''),
  CALL_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // Mirrored call
  CALL_ID: z.string().min(1).default('default'),
  MY_PEER_ID: z.string().min(1).default('self'),
  CALL_UPDATES_CHANNEL: z.string().default('calls:updates'),

  // Roster sync
  PARTICIPANTS_PAGE_LIMIT: z.coerce.number().int().positive().default(100),
  ACTIVITY_DECAY_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
  ACTIVITY_RANK_TTL_MS: z.coerce.number().int().positive().default(60_000),
});

export type Config = z.infer<typeof configSchema>;

/** Validated configuration object - fails fast on invalid config */
export const config: Config = configSchema.parse(process.env);

/** Type-safe config access */
export const isDev = config.NODE_ENV === 'development';
