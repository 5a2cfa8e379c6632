import { z } from 'zod';

import { isLogLevel, type LogLevel } from '../utils/logger';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(3100),
  HOST: z
    .string()
    .trim()
    .transform((value) => value || 'localhost')
    .default('localhost'),
  STORAGE_ROOT: z.string().trim().optional(),
  FFMPEG_PATH: z.string().trim().optional(),
  // "external" leaves task execution to workers that call the /tasks/:id/* callbacks.
  WORKER_MODE: z.enum(['ffmpeg', 'external']).default('ffmpeg'),
  MAX_CONCURRENT_TASKS: positiveInt(2),
  SPACE_REFRESH_INTERVAL_MS: positiveInt(30_000),
  CLEANUP_INTERVAL_MS: positiveInt(3_600_000),
  WS_HEARTBEAT_INTERVAL_MS: positiveInt(30_000),
  HUB_QUEUE_LIMIT: positiveInt(256),
  DEFAULT_MAX_RETRIES: z.coerce.number().int().min(0).default(0),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .refine((value): value is LogLevel => isLogLevel(value), 'Unknown log level')
    .optional()
});

export type EngineConfig = z.infer<typeof envSchema>;

/**
 * Reads the engine configuration from environment variables. Empty strings are
 * treated as unset so that blank lines in `.env` fall back to defaults.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): EngineConfig {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') {
      values[key] = value;
    }
  }

  const parsed = envSchema.safeParse(values);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  return parsed.data;
}
