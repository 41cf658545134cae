import { z } from 'zod';

export const envSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Database (MySQL / MariaDB)
  DATABASE_URL: z.string().optional(),
  DB_CONNECTION_LIMIT: z.coerce.number().int().positive().default(10),

  // Redis (queued ingestion only)
  REDIS_URL: z.string().default('redis://localhost:6379'),

  // Session tokens
  AUTH_SECRET: z.string().min(32, 'AUTH_SECRET must be at least 32 characters'),

  // =============================================================================
  // Analytics
  // =============================================================================

  ANALYTICS_STORE_DRIVER: z.enum(['MYSQL', 'MEMORY']).default('MEMORY'),
  ANALYTICS_INGEST_MODE: z.enum(['DIRECT', 'QUEUE']).default('DIRECT'),
  ANALYTICS_MAX_IN_FLIGHT: z.coerce.number().int().positive().default(256),
  ANALYTICS_QUEUE_CONCURRENCY: z.coerce.number().int().positive().default(8),
  ANALYTICS_REPORT_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  ANALYTICS_SKIP_PATHS: z
    .string()
    .default('/api/health,/_next,/favicon.ico')
    .transform((val) =>
      val
        .split(',')
        .map((path) => path.trim())
        .filter((path) => path.length > 0)
    ),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    console.error('❌ Invalid environment variables:');
    console.error(parsed.error.flatten().fieldErrors);
    throw new Error('Invalid environment variables');
  }

  const data = parsed.data;

  if (data.ANALYTICS_STORE_DRIVER === 'MYSQL' && !data.DATABASE_URL) {
    console.error('❌ DATABASE_URL is required when ANALYTICS_STORE_DRIVER is MYSQL');
    throw new Error('DATABASE_URL required for MYSQL store driver');
  }

  if (data.NODE_ENV === 'production' && data.ANALYTICS_STORE_DRIVER === 'MEMORY') {
    console.error('❌ ANALYTICS_STORE_DRIVER must be MYSQL in production');
    throw new Error('MEMORY store driver is not allowed in production');
  }

  return data;
}

export const env = parseEnv(process.env);
