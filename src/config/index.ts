import { z } from 'zod';

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  API_PORT: z.coerce.number().default(3000),

  ANTHROPIC_API_KEY: z.string().min(1),
  DEFAULT_MODEL: z.string().min(1).default('claude-sonnet-4-20250514'),

  STORAGE_ROOT: z.string().min(1).default('storage'),
  RETENTION_HOURS: z.coerce.number().positive().default(24),
  SWEEP_CRON: z.string().min(1).default('0 * * * *'),
  HISTORY_LIMIT: z.coerce.number().int().positive().default(50),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const config = {
  databaseUrl: parsed.data.DATABASE_URL,
  apiPort: parsed.data.API_PORT,
  anthropicApiKey: parsed.data.ANTHROPIC_API_KEY,
  defaultModel: parsed.data.DEFAULT_MODEL,
  storageRoot: parsed.data.STORAGE_ROOT,
  retentionHours: parsed.data.RETENTION_HOURS,
  sweepCron: parsed.data.SWEEP_CRON,
  historyLimit: parsed.data.HISTORY_LIMIT,
  nodeEnv: parsed.data.NODE_ENV,
  logLevel: parsed.data.LOG_LEVEL,
} as const;
