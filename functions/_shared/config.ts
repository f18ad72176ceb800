import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export const DEFAULT_TASKS_DIR = fileURLToPath(new URL('./metric_engine/definitions/', import.meta.url));

const configSchema = z.object({
  METRIC_TASKS_DIR: z.string().trim().min(1).default(DEFAULT_TASKS_DIR),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  METRIC_TASKS_STRICT: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  CORS_ALLOW_ORIGIN: z.string().trim().min(1).default('*'),
});

export interface MetricTasksConfig {
  tasksDir: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  strict: boolean;
  corsAllowOrigin: string;
}

/**
 * Reads configuration from environment variables. Empty values count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): MetricTasksConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const result = configSchema.safeParse(present);
  if (!result.success) {
    const problems = result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  return {
    tasksDir: result.data.METRIC_TASKS_DIR,
    logLevel: result.data.LOG_LEVEL,
    strict: result.data.METRIC_TASKS_STRICT,
    corsAllowOrigin: result.data.CORS_ALLOW_ORIGIN,
  };
}
