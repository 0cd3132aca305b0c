import { z } from 'zod';
import { DEFAULT_BASE_URL } from './api/urls';

const positiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((val) => /^\d+$/.test(val) && parseInt(val, 10) > 0, { message: 'must be a positive integer' })
    .transform((val) => parseInt(val, 10));

export const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a YYYY-MM-DD date')
  .refine((val) => {
    const date = new Date(`${val}T00:00:00.000Z`);
    return !isNaN(date.getTime()) && date.toISOString().slice(0, 10) === val;
  }, { message: 'must be a valid calendar date' })
  .transform((val) => new Date(`${val}T00:00:00.000Z`));

const envSchema = z.object({
  BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  USER_AGENT: z.string().min(1).optional(),
  REQUEST_TIMEOUT_MS: positiveInt('30000'),
  RETRIES: positiveInt('10'),
  POOL_SIZE: positiveInt('20'),
  BEGIN_DATE: isoDate.default('2006-03-21'),
  // consumed by createLogger
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export interface ScraperConfig {
  baseUrl: string;
  userAgent?: string;
  timeoutMs: number;
  retries: number;
  poolSize: number;
  beginDate: Date;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    baseUrl: e.BASE_URL,
    userAgent: e.USER_AGENT,
    timeoutMs: e.REQUEST_TIMEOUT_MS,
    retries: e.RETRIES,
    poolSize: e.POOL_SIZE,
    beginDate: e.BEGIN_DATE,
  };
}
