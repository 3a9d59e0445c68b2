import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { LogLevel } from './logger';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120000).default(10000),
  MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  RETRY_DELAY_MS: z.coerce.number().int().min(100).max(30000).default(1000),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  SCRAPE_API_URL: z.string().url().default('http://localhost:8080'),
});

export interface AppConfig {
  port: number;
  host: string;
  fetchTimeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  userAgent: string;
  logLevel: LogLevel;
  apiUrl: string;
}

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  // Blank values fall back to defaults.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const fields = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${fields.join('; ')}`);
  }

  const values = parsed.data;
  return Object.freeze({
    port: values.PORT,
    host: values.HOST,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    maxRetries: values.MAX_RETRIES,
    retryDelayMs: values.RETRY_DELAY_MS,
    userAgent: values.USER_AGENT,
    logLevel: values.LOG_LEVEL,
    apiUrl: values.SCRAPE_API_URL,
  });
}

let cached: AppConfig | undefined;

export function loadConfig(): AppConfig {
  if (!cached) {
    dotenv.config();
    cached = parseConfig(process.env);
  }
  return cached;
}
