// This module parses process environment into validated gateway settings once at startup.

import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

// This helper treats empty environment values as absent so defaults still apply.
function optionalString() {
  return z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined));
}

const envSchema = z.object({
  SERVER_NAME: z.string().trim().min(1).default('iot-mcp-gateway'),
  SERVER_VERSION: z.string().trim().min(1).default('1.0.0'),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  SERVER_PORT: z.coerce.number().int().min(1).max(65535).default(6018),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']))
    .default('info'),
  EXTERNAL_API_BASE_URL: optionalString().pipe(z.string().url().optional()),
  EXTERNAL_API_KEY: optionalString(),
  EXTERNAL_API_TIMEOUT: z.coerce.number().positive().default(30),
  EXTERNAL_API_RATE_LIMIT: z.coerce.number().int().min(1).default(100),
  EXTERNAL_API_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  EXTERNAL_API_RETRY_BASE_MS: z.coerce.number().int().min(0).default(4000),
  EXTERNAL_API_RETRY_MAX_MS: z.coerce.number().int().min(0).default(10_000),
  EXTERNAL_API_PERMIT_WAIT_MS: z.coerce.number().int().min(0).default(30_000),
  SSE_HEARTBEAT_INTERVAL_MS: z.coerce.number().int().min(10).default(30_000),
  DATABASE_PATH: optionalString(),
  SMTP_HOST: optionalString(),
  SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
  SMTP_USER: optionalString(),
  SMTP_PASSWORD: optionalString(),
  CORS_ORIGINS: z.string().default('*')
});

export interface UpstreamSettings {
  baseUrl?: string;
  apiKey?: string;
  timeoutMs: number;
  rateLimit: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  permitWaitMs: number;
}

export interface SmtpSettings {
  host?: string;
  port: number;
  user?: string;
  password?: string;
}

export interface GatewaySettings {
  serverName: string;
  serverVersion: string;
  host: string;
  port: number;
  logLevel: string;
  upstream: UpstreamSettings;
  sseHeartbeatIntervalMs: number;
  databasePath?: string;
  smtp: SmtpSettings;
  corsOrigins: string[];
}

// This helper splits the comma-separated CORS origin list and keeps "*" as the allow-all marker.
function parseCorsOrigins(raw: string): string[] {
  const origins = raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  return origins.length > 0 ? origins : ['*'];
}

// This function validates environment values and returns one immutable settings object.
export function loadSettings(env: NodeJS.ProcessEnv = process.env): GatewaySettings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, parsed.error.flatten());
  }

  const values = parsed.data;
  return Object.freeze({
    serverName: values.SERVER_NAME,
    serverVersion: values.SERVER_VERSION,
    host: values.HOST,
    port: values.SERVER_PORT,
    logLevel: values.LOG_LEVEL,
    upstream: {
      baseUrl: values.EXTERNAL_API_BASE_URL,
      apiKey: values.EXTERNAL_API_KEY,
      timeoutMs: values.EXTERNAL_API_TIMEOUT * 1000,
      rateLimit: values.EXTERNAL_API_RATE_LIMIT,
      maxAttempts: values.EXTERNAL_API_MAX_ATTEMPTS,
      retryBaseDelayMs: values.EXTERNAL_API_RETRY_BASE_MS,
      retryMaxDelayMs: values.EXTERNAL_API_RETRY_MAX_MS,
      permitWaitMs: values.EXTERNAL_API_PERMIT_WAIT_MS
    },
    sseHeartbeatIntervalMs: values.SSE_HEARTBEAT_INTERVAL_MS,
    databasePath: values.DATABASE_PATH,
    smtp: {
      host: values.SMTP_HOST,
      port: values.SMTP_PORT,
      user: values.SMTP_USER,
      password: values.SMTP_PASSWORD
    },
    corsOrigins: parseCorsOrigins(values.CORS_ORIGINS)
  });
}
