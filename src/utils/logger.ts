// This module builds the pino configuration and shapes tool arguments, upstream params, and delivery targets for logs.

import pino, { type Logger, type LoggerOptions } from 'pino';

const REDACTED = '[redacted]';

const LIMITS = {
  depth: 5,
  stringLength: 512,
  arrayItems: 20,
  objectKeys: 40
} as const;

// Fastify request headers plus the settings fields that carry credentials.
const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'upstream.apiKey',
  'smtp.password',
  'settings.upstream.apiKey',
  'settings.smtp.password'
];

// The upstream key, SMTP credentials, and webhook auth headers all match one of these.
const SENSITIVE_KEY_PATTERNS: readonly RegExp[] = [
  /authorization/i,
  /api[-_]?key/i,
  /password/i,
  /secret/i,
  /token/i,
  /signature/i,
  /cookie/i
];

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
}

function truncate(value: string): string {
  if (value.length <= LIMITS.stringLength) {
    return value;
  }

  return `${value.slice(0, LIMITS.stringLength)}...[+${value.length - LIMITS.stringLength} chars]`;
}

// Webhook URLs often carry their credential in the query string or userinfo; only origin and path are logged.
export function redactUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return truncate(value);
  }

  const query = url.search ? `?${REDACTED}` : '';
  return `${url.origin}${url.pathname}${query}`;
}

function sanitizeRecord(source: Record<string, unknown>, depth: number): Record<string, unknown> {
  const keys = Object.keys(source);
  const target: Record<string, unknown> = {};

  for (const key of keys.slice(0, LIMITS.objectKeys)) {
    target[key] = isSensitiveKey(key) ? REDACTED : sanitizeForLog(source[key], depth + 1);
  }

  if (keys.length > LIMITS.objectKeys) {
    target['[omittedKeys]'] = keys.length - LIMITS.objectKeys;
  }

  return target;
}

// This helper bounds a payload's size and masks credential-bearing fields before it reaches a log line.
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    return truncate(value);
  }

  if (depth >= LIMITS.depth) {
    return '[nested]';
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    const items = value.slice(0, LIMITS.arrayItems).map((item) => sanitizeForLog(item, depth + 1));
    return value.length > LIMITS.arrayItems ? [...items, `[+${value.length - LIMITS.arrayItems} items]`] : items;
  }

  if (typeof value === 'object') {
    return sanitizeRecord(Object.fromEntries(Object.entries(value)), depth);
  }

  return String(value);
}

export function errorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}

// Fastify and the standalone logger share these options so every line carries the service name.
export function buildLoggerOptions(level: string, service: string): LoggerOptions {
  return {
    level,
    base: {
      service
    },
    redact: {
      paths: REDACT_PATHS,
      censor: REDACTED
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}

// This helper builds a logger for code that runs before or outside a Fastify instance.
export function createLogger(level: string, service: string): Logger {
  return pino(buildLoggerOptions(level, service));
}
