// This utility module keeps JSON parse operations safe and explicit.

import type { Result } from './result.js';

// This helper parses untrusted JSON text into a result instead of throwing on malformed input.
export function tryParseJson(value: string): Result<unknown, string> {
  try {
    const parsed: unknown = JSON.parse(value);
    return { ok: true, value: parsed };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : 'unknown parse failure' };
  }
}

// This helper narrows unknown values to plain JSON objects.
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
