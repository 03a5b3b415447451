// This module classifies raw tool arguments at the transport boundary and normalizes them for dispatch.

import type { FastifyBaseLogger } from 'fastify';
import type { RawToolArguments, ToolArguments } from '../types/domain.js';
import { InvalidArgumentsError } from '../utils/errors.js';
import { isJsonObject, tryParseJson } from '../utils/json.js';
import { err, ok, type Result } from '../utils/result.js';

export function classifyArguments(raw: unknown): RawToolArguments {
  if (raw === undefined) {
    return { kind: 'absent' };
  }

  if (typeof raw === 'string') {
    return { kind: 'text', text: raw };
  }

  if (isJsonObject(raw)) {
    return { kind: 'structured', value: raw };
  }

  return { kind: 'unrecognized', value: raw };
}

// This function resolves every argument shape into one plain object or an InvalidArgumentsError.
export function normalizeArguments(
  raw: RawToolArguments,
  logger?: FastifyBaseLogger
): Result<ToolArguments, InvalidArgumentsError> {
  switch (raw.kind) {
    case 'absent':
      return ok({});

    case 'structured':
      return ok(raw.value);

    case 'text': {
      if (raw.text.trim().length === 0) {
        return ok({});
      }

      const parsed = tryParseJson(raw.text);
      if (!parsed.ok) {
        logger?.warn(
          {
            event: 'tool_arguments_parse_failed',
            reason: parsed.error
          },
          'tool_arguments_parse_failed'
        );
        return err(new InvalidArgumentsError(`Invalid JSON arguments: ${parsed.error}`));
      }

      if (!isJsonObject(parsed.value)) {
        return err(new InvalidArgumentsError('Invalid JSON arguments: expected a JSON object.'));
      }

      return ok(parsed.value);
    }

    case 'unrecognized':
      logger?.warn(
        {
          event: 'tool_arguments_unexpected_type',
          receivedType: Array.isArray(raw.value) ? 'array' : raw.value === null ? 'null' : typeof raw.value
        },
        'tool_arguments_unexpected_type'
      );
      return ok({});
  }
}
