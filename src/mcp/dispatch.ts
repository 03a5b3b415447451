// This module resolves a tool call to its handler, validates arguments, and wraps every outcome uniformly.

import type { FastifyBaseLogger } from 'fastify';
import type { AuditSink } from '../db/audit-store.js';
import type { AuditEntry, DispatchMode, RawToolArguments, ToolArguments } from '../types/domain.js';
import type { ToolCallResult } from '../types/mcp.js';
import { AppError, InvalidArgumentsError, UnknownToolError, errorMessage } from '../utils/errors.js';
import { isJsonObject } from '../utils/json.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { err, ok, type Result } from '../utils/result.js';
import { normalizeArguments } from './arguments.js';
import type { ToolRegistry } from './registry.js';

export type DispatchResult = Result<ToolCallResult, AppError>;

export interface ToolDispatcherOptions {
  registry: ToolRegistry;
  logger: FastifyBaseLogger;
  audit?: AuditSink;
}

// This helper wraps one handler failure into the single-text-item error result.
export function toolErrorResult(toolName: string, error: unknown): ToolCallResult {
  return {
    content: [{ type: 'text', text: `Error executing ${toolName}: ${errorMessage(error)}` }],
    isError: true
  };
}

// This helper returns compact result metadata to keep tool completion logs concise.
function summarizeToolOutput(output: ToolCallResult): Record<string, unknown> {
  return {
    contentItems: output.content.length,
    textLength: output.content.reduce((total, item) => total + item.text.length, 0),
    isError: output.isError === true
  };
}

// This helper flattens zod issues into one readable constraint description.
function describeValidationIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export class ToolDispatcher {
  private readonly registry: ToolRegistry;
  private readonly logger: FastifyBaseLogger;
  private readonly audit?: AuditSink;

  public constructor(options: ToolDispatcherOptions) {
    this.registry = options.registry;
    this.logger = options.logger.child({ component: 'dispatch' });
    this.audit = options.audit;
  }

  // Audit failures are logged and never change the dispatch outcome.
  private recordAudit(entry: AuditEntry): void {
    if (!this.audit) {
      return;
    }

    try {
      this.audit.record(entry);
    } catch (error) {
      this.logger.warn(
        {
          event: 'tool_audit_write_failed',
          toolName: entry.toolName,
          error: errorForLog(error)
        },
        'tool_audit_write_failed'
      );
    }
  }

  // This method validates arguments against the tool's schema when one is registered.
  private validate(toolName: string, args: ToolArguments): Result<ToolArguments, InvalidArgumentsError> {
    const tool = this.registry.resolve(toolName);
    if (!tool.validator) {
      return ok(args);
    }

    const parsed = tool.validator.safeParse(args);
    if (!parsed.success) {
      const description = describeValidationIssues(parsed.error.issues);
      return err(
        new InvalidArgumentsError(`Validation failed for ${toolName}: ${description}`, parsed.error.flatten())
      );
    }

    const value: unknown = parsed.data;
    return ok(isJsonObject(value) ? value : {});
  }

  public async dispatch(toolName: string, raw: RawToolArguments, mode: DispatchMode = 'request'): Promise<DispatchResult> {
    const startedAt = Date.now();

    if (!this.registry.has(toolName)) {
      this.logger.warn({ event: 'mcp_tool_not_found', toolName, mode }, 'mcp_tool_not_found');
      return err(new UnknownToolError(toolName));
    }

    const normalized = normalizeArguments(raw, this.logger);
    const validated = normalized.ok ? this.validate(toolName, normalized.value) : normalized;
    if (!validated.ok) {
      this.logger.warn(
        {
          event: 'mcp_tool_arguments_rejected',
          toolName,
          mode,
          reason: validated.error.message
        },
        'mcp_tool_arguments_rejected'
      );
      this.recordAudit({
        toolName,
        mode,
        outcome: 'rejected',
        durationMs: Date.now() - startedAt,
        message: validated.error.message
      });
      return validated;
    }

    const args = validated.value;
    const tool = this.registry.resolve(toolName);

    this.logger.info(
      {
        event: 'mcp_tool_execution_started',
        toolName,
        mode,
        args: sanitizeForLog(args)
      },
      'mcp_tool_execution_started'
    );

    try {
      const result = await tool.handler(args);

      this.logger.info(
        {
          event: 'mcp_tool_execution_completed',
          toolName,
          mode,
          durationMs: Date.now() - startedAt,
          result: summarizeToolOutput(result)
        },
        'mcp_tool_execution_completed'
      );
      this.recordAudit({ toolName, mode, outcome: 'success', durationMs: Date.now() - startedAt });

      return ok(result);
    } catch (error) {
      this.logger.error(
        {
          event: 'mcp_tool_execution_failed',
          toolName,
          mode,
          durationMs: Date.now() - startedAt,
          error: errorForLog(error)
        },
        'mcp_tool_execution_failed'
      );
      this.recordAudit({
        toolName,
        mode,
        outcome: 'failure',
        durationMs: Date.now() - startedAt,
        message: errorMessage(error)
      });

      return ok(toolErrorResult(toolName, error));
    }
  }
}
