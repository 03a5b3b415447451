// This module provides typed gateway errors that can be mapped into JSON-RPC and HTTP responses.

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  public constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// Tool arguments that cannot be parsed or do not satisfy the tool's input schema.
export class InvalidArgumentsError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(400, 'invalid_arguments', message, details);
    this.name = 'InvalidArgumentsError';
  }
}

export class UnknownToolError extends AppError {
  public readonly toolName: string;

  public constructor(toolName: string) {
    super(404, 'unknown_tool', `Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

export class UnknownMethodError extends AppError {
  public readonly method: string;

  public constructor(method: string) {
    super(404, 'unknown_method', `Unknown method: ${method}`);
    this.name = 'UnknownMethodError';
    this.method = method;
  }
}

export class MissingToolNameError extends AppError {
  public constructor() {
    super(400, 'missing_tool_name', 'Missing tool name');
    this.name = 'MissingToolNameError';
  }
}

export class DuplicateToolError extends AppError {
  public constructor(toolName: string) {
    super(409, 'duplicate_tool', `Tool already registered: ${toolName}`);
    this.name = 'DuplicateToolError';
  }
}

// This error is the internal retry signal of the outbound client and only escapes it wrapped.
export class TransientUpstreamError extends AppError {
  public readonly upstreamStatus?: number;

  public constructor(message: string, upstreamStatus?: number) {
    super(503, 'upstream_transient', message, upstreamStatus === undefined ? undefined : { upstreamStatus });
    this.name = 'TransientUpstreamError';
    this.upstreamStatus = upstreamStatus;
  }
}

export class PermanentUpstreamError extends AppError {
  public readonly upstreamStatus?: number;

  public constructor(message: string, upstreamStatus?: number) {
    super(502, 'upstream_permanent', message, upstreamStatus === undefined ? undefined : { upstreamStatus });
    this.name = 'PermanentUpstreamError';
    this.upstreamStatus = upstreamStatus;
  }
}

export class ConfigurationError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(500, 'configuration_error', message, details);
    this.name = 'ConfigurationError';
  }
}

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(500, 'internal_error', error.message);
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}

// This helper extracts a human-readable message from any thrown value.
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === 'string' ? error : 'unknown error';
}
