// This file centralizes domain models used across tools, the outbound client, delivery, and audit storage.

// Raw tool arguments as they arrive at a transport, classified before dispatch.
export type RawToolArguments =
  | { kind: 'absent' }
  | { kind: 'text'; text: string }
  | { kind: 'structured'; value: Record<string, unknown> }
  | { kind: 'unrecognized'; value: unknown };

export type ToolArguments = Record<string, unknown>;

export type DispatchMode = 'request' | 'notification';

// The wrapper used for non-JSON upstream responses.
export interface UpstreamTextPayload {
  content: string;
  status_code: number;
}

export type QueryValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryValue>;

export interface EmailAttachment {
  filename: string;
  content: string;
  contentType: string;
}

export interface EmailPayload {
  to: string;
  subject: string;
  body: string;
  cc: string[];
  bcc: string[];
  isHtml: boolean;
  attachments: EmailAttachment[];
}

export interface WebhookPayload {
  url: string;
  method: 'POST' | 'PUT' | 'PATCH';
  payload: Record<string, unknown>;
  headers: Record<string, string>;
}

export type DeliveryRequest =
  | { channel: 'email'; payload: EmailPayload }
  | { channel: 'webhook'; payload: WebhookPayload };

export type DeliveryOutcome =
  | { status: 'success'; detail: string }
  | { status: 'failure'; reason: string };

export type AuditOutcome = 'success' | 'failure' | 'rejected';

export interface AuditEntry {
  toolName: string;
  mode: DispatchMode;
  outcome: AuditOutcome;
  durationMs: number;
  message?: string;
}

export interface StoredAuditEntry extends AuditEntry {
  id: number;
  timestamp: string;
}
