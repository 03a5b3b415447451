// This module exposes read-only gateway resources: server configuration, recent tool activity, and the data API schema.

import type { GatewaySettings } from '../config/settings.js';
import type { AuditSink } from '../db/audit-store.js';
import type { StoredAuditEntry } from '../types/domain.js';
import type { McpResource } from '../types/mcp.js';
import { GUEST_ACCESS_KEY } from '../upstream/client.js';
import { AppError } from '../utils/errors.js';

const RECENT_LOG_LIMIT = 100;

export interface ResourceContents {
  uri: string;
  mimeType: string;
  text: string;
}

export interface ResourceProviderOptions {
  settings: GatewaySettings;
  endpoints: string[];
  audit?: AuditSink;
  startedAt?: number;
  now?: () => number;
}

const RESOURCES: readonly McpResource[] = [
  {
    uri: 'config://server',
    name: 'Server Configuration',
    description: 'Current server configuration and status',
    mimeType: 'application/json'
  },
  {
    uri: 'logs://recent',
    name: 'Recent Logs',
    description: 'Recent tool executions recorded by the gateway',
    mimeType: 'text/plain'
  },
  {
    uri: 'api://schema',
    name: 'API Schema',
    description: 'External data API schema and documentation',
    mimeType: 'application/json'
  }
];

function formatAuditLine(entry: StoredAuditEntry): string {
  const suffix = entry.message ? ` - ${entry.message}` : '';
  return `${entry.timestamp} ${entry.toolName} ${entry.mode} ${entry.outcome} ${entry.durationMs}ms${suffix}`;
}

export class ResourceProvider {
  private readonly settings: GatewaySettings;
  private readonly endpoints: string[];
  private readonly audit?: AuditSink;
  private readonly now: () => number;
  private readonly startedAt: number;

  public constructor(options: ResourceProviderOptions) {
    this.settings = options.settings;
    this.endpoints = options.endpoints;
    this.audit = options.audit;
    this.now = options.now ?? Date.now;
    this.startedAt = options.startedAt ?? this.now();
  }

  public list(): McpResource[] {
    return RESOURCES.map((resource) => ({ ...resource }));
  }

  public read(uri: string): ResourceContents {
    switch (uri) {
      case 'config://server':
        return this.json(uri, {
          server_name: this.settings.serverName,
          server_version: this.settings.serverVersion,
          api_base_url: this.settings.upstream.baseUrl ?? null,
          uptime_seconds: Math.floor((this.now() - this.startedAt) / 1000),
          status: 'running'
        });

      case 'logs://recent':
        return { uri, mimeType: 'text/plain', text: this.recentLogs() };

      case 'api://schema': {
        const apiKey = this.settings.upstream.apiKey;
        return this.json(uri, {
          base_url: this.settings.upstream.baseUrl ?? null,
          authentication: apiKey && apiKey !== GUEST_ACCESS_KEY ? 'Bearer token' : 'Guest access',
          available_endpoints: this.endpoints.map((endpoint) => `GET ${endpoint}`),
          rate_limit: this.settings.upstream.rateLimit
        });
      }

      default:
        throw new AppError(404, 'unknown_resource', `Unknown resource: ${uri}`);
    }
  }

  private json(uri: string, value: Record<string, unknown>): ResourceContents {
    return { uri, mimeType: 'application/json', text: JSON.stringify(value, null, 2) };
  }

  // Oldest line first, like a log tail.
  private recentLogs(): string {
    const entries = this.audit?.listRecent(RECENT_LOG_LIMIT) ?? [];
    if (entries.length === 0) {
      return 'No recent logs available';
    }

    return [...entries].reverse().map(formatAuditLine).join('\n');
  }
}
