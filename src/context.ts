// This module builds the gateway context once at startup and hands it to every route by reference.

import type { FastifyBaseLogger } from 'fastify';
import type { GatewaySettings } from './config/settings.js';
import { SqliteAuditStore, type AuditSink } from './db/audit-store.js';
import { ToolDispatcher } from './mcp/dispatch.js';
import { PromptCatalog } from './mcp/prompts.js';
import { ProtocolAdapter } from './mcp/protocol.js';
import type { ToolRegistry } from './mcp/registry.js';
import { ResourceProvider } from './mcp/resources.js';
import { EmailChannel } from './notify/email.js';
import { GatewayNotifier, type Notifier } from './notify/notifier.js';
import { WebhookChannel } from './notify/webhook.js';
import { listDataApiEndpoints } from './tools/catalog.js';
import { buildToolRegistry } from './tools/index.js';
import { UpstreamClient, type DataApi } from './upstream/client.js';

export interface GatewayContext {
  settings: GatewaySettings;
  registry: ToolRegistry;
  dispatcher: ToolDispatcher;
  protocol: ProtocolAdapter;
  api: DataApi;
  notifier: Notifier;
  audit?: AuditSink;
  startedAt: number;
  // Releases resources the context opened itself.
  close(): void;
}

// Tests swap in-process stand-ins for the data API, delivery, and audit storage.
export interface GatewayContextOverrides {
  api?: DataApi;
  notifier?: Notifier;
  audit?: AuditSink;
  now?: () => number;
}

export function buildGatewayContext(
  settings: GatewaySettings,
  logger: FastifyBaseLogger,
  overrides: GatewayContextOverrides = {}
): GatewayContext {
  const now = overrides.now ?? Date.now;
  const startedAt = now();

  const ownedAuditStore =
    !overrides.audit && settings.databasePath ? new SqliteAuditStore(settings.databasePath) : undefined;
  const audit = overrides.audit ?? ownedAuditStore;

  const api =
    overrides.api ??
    new UpstreamClient({
      settings: settings.upstream,
      userAgent: `${settings.serverName}/${settings.serverVersion}`,
      logger
    });

  const notifier =
    overrides.notifier ??
    new GatewayNotifier({
      email: new EmailChannel({ settings: settings.smtp }),
      webhook: new WebhookChannel(),
      logger
    });

  const registry = buildToolRegistry({ api, notifier, logger });
  const dispatcher = new ToolDispatcher({ registry, logger, audit });
  const protocol = new ProtocolAdapter({
    registry,
    dispatcher,
    resources: new ResourceProvider({
      settings,
      endpoints: listDataApiEndpoints(),
      audit,
      startedAt,
      now
    }),
    prompts: new PromptCatalog(),
    serverInfo: {
      name: settings.serverName,
      version: settings.serverVersion
    },
    logger,
    now
  });

  logger.info(
    {
      event: 'gateway_context_ready',
      tools: registry.size,
      auditEnabled: audit !== undefined,
      upstreamConfigured: settings.upstream.baseUrl !== undefined
    },
    'gateway_context_ready'
  );

  return {
    settings,
    registry,
    dispatcher,
    protocol,
    api,
    notifier,
    audit,
    startedAt,
    close: () => {
      ownedAuditStore?.close();
    }
  };
}
