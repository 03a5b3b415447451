// This module provides shared settings, loggers, and in-process stand-ins for gateway tests.

import type { FastifyBaseLogger } from 'fastify';
import { loadSettings, type GatewaySettings } from '../src/config/settings.js';
import type { AuditSink } from '../src/db/audit-store.js';
import type { Notifier } from '../src/notify/notifier.js';
import type {
  AuditEntry,
  DeliveryOutcome,
  DeliveryRequest,
  QueryParams,
  StoredAuditEntry
} from '../src/types/domain.js';
import type { DataApi } from '../src/upstream/client.js';
import { createLogger } from '../src/utils/logger.js';

export const TEST_BASE_URL = 'http://data-api.test/api/method/iot.';

// This helper builds validated settings from a minimal test environment.
export function testSettings(env: NodeJS.ProcessEnv = {}): GatewaySettings {
  return loadSettings({
    LOG_LEVEL: 'silent',
    EXTERNAL_API_BASE_URL: TEST_BASE_URL,
    EXTERNAL_API_KEY: 'test-secret',
    ...env
  });
}

export function silentLogger(): FastifyBaseLogger {
  return createLogger('silent', 'test');
}

export interface DataApiCall {
  endpoint: string;
  params?: QueryParams;
}

// This fake answers data API reads from a responder function and records every call.
export class FakeDataApi implements DataApi {
  public readonly calls: DataApiCall[] = [];
  private readonly responder: (endpoint: string, params?: QueryParams) => unknown;

  public constructor(responder: (endpoint: string, params?: QueryParams) => unknown) {
    this.responder = responder;
  }

  public async get(endpoint: string, params?: QueryParams): Promise<unknown> {
    this.calls.push({ endpoint, params });
    return this.responder(endpoint, params);
  }
}

// This notifier records delivery requests and answers one configurable outcome.
export class RecordingNotifier implements Notifier {
  public readonly requests: DeliveryRequest[] = [];
  public outcome: DeliveryOutcome = { status: 'success', detail: 'delivered' };

  public async deliver(request: DeliveryRequest): Promise<DeliveryOutcome> {
    this.requests.push(request);
    return this.outcome;
  }
}

// This sink keeps audit entries in memory.
export class MemoryAuditSink implements AuditSink {
  public readonly entries: AuditEntry[] = [];

  public record(entry: AuditEntry): void {
    this.entries.push(entry);
  }

  public listRecent(limit: number): StoredAuditEntry[] {
    return this.entries
      .map((entry, index) => ({ ...entry, id: index + 1, timestamp: `2024-01-01T00:00:0${index}.000Z` }))
      .reverse()
      .slice(0, limit);
  }
}

// This helper builds a JSON Response for fetch stubs.
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' }
  });
}
