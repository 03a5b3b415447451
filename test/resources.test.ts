// This test suite verifies the read-only gateway resources.

import { describe, expect, it } from 'vitest';
import { ResourceProvider } from '../src/mcp/resources.js';
import { listDataApiEndpoints } from '../src/tools/catalog.js';
import { GUEST_ACCESS_KEY } from '../src/upstream/client.js';
import { MemoryAuditSink, testSettings } from './helpers.js';

function readJson(provider: ResourceProvider, uri: string): unknown {
  return JSON.parse(provider.read(uri).text);
}

describe('resource provider', () => {
  it('describes bearer authentication when a real key is configured', () => {
    const provider = new ResourceProvider({ settings: testSettings(), endpoints: listDataApiEndpoints() });

    expect(readJson(provider, 'api://schema')).toMatchObject({
      base_url: 'http://data-api.test/api/method/iot.',
      authentication: 'Bearer token',
      rate_limit: 100
    });
  });

  it('describes guest access when the guest key is configured', () => {
    const provider = new ResourceProvider({
      settings: testSettings({ EXTERNAL_API_KEY: GUEST_ACCESS_KEY }),
      endpoints: ['get_iot_equipment_list']
    });

    expect(readJson(provider, 'api://schema')).toEqual({
      base_url: 'http://data-api.test/api/method/iot.',
      authentication: 'Guest access',
      available_endpoints: ['GET get_iot_equipment_list'],
      rate_limit: 100
    });
  });

  it('reports uptime from the injected clock', () => {
    let clock = 10_000;
    const provider = new ResourceProvider({
      settings: testSettings(),
      endpoints: [],
      startedAt: clock,
      now: () => clock
    });
    clock = 72_500;

    expect(readJson(provider, 'config://server')).toEqual({
      server_name: 'iot-mcp-gateway',
      server_version: '1.0.0',
      api_base_url: 'http://data-api.test/api/method/iot.',
      uptime_seconds: 62,
      status: 'running'
    });
  });

  it('renders recent audit entries oldest first', () => {
    const audit = new MemoryAuditSink();
    audit.record({ toolName: 'get_iot_equipment_list', mode: 'request', outcome: 'success', durationMs: 4 });
    audit.record({ toolName: 'send_email', mode: 'request', outcome: 'failure', durationMs: 9, message: 'smtp down' });
    const provider = new ResourceProvider({ settings: testSettings(), endpoints: [], audit });

    expect(provider.read('logs://recent').text).toBe(
      [
        '2024-01-01T00:00:00.000Z get_iot_equipment_list request success 4ms',
        '2024-01-01T00:00:01.000Z send_email request failure 9ms - smtp down'
      ].join('\n')
    );
  });

  it('rejects unknown resource URIs', () => {
    const provider = new ResourceProvider({ settings: testSettings(), endpoints: [] });

    expect(() => provider.read('files://secret')).toThrow('Unknown resource: files://secret');
  });
});
