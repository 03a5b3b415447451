// This module exposes liveness and identity endpoints.

import type { FastifyInstance } from 'fastify';
import type { GatewayContext } from '../context.js';
import { MCP_PROTOCOL_VERSION, SUPPORTED_TRANSPORTS } from '../version.js';

export function registerHealthRoutes(fastify: FastifyInstance, context: GatewayContext): void {
  fastify.get('/health', async () => ({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    transport: [...SUPPORTED_TRANSPORTS],
    mcp_version: MCP_PROTOCOL_VERSION
  }));

  fastify.get('/version', async () => ({
    name: context.settings.serverName,
    version: context.settings.serverVersion,
    mcp_version: MCP_PROTOCOL_VERSION
  }));

  fastify.get('/', async () => ({
    name: context.settings.serverName,
    version: context.settings.serverVersion,
    description: 'MCP tool gateway for industrial IoT data',
    endpoints: {
      health: '/health',
      version: '/version',
      sse: '/sse',
      mcp: '/mcp',
      tools: '/tools'
    }
  }));
}
