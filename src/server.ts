// This module wires all HTTP routes, middleware behavior, and lifecycle resources.

import cors from '@fastify/cors';
import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import type { GatewaySettings } from './config/settings.js';
import { buildGatewayContext, type GatewayContext, type GatewayContextOverrides } from './context.js';
import { registerDirectRoutes } from './http/direct.js';
import { registerHealthRoutes } from './http/health.js';
import { registerProtocolRoutes } from './http/protocol-routes.js';
import { registerSseStreamRoutes } from './http/sse.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';

export interface ServerResources {
  app: FastifyInstance;
  context: GatewayContext;
}

// This map stores high-resolution request start times without widening the request type.
const requestStartTimes = new WeakMap<FastifyRequest, bigint>();

// This helper builds a safe header snapshot for request diagnostics without leaking secrets.
function buildRequestHeaderSnapshot(request: FastifyRequest): unknown {
  const headers = request.headers;
  return sanitizeForLog({
    host: headers.host ?? null,
    'x-forwarded-for': headers['x-forwarded-for'] ?? null,
    'user-agent': headers['user-agent'] ?? null,
    accept: headers.accept ?? null,
    'content-type': headers['content-type'] ?? null,
    'content-length': headers['content-length'] ?? null
  });
}

// This function builds and configures the full HTTP application around one gateway context.
export function createServer(settings: GatewaySettings, overrides: GatewayContextOverrides = {}): ServerResources {
  const app = Fastify({
    logger: buildLoggerOptions(settings.logLevel, settings.serverName),
    bodyLimit: 1024 * 1024,
    trustProxy: true
  });

  const context = buildGatewayContext(settings, app.log, overrides);

  // Preflights continue to their route so OPTIONS /sse can answer its fixed allow-all headers.
  void app.register(cors, {
    origin: settings.corsOrigins.includes('*') ? '*' : settings.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: '*',
    preflightContinue: true,
    strictPreflight: false
  });

  // This hook enriches request logs with consistent route and request-id metadata.
  app.addHook('onRequest', async (request) => {
    requestStartTimes.set(request, process.hrtime.bigint());

    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        ip: request.ip,
        headers: buildRequestHeaderSnapshot(request)
      },
      'http_request_start'
    );
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    const startTime = requestStartTimes.get(request);
    const durationMs = startTime ? Number(process.hrtime.bigint() - startTime) / 1_000_000 : undefined;

    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs
      },
      'http_request_complete'
    );
  });

  // This hook emits explicit timeout events to simplify debugging of stalled requests.
  app.addHook('onTimeout', async (request) => {
    request.log.warn(
      {
        event: 'http_request_timeout',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_request_timeout'
    );
  });

  registerHealthRoutes(app, context);
  registerSseStreamRoutes(app, context);
  registerProtocolRoutes(app, context);
  registerDirectRoutes(app, context);

  // This shutdown hook releases the audit store so SQLite files close cleanly.
  app.addHook('onClose', async () => {
    context.close();
  });

  // This handler maps internal exceptions into structured JSON errors.
  app.setErrorHandler((error, request, reply) => {
    const normalized = normalizeError(error);
    const status = normalized.statusCode;

    request.log.error(
      {
        event: 'http_request_failed',
        requestId: request.id,
        code: normalized.code,
        details: sanitizeForLog(normalized.details),
        error: errorForLog(error)
      },
      'http_request_failed'
    );

    reply.status(status).send({
      ok: false,
      error: {
        code: normalized.code,
        message: normalized.message,
        details: normalized.details
      }
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      }
    });
  });

  return {
    app,
    context
  };
}
