// This module exposes the protocol adapter on POST /sse and POST /mcp with raw-body envelope parsing.

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { GatewayContext } from '../context.js';
import { rpcError } from '../mcp/protocol.js';
import { tryParseJson } from '../utils/json.js';
import { SSE_ALLOW_ALL_HEADERS } from './sse.js';

// This helper parses one raw body and answers the adapter's reply, or `{}` when nothing may be emitted.
async function answerEnvelope(
  context: GatewayContext,
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  const raw = typeof request.body === 'string' ? request.body : '';
  const parsed = tryParseJson(raw);

  if (!parsed.ok) {
    request.log.warn(
      {
        event: 'mcp_envelope_parse_failed',
        requestId: request.id,
        path: request.url,
        reason: parsed.error
      },
      'mcp_envelope_parse_failed'
    );
    reply.code(500).send(rpcError(null, `Parse error: ${parsed.error}`));
    return;
  }

  const response = await context.protocol.handlePayload(parsed.value);
  reply.code(200).send(response ?? {});
}

// Registered as its own plugin so the raw string parser stays scoped to the protocol routes.
export function registerProtocolRoutes(fastify: FastifyInstance, context: GatewayContext): void {
  void fastify.register(async (scope) => {
    scope.removeAllContentTypeParsers();
    scope.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
      done(null, body);
    });

    scope.post('/sse', async (request, reply) => {
      reply.header('Access-Control-Allow-Origin', SSE_ALLOW_ALL_HEADERS['Access-Control-Allow-Origin']);
      reply.header('Access-Control-Allow-Headers', SSE_ALLOW_ALL_HEADERS['Access-Control-Allow-Headers']);
      await answerEnvelope(context, request, reply);
    });

    scope.post('/mcp', async (request, reply) => {
      await answerEnvelope(context, request, reply);
    });
  });
}
