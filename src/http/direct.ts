// This module exposes tool discovery and execution without JSON-RPC framing; it shares dispatch with the protocol routes.

import type { FastifyInstance } from 'fastify';
import type { GatewayContext } from '../context.js';
import { classifyArguments } from '../mcp/arguments.js';
import type { ToolCallResult } from '../types/mcp.js';
import { MissingToolNameError } from '../utils/errors.js';
import { isJsonObject } from '../utils/json.js';

// This helper reads the tool name from a `{name, arguments}` body.
function readToolName(body: unknown): string {
  const name = isJsonObject(body) ? body.name : undefined;
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new MissingToolNameError();
  }
  return name;
}

export function registerDirectRoutes(fastify: FastifyInstance, context: GatewayContext): void {
  // This helper throws the dispatch error so the app error handler answers with its status.
  async function execute(toolName: string, rawArguments: unknown): Promise<ToolCallResult> {
    const outcome = await context.dispatcher.dispatch(toolName, classifyArguments(rawArguments));
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }

  fastify.post('/initialize', async () => context.protocol.initializeResult());

  fastify.post('/tools/list', async () => ({ tools: context.registry.list() }));

  fastify.post('/tools/call', async (request) => {
    const name = readToolName(request.body);
    const rawArguments = isJsonObject(request.body) ? request.body.arguments : undefined;
    const result = await execute(name, rawArguments);

    return result.isError ? { content: result.content, isError: true } : { content: result.content };
  });

  fastify.get('/tools', async () => {
    const tools = context.registry.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.inputSchema
    }));

    return { tools, total: tools.length };
  });

  fastify.post<{ Params: { toolName: string } }>('/tools/:toolName', async (request) => {
    const toolName = request.params.toolName;
    if (toolName.trim().length === 0) {
      throw new MissingToolNameError();
    }

    const result = await execute(toolName, request.body);

    return {
      tool: toolName,
      result: result.content.map((item) => item.text),
      is_error: result.isError === true,
      timestamp: new Date().toISOString()
    };
  });
}
