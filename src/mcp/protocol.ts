// This module adapts JSON-RPC envelopes to the gateway's method table and tool dispatch.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { DispatchMode } from '../types/domain.js';
import type { JsonRpcId, JsonRpcResponse } from '../types/mcp.js';
import {
  AppError,
  InvalidArgumentsError,
  MissingToolNameError,
  UnknownMethodError,
  normalizeError
} from '../utils/errors.js';
import { isJsonObject } from '../utils/json.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { JSONRPC_INTERNAL_ERROR, JSONRPC_VERSION, MCP_PROTOCOL_VERSION } from '../version.js';
import { classifyArguments } from './arguments.js';
import type { ToolDispatcher } from './dispatch.js';
import type { PromptCatalog } from './prompts.js';
import type { ToolRegistry } from './registry.js';
import type { ResourceProvider } from './resources.js';

const NOTIFICATION_PREFIX = 'notifications/';

type MethodHandler = (params: Record<string, unknown>, mode: DispatchMode) => Promise<unknown>;

export interface ServerInfo {
  name: string;
  version: string;
}

export interface ProtocolAdapterOptions {
  registry: ToolRegistry;
  dispatcher: ToolDispatcher;
  resources: ResourceProvider;
  prompts: PromptCatalog;
  serverInfo: ServerInfo;
  logger: FastifyBaseLogger;
  now?: () => number;
}

interface ClassifiedMessage {
  method: string;
  params: Record<string, unknown>;
  // Undefined marks a notification.
  id: JsonRpcId | undefined;
}

// This helper creates a canonical JSON-RPC error payload; every error shares one code on the wire.
export function rpcError(id: JsonRpcId, message: string): JsonRpcResponse {
  return {
    jsonrpc: JSONRPC_VERSION,
    id,
    error: {
      code: JSONRPC_INTERNAL_ERROR,
      message
    }
  };
}

function rpcResult(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return {
    jsonrpc: JSONRPC_VERSION,
    id,
    result
  };
}

// This helper keeps only string and numeric ids; anything else is echoed as null.
function toRpcId(value: unknown): JsonRpcId {
  return typeof value === 'string' || typeof value === 'number' ? value : null;
}

// This helper returns the id a malformed body should be answered with.
function bodyId(message: unknown): JsonRpcId {
  return isJsonObject(message) ? toRpcId(message.id) : null;
}

// An `id` member marks a request; its absence marks a notification.
function classifyMessage(message: unknown): ClassifiedMessage | null {
  if (!isJsonObject(message) || typeof message.method !== 'string') {
    return null;
  }

  return {
    method: message.method,
    params: isJsonObject(message.params) ? message.params : {},
    id: 'id' in message && message.id !== undefined ? toRpcId(message.id) : undefined
  };
}

function requireString(params: Record<string, unknown>, key: string, method: string): string {
  const value = params[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new InvalidArgumentsError(`${method} requires params.${key} as a non-empty string.`);
  }
  return value;
}

export class ProtocolAdapter {
  private readonly registry: ToolRegistry;
  private readonly dispatcher: ToolDispatcher;
  private readonly resources: ResourceProvider;
  private readonly prompts: PromptCatalog;
  private readonly serverInfo: ServerInfo;
  private readonly logger: FastifyBaseLogger;
  private readonly now: () => number;
  private readonly methods: ReadonlyMap<string, MethodHandler>;
  private peerReady = false;
  private lastPing: number | null = null;

  public constructor(options: ProtocolAdapterOptions) {
    this.registry = options.registry;
    this.dispatcher = options.dispatcher;
    this.resources = options.resources;
    this.prompts = options.prompts;
    this.serverInfo = options.serverInfo;
    this.logger = options.logger.child({ component: 'protocol' });
    this.now = options.now ?? Date.now;
    this.methods = this.buildMethodTable();
  }

  public get isPeerReady(): boolean {
    return this.peerReady;
  }

  public get lastPingAt(): number | null {
    return this.lastPing;
  }

  public initializeResult(): Record<string, unknown> {
    return {
      protocolVersion: MCP_PROTOCOL_VERSION,
      capabilities: {
        tools: {
          listChanged: true
        },
        resources: {},
        prompts: {}
      },
      serverInfo: {
        name: this.serverInfo.name,
        version: this.serverInfo.version
      }
    };
  }

  private buildMethodTable(): ReadonlyMap<string, MethodHandler> {
    return new Map<string, MethodHandler>([
      [
        'initialize',
        async (params) => {
          this.logger.info(
            {
              event: 'mcp_initialize_requested',
              clientInfo: sanitizeForLog(params.clientInfo),
              clientProtocolVersion: sanitizeForLog(params.protocolVersion)
            },
            'mcp_initialize_requested'
          );
          return this.initializeResult();
        }
      ],
      ['ping', async () => ({})],
      ['tools/list', async () => ({ tools: this.registry.list() })],
      ['tools/call', async (params, mode) => this.callTool(params, mode)],
      ['resources/list', async () => ({ resources: this.resources.list() })],
      [
        'resources/read',
        async (params) => ({ contents: [this.resources.read(requireString(params, 'uri', 'resources/read'))] })
      ],
      ['prompts/list', async () => ({ prompts: this.prompts.list() })],
      [
        'prompts/get',
        async (params) =>
          this.prompts.get(
            requireString(params, 'name', 'prompts/get'),
            isJsonObject(params.arguments) ? params.arguments : {}
          )
      ]
    ]);
  }

  private async callTool(params: Record<string, unknown>, mode: DispatchMode): Promise<unknown> {
    const name = params.name;
    if (typeof name !== 'string' || name.trim().length === 0) {
      throw new MissingToolNameError();
    }

    const outcome = await this.dispatcher.dispatch(name, classifyArguments(params.arguments), mode);
    if (!outcome.ok) {
      throw outcome.error;
    }

    return outcome.value;
  }

  // Notifications only cause side effects; they are never answered.
  private handleNotification(method: string, params: Record<string, unknown>): void {
    switch (method) {
      case 'notifications/initialized':
        this.peerReady = true;
        this.logger.info({ event: 'mcp_peer_initialized' }, 'mcp_peer_initialized');
        return;

      case 'notifications/ping':
        this.lastPing = this.now();
        this.logger.debug({ event: 'mcp_peer_ping' }, 'mcp_peer_ping');
        return;

      case 'notifications/cancelled':
        this.logger.info(
          {
            event: 'mcp_request_cancelled',
            requestId: sanitizeForLog(params.requestId),
            reason: sanitizeForLog(params.reason)
          },
          'mcp_request_cancelled'
        );
        return;

      default:
        this.logger.info({ event: 'mcp_notification_ignored', method }, 'mcp_notification_ignored');
    }
  }

  private async route(message: ClassifiedMessage, mode: DispatchMode): Promise<unknown> {
    if (message.method.startsWith(NOTIFICATION_PREFIX)) {
      this.handleNotification(message.method, message.params);
      return null;
    }

    const handler = this.methods.get(message.method);
    if (!handler) {
      throw new UnknownMethodError(message.method);
    }

    return handler(message.params, mode);
  }

  // This method handles one envelope and returns its reply, or null when nothing may be emitted.
  public async handleMessage(message: unknown): Promise<JsonRpcResponse | null> {
    const classified = classifyMessage(message);
    if (!classified) {
      this.logger.warn(
        {
          event: 'mcp_invalid_envelope',
          receivedType: Array.isArray(message) ? 'array' : message === null ? 'null' : typeof message
        },
        'mcp_invalid_envelope'
      );
      return rpcError(bodyId(message), 'Invalid request: expected a JSON-RPC object with a string method.');
    }

    // notifications/* never get a reply, even when the sender attached an id.
    const isNotification = classified.id === undefined || classified.method.startsWith(NOTIFICATION_PREFIX);
    const mode: DispatchMode = isNotification ? 'notification' : 'request';
    const requestId = classified.id ?? null;
    const startedAt = this.now();
    const rpcTraceId = randomUUID();

    this.logger.info(
      {
        event: 'mcp_rpc_message_received',
        rpcTraceId,
        rpcRequestId: requestId,
        method: classified.method,
        mode
      },
      'mcp_rpc_message_received'
    );

    try {
      const result = await this.route(classified, mode);
      return isNotification ? null : rpcResult(requestId, result);
    } catch (error) {
      const appError: AppError = normalizeError(error);

      if (isNotification) {
        this.logger.warn(
          {
            event: 'mcp_notification_failed',
            rpcTraceId,
            method: classified.method,
            code: appError.code,
            error: errorForLog(error)
          },
          'mcp_notification_failed'
        );
        return null;
      }

      this.logger.error(
        {
          event: 'mcp_rpc_request_failed',
          rpcTraceId,
          rpcRequestId: requestId,
          method: classified.method,
          code: appError.code,
          statusCode: appError.statusCode,
          details: sanitizeForLog(appError.details),
          error: errorForLog(error)
        },
        'mcp_rpc_request_failed'
      );
      return rpcError(requestId, appError.message);
    } finally {
      this.logger.info(
        {
          event: 'mcp_rpc_message_completed',
          rpcTraceId,
          rpcRequestId: requestId,
          method: classified.method,
          mode,
          durationMs: this.now() - startedAt
        },
        'mcp_rpc_message_completed'
      );
    }
  }

  // Batch items are handled in order; notifications contribute nothing, so an all-notification batch yields null.
  public async handlePayload(payload: unknown): Promise<JsonRpcResponse | JsonRpcResponse[] | null> {
    if (!Array.isArray(payload)) {
      return this.handleMessage(payload);
    }

    if (payload.length === 0) {
      return rpcError(null, 'Invalid request: empty batch.');
    }

    const replies: JsonRpcResponse[] = [];
    for (const item of payload) {
      const reply = await this.handleMessage(item);
      if (reply) {
        replies.push(reply);
      }
    }

    return replies.length > 0 ? replies : null;
  }
}
