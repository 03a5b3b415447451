// This module implements the event-stream side of the SSE transport: one heartbeat loop per open connection.

import { setTimeout as sleep } from 'node:timers/promises';
import type { FastifyBaseLogger, FastifyInstance, FastifyReply } from 'fastify';
import type { GatewayContext } from '../context.js';
import { errorForLog } from '../utils/logger.js';

export const SSE_HEARTBEAT = 'data: \n\n';

// This is the slice of a writable response the loop needs; Node's ServerResponse satisfies it.
export interface SseSink {
  readonly destroyed: boolean;
  readonly writableEnded: boolean;
  write(chunk: string): boolean;
}

export interface SseConnectionOptions {
  sink: SseSink;
  intervalMs: number;
  logger?: FastifyBaseLogger;
  // Written once before the first heartbeat.
  greeting?: Record<string, unknown>;
}

export const SSE_ALLOW_ALL_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': '*',
  'Access-Control-Max-Age': '86400'
} as const;

// Only the connection's own loop writes to its sink; liveness is checked before every write.
export class SseConnection {
  private readonly sink: SseSink;
  private readonly intervalMs: number;
  private readonly logger?: FastifyBaseLogger;
  private readonly greeting?: Record<string, unknown>;
  private readonly abortController = new AbortController();
  private heartbeats = 0;

  public constructor(options: SseConnectionOptions) {
    this.sink = options.sink;
    this.intervalMs = options.intervalMs;
    this.logger = options.logger;
    this.greeting = options.greeting;
  }

  public get isAlive(): boolean {
    return !this.abortController.signal.aborted && !this.sink.destroyed && !this.sink.writableEnded;
  }

  public get heartbeatsSent(): number {
    return this.heartbeats;
  }

  public close(): void {
    this.abortController.abort();
  }

  // This method resolves with the number of heartbeats written once the peer is gone or close() is called.
  public async run(): Promise<number> {
    if (this.greeting && this.isAlive) {
      this.sink.write(`data: ${JSON.stringify(this.greeting)}\n\n`);
    }

    while (this.isAlive) {
      try {
        await sleep(this.intervalMs, undefined, { signal: this.abortController.signal });
      } catch (error) {
        if (this.abortController.signal.aborted) {
          break;
        }
        throw error;
      }

      if (!this.isAlive) {
        break;
      }

      this.sink.write(SSE_HEARTBEAT);
      this.heartbeats += 1;
    }

    this.logger?.info(
      {
        event: 'sse_connection_closed',
        heartbeats: this.heartbeats
      },
      'sse_connection_closed'
    );

    return this.heartbeats;
  }
}

// This helper runs one stream to completion and always ends the response; it never rejects.
async function serveStream(connection: SseConnection, reply: FastifyReply, log: FastifyBaseLogger): Promise<void> {
  try {
    await connection.run();
  } catch (error) {
    log.error({ event: 'sse_stream_failed', error: errorForLog(error) }, 'sse_stream_failed');
  } finally {
    if (!reply.raw.writableEnded) {
      reply.raw.end();
    }
  }
}

export function registerSseStreamRoutes(fastify: FastifyInstance, context: GatewayContext): void {
  // Open streams with the promise that settles once each response has ended.
  const openStreams = new Map<SseConnection, Promise<void>>();

  // Streams are ended before the server stops accepting, so app.close() does not wait on live peers.
  fastify.addHook('preClose', async () => {
    const streams = [...openStreams.entries()];
    for (const [connection] of streams) {
      connection.close();
    }
    await Promise.all(streams.map(([, finished]) => finished));

    if (streams.length > 0) {
      fastify.log.info({ event: 'sse_streams_closed', count: streams.length }, 'sse_streams_closed');
    }
  });

  fastify.get('/sse', async (request, reply) => {
    reply.hijack();
    reply.raw.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
      'Access-Control-Allow-Origin': SSE_ALLOW_ALL_HEADERS['Access-Control-Allow-Origin'],
      'Access-Control-Allow-Headers': SSE_ALLOW_ALL_HEADERS['Access-Control-Allow-Headers']
    });

    const log = request.log.child({ component: 'sse' });
    const connection = new SseConnection({
      sink: reply.raw,
      intervalMs: context.settings.sseHeartbeatIntervalMs,
      logger: log,
      greeting: {
        jsonrpc: '2.0',
        method: 'notifications/initialized',
        params: context.protocol.initializeResult()
      }
    });

    // The response closes when the peer disconnects or the stream ends.
    reply.raw.on('close', () => connection.close());
    request.log.info({ event: 'sse_connection_opened', requestId: request.id }, 'sse_connection_opened');

    const finished = serveStream(connection, reply, log);
    openStreams.set(connection, finished);
    try {
      await finished;
    } finally {
      openStreams.delete(connection);
    }
  });

  fastify.options('/sse', async (_request, reply) => {
    reply.headers(SSE_ALLOW_ALL_HEADERS).code(200).send();
  });
}
