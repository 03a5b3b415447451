// This is the process entrypoint that loads settings, starts the HTTP server, and handles graceful shutdown.

import { loadSettings, type GatewaySettings } from './config/settings.js';
import { createServer } from './server.js';
import { createLogger, errorForLog } from './utils/logger.js';

// This helper stops the process before any listener starts when the environment is invalid.
function readSettings(): GatewaySettings {
  try {
    return loadSettings();
  } catch (error) {
    createLogger('error', 'iot-mcp-gateway').fatal(
      { event: 'configuration_invalid', error: errorForLog(error) },
      'configuration_invalid'
    );
    process.exit(1);
  }
}

function start(): void {
  const settings = readSettings();
  const { app, context } = createServer(settings);

  // This helper closes the server; open SSE streams are ended first and the audit store is released on close.
  async function shutdown(signal: string): Promise<void> {
    app.log.info({ event: 'shutdown_started', signal }, 'shutdown_started');

    try {
      await app.close();
    } catch (error) {
      app.log.error({ event: 'shutdown_failed', signal, error: errorForLog(error) }, 'shutdown_failed');
      process.exit(1);
    }

    app.log.info({ event: 'shutdown_completed', signal }, 'shutdown_completed');
    process.exit(0);
  }

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  app
    .listen({ host: settings.host, port: settings.port })
    .then(() => {
      app.log.info(
        {
          event: 'server_started',
          host: settings.host,
          port: settings.port,
          tools: context.registry.size
        },
        'server_started'
      );
    })
    .catch((error: unknown) => {
      app.log.error({ event: 'server_start_failed', error: errorForLog(error) }, 'server_start_failed');
      process.exit(1);
    });
}

start();
