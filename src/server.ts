import { createServer, type Server } from 'http';
import type { WebSocketServer } from 'ws';
import { createApp } from './app';
import { loadConfig, type AppConfig } from './utils/env';
import logger from './utils/logger';
import { createWebSocketServer, MEDIA_STREAM_PATH, type WebSocketServerOptions } from './websocket-server';

export interface RunningServer {
  httpServer: Server;
  wss: WebSocketServer;
  stop(): Promise<void>;
}

/** Starts HTTP + WebSocket on the configured host/port. */
export function startServer(config: AppConfig, options: WebSocketServerOptions = {}): Promise<RunningServer> {
  const httpServer = createServer(createApp(config));

  // Attach WebSocket server for Twilio media streams
  const wss = createWebSocketServer(httpServer, config, options);

  const stop = (): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      for (const client of wss.clients) client.terminate();
      wss.close();
      httpServer.close((err) => (err ? reject(err) : resolve()));
    });

  return new Promise<RunningServer>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(config.server.port, config.server.host, () => {
      httpServer.off('error', reject);
      logger.info(`Server running on http://${config.server.host}:${config.server.port}`);
      logger.info(`WebSocket endpoint: ${MEDIA_STREAM_PATH}`);
      logger.info(`Public URL: ${config.server.publicUrl}`);
      logger.info(`Webhook URL: ${config.server.publicUrl}/incoming`);
      logger.info({ provider: config.agent.provider, model: config.agent.model }, 'AI agent configured');
      resolve({ httpServer, wss, stop });
    });
  });
}

/** Process entry: load config, listen, and shut down on SIGTERM/SIGINT. */
export async function run(overrides: Partial<AppConfig['server']> = {}): Promise<void> {
  const base = loadConfig();
  const config: AppConfig = { ...base, server: { ...base.server, ...overrides } };
  const server = await startServer(config);

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    server
      .stop()
      .then(() => {
        logger.info('HTTP server closed');
        process.exit(0);
      })
      .catch((err) => {
        logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      });
    // Force exit after 10s
    setTimeout(() => process.exit(1), 10_000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  run().catch((err) => {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  });
}
