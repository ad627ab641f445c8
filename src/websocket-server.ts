import type { Server as HttpServer, IncomingMessage } from 'http';
import { randomUUID } from 'crypto';
import WebSocket, { WebSocketServer } from 'ws';
import type { VoiceAgentClient } from './agent-client';
import { createAgentClient } from './agent-factory';
import { MediaStreamSession } from './media-stream-session';
import { WebSocketTelephonyTransport } from './telephony-transport';
import type { AppConfig } from './utils/env';
import { frameBytesFor } from './utils/env';
import logger, { createCallLogger, type Logger } from './utils/logger';
import { rawToString } from './utils/ws-data.util';

export const MEDIA_STREAM_PATH = '/media-stream';

export interface WebSocketServerOptions {
  /** Override the agent client per call (tests, alternative providers) */
  createAgent?: (log: Logger) => VoiceAgentClient;
}

/**
 * Wires one Twilio socket to one session. Messages are handled strictly in
 * arrival order: each waits for the previous one (and for `open()`).
 */
export function bindMediaStream(ws: WebSocket, session: MediaStreamSession, log: Logger): void {
  let queue: Promise<void> = session.open().catch((err) => {
    log.error({ err }, 'Closing Twilio stream: AI agent unavailable');
  });

  ws.on('message', (data) => {
    queue = queue
      .then(() => session.handleMessage(rawToString(data)))
      .catch((err) => log.error({ err }, 'Error handling Twilio message'));
  });

  ws.on('close', () => {
    log.info('Twilio WebSocket closed');
    session.handleDisconnect().catch((err) => log.error({ err }, 'Error during session teardown'));
  });

  ws.on('error', (err) => log.error({ err }, 'Twilio WS error'));
}

/**
 * Creates the WebSocket server that handles Twilio Media Stream connections.
 * Twilio connects to wss://<host>/media-stream after receiving TwiML <Stream>.
 */
export function createWebSocketServer(
  httpServer: HttpServer,
  config: AppConfig,
  options: WebSocketServerOptions = {},
): WebSocketServer {
  const wss = new WebSocketServer({
    server: httpServer,
    path: MEDIA_STREAM_PATH,
  });

  const createAgent = options.createAgent ?? ((log: Logger) => createAgentClient(config.agent, log));

  wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
    const log = createCallLogger(randomUUID());
    log.info({ remoteAddress: req.socket.remoteAddress, url: req.url }, 'New WebSocket connection on /media-stream');

    // Each connection is one phone call with its own agent session
    const agent = createAgent(log);
    const session = new MediaStreamSession(new WebSocketTelephonyTransport(ws), agent, {
      frameBytes: frameBytesFor(config.bridge.inboundFrameMs, agent.inputSampleRate),
      maxCallDurationMs: config.bridge.maxCallDurationMinutes * 60 * 1000,
      log,
    });
    bindMediaStream(ws, session, log);
  });

  wss.on('error', (err) => {
    logger.error({ err }, 'WebSocket server error');
  });

  logger.info(`WebSocket server attached at ${MEDIA_STREAM_PATH}`);
  return wss;
}
