import express from 'express';
import { createVoiceHandler } from './handlers/voice.handler';
import type { AppConfig } from './utils/env';

export function createApp(config: AppConfig): express.Express {
  const app = express();
  app.use(express.urlencoded({ extended: false })); // Twilio sends form-encoded
  app.use(express.json());

  // ── Health check ─────────────────────────────────────────────────────────

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', uptime: process.uptime() });
  });

  // ── Twilio Voice webhook ─────────────────────────────────────────────────

  app.post('/incoming', createVoiceHandler(config));

  return app;
}
