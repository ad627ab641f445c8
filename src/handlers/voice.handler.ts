import type { Request, Response } from 'express';
import twilio from 'twilio';
import type { AppConfig } from '../utils/env';
import logger from '../utils/logger';
import { validateTwilioSignature } from '../utils/twilio-validator';
import { MEDIA_STREAM_PATH } from '../websocket-server';

const { VoiceResponse } = twilio.twiml;

/** wss:// for an https public URL, ws:// otherwise. */
export function mediaStreamUrl(publicUrl: string): string {
  const host = publicUrl.replace(/^https?:\/\//, '').replace(/\/+$/, '');
  const wsProtocol = publicUrl.startsWith('https') ? 'wss' : 'ws';
  return `${wsProtocol}://${host}${MEDIA_STREAM_PATH}`;
}

/** TwiML that opens a bidirectional media stream tagged with the caller id. */
export function buildStreamTwiml(streamUrl: string, caller: string, greeting: string): string {
  const twiml = new VoiceResponse();
  if (greeting) twiml.say(greeting);

  const connect = twiml.connect();
  const stream = connect.stream({ url: streamUrl });
  stream.parameter({ name: 'caller', value: caller });

  return twiml.toString();
}

export function createVoiceHandler(config: AppConfig) {
  return function voiceHandler(req: Request, res: Response): void {
    // ── Webhook signature verification ────────────────────────────────────
    if (
      config.twilio.enableWebhookValidation &&
      !validateTwilioSignature(req, config.twilio.authToken, config.server.publicUrl)
    ) {
      res.status(403).send('Invalid signature');
      return;
    }

    const body: Record<string, unknown> = req.body ?? {};
    const callSid = typeof body.CallSid === 'string' ? body.CallSid : 'unknown';
    const caller = typeof body.From === 'string' ? body.From : 'unknown';
    logger.info({ callSid, caller }, 'Incoming call');

    const streamUrl = mediaStreamUrl(config.server.publicUrl);
    res.type('text/xml').send(buildStreamTwiml(streamUrl, caller, config.twilio.greeting));
    logger.info({ callSid, streamUrl }, 'TwiML response sent');
  };
}
