import type { Request } from 'express';
import twilio from 'twilio';
import logger from './logger';

/**
 * Validates Twilio webhook request signatures against the public URL Twilio
 * called. See: https://www.twilio.com/docs/usage/security#validating-requests
 */
export function validateTwilioSignature(req: Request, authToken: string, publicUrl: string): boolean {
  const signature = req.header('x-twilio-signature');
  if (!signature) {
    logger.warn('Missing x-twilio-signature header');
    return false;
  }

  const url = `${publicUrl}${req.originalUrl}`;
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(req.body ?? {})) {
    if (typeof value === 'string') params[key] = value;
  }

  const valid = twilio.validateRequest(authToken, signature, url, params);
  if (!valid) {
    logger.warn({ url }, 'Invalid Twilio signature');
  }
  return valid;
}
