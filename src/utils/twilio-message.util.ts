import type { TwilioMediaStreamEvent } from '../types/twilio';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function stringValues(value: unknown): Record<string, string> {
  if (!isRecord(value)) return {};
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') out[key] = entry;
  }
  return out;
}

/**
 * Narrows a parsed Media Stream frame to a known event, or null when the
 * event is unknown or missing the fields the bridge relies on.
 */
export function toTwilioEvent(data: unknown): TwilioMediaStreamEvent | null {
  if (!isRecord(data) || typeof data.event !== 'string') return null;

  switch (data.event) {
    case 'connected':
      return { event: 'connected' };

    case 'start': {
      const start = data.start;
      if (!isRecord(start) || typeof start.streamSid !== 'string' || !start.streamSid) return null;
      return {
        event: 'start',
        start: {
          streamSid: start.streamSid,
          callSid: typeof start.callSid === 'string' ? start.callSid : undefined,
          customParameters: stringValues(start.customParameters),
        },
      };
    }

    case 'media': {
      const media = isRecord(data.media) ? data.media : {};
      return {
        event: 'media',
        media: { payload: typeof media.payload === 'string' ? media.payload : undefined },
      };
    }

    case 'stop':
      return { event: 'stop' };

    case 'mark': {
      const mark = isRecord(data.mark) ? data.mark : {};
      return { event: 'mark', mark: { name: typeof mark.name === 'string' ? mark.name : '' } };
    }

    default:
      return null;
  }
}
