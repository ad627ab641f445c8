/**
 * G.711 μ-law codec utilities.
 * Converts between μ-law encoded audio (Twilio PSTN, 8 kHz) and linear PCM16.
 */

import { AudioFormatError } from './errors';

const MULAW_BIAS = 0x84;
const PCM16_MAX = 32767;

// Pre-computed μ-law decode table for fast lookup
const MULAW_DECODE_TABLE = new Int16Array(256);

(function initDecodingTable() {
  for (let i = 0; i < 256; i++) {
    const mulaw = ~i & 0xff;
    const sign = mulaw & 0x80;
    const exponent = (mulaw >> 4) & 0x07;
    const mantissa = mulaw & 0x0f;

    const magnitude = (((mantissa << 3) + MULAW_BIAS) << exponent) - MULAW_BIAS;

    MULAW_DECODE_TABLE[i] = sign ? -magnitude : magnitude;
  }
})();

/**
 * Encode a single linear PCM16 sample to μ-law.
 */
function linearToMuLaw(sample: number): number {
  const sign = sample < 0 ? 0x80 : 0;
  const biased = Math.min(Math.abs(sample) + MULAW_BIAS, PCM16_MAX);

  // Segment = index of the highest set bit above the bias region
  const exponent = Math.min(7, Math.max(0, 31 - Math.clz32(biased) - 7));
  const mantissa = (biased >> (exponent + 3)) & 0x0f;

  return ~(sign | (exponent << 4) | mantissa) & 0xff;
}

/**
 * Decode μ-law bytes to linear PCM16 samples.
 */
export function decodeUlaw(ulaw: Uint8Array): Int16Array {
  const pcm = new Int16Array(ulaw.length);
  for (let i = 0; i < ulaw.length; i++) {
    pcm[i] = MULAW_DECODE_TABLE[ulaw[i]];
  }
  return pcm;
}

/**
 * Encode linear PCM16 samples to μ-law bytes.
 */
export function encodeUlaw(pcm: Int16Array): Buffer {
  const ulaw = Buffer.alloc(pcm.length);
  for (let i = 0; i < pcm.length; i++) {
    ulaw[i] = linearToMuLaw(pcm[i]);
  }
  return ulaw;
}

/** Read little-endian PCM16 bytes into samples. */
export function pcm16FromBytes(bytes: Uint8Array): Int16Array {
  if (bytes.length % 2 !== 0) {
    throw new AudioFormatError(`PCM16 buffer has odd byte length ${bytes.length}`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const samples = new Int16Array(bytes.length / 2);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = view.getInt16(i * 2, true);
  }
  return samples;
}

/** Write samples as little-endian PCM16 bytes. */
export function pcm16ToBytes(samples: Int16Array): Buffer {
  const out = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i++) {
    out.writeInt16LE(samples[i], i * 2);
  }
  return out;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Base64 decode that rejects malformed input instead of silently
 * skipping characters the way `Buffer.from(s, 'base64')` does.
 */
export function decodeBase64Strict(payload: string): Buffer {
  if (payload.length % 4 !== 0 || !BASE64_PATTERN.test(payload)) {
    throw new AudioFormatError('Payload is not valid base64');
  }
  return Buffer.from(payload, 'base64');
}
