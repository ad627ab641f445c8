/**
 * Audio transcoding between Twilio PCMU (G.711 μ-law, 8kHz) and the AI
 * peer's PCM16 (linear, provider-chosen rate).
 *
 * Pipeline:
 *   Twilio → base64 decode → μ-law decode → 8kHz PCM16 → resample → agent
 *   agent → PCM16 → resample to 8kHz → μ-law encode → base64 → Twilio
 */

import {
  decodeBase64Strict,
  decodeUlaw,
  encodeUlaw,
  pcm16FromBytes,
  pcm16ToBytes,
} from './utils/audio-codec.util';
import { createResampleState, resample, type ResampleState } from './utils/audio-resampler.util';

export const TELEPHONY_SAMPLE_RATE = 8000;

/**
 * Per-call transcoder. Holds one resample state per direction; never share an
 * instance between calls.
 */
export class AudioTranscoder {
  private inboundState: ResampleState = createResampleState();
  private outboundState: ResampleState = createResampleState();

  constructor(
    readonly agentInputRate: number,
    readonly agentOutputRate: number,
  ) {}

  /** Twilio → agent: base64 μ-law (8kHz) → PCM16 bytes at the agent input rate. */
  telephonyToAgent(payload: string): Buffer {
    const ulaw = decodeBase64Strict(payload);
    const pcm8k = decodeUlaw(ulaw);
    const { samples, state } = resample(pcm8k, TELEPHONY_SAMPLE_RATE, this.agentInputRate, this.inboundState);
    this.inboundState = state;
    return pcm16ToBytes(samples);
  }

  /** Agent → Twilio: PCM16 bytes at the agent output rate → base64 μ-law (8kHz). */
  agentToTelephony(pcm: Uint8Array): string {
    const pcmIn = pcm16FromBytes(pcm);
    const { samples, state } = resample(pcmIn, this.agentOutputRate, TELEPHONY_SAMPLE_RATE, this.outboundState);
    this.outboundState = state;
    return encodeUlaw(samples).toString('base64');
  }
}
