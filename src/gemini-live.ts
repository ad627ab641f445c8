import { RealtimeSocketClient } from './agent-client';
import type { AgentConfig } from './utils/env';
import type { Logger } from './utils/logger';
import type {
  GeminiRealtimeInputMessage,
  GeminiServerMessage,
  GeminiSetupMessage,
} from './types/gemini';

/**
 * Gemini Live client over the raw BidiGenerateContent WebSocket.
 * Audio in: PCM16 at `inputSampleRate` (16kHz default). Audio out: PCM16 24kHz.
 */
export class GeminiLiveClient extends RealtimeSocketClient {
  readonly provider = 'gemini' as const;
  private readonly model: string;
  private readonly voice: string;
  private readonly systemPrompt: string;

  constructor(config: AgentConfig, log: Logger) {
    super({
      url: `${config.url}?key=${encodeURIComponent(config.apiKey)}`,
      connectTimeoutMs: config.connectTimeoutMs,
      inputSampleRate: config.inputSampleRate,
      outputSampleRate: config.outputSampleRate,
      log,
    });
    this.model = config.model.startsWith('models/') ? config.model : `models/${config.model}`;
    this.voice = config.voice;
    this.systemPrompt = config.systemPrompt;
  }

  protected onOpen(): void {
    const setup: GeminiSetupMessage = {
      setup: {
        model: this.model,
        generationConfig: {
          responseModalities: ['AUDIO'],
          speechConfig: {
            voiceConfig: { prebuiltVoiceConfig: { voiceName: this.voice } },
          },
        },
      },
    };
    if (this.systemPrompt) {
      setup.setup.systemInstruction = { parts: [{ text: this.systemPrompt }] };
    }

    this.log.info({ model: this.model, voice: this.voice }, 'Sending Gemini setup');
    this.send(setup).catch((err) => this.log.error({ err }, 'Failed to send Gemini setup'));
  }

  protected audioMessage(pcm16: Buffer, sampleRate: number): GeminiRealtimeInputMessage {
    return {
      realtimeInput: {
        mediaChunks: [{ mimeType: `audio/pcm;rate=${sampleRate}`, data: pcm16.toString('base64') }],
      },
    };
  }

  protected handleMessage(raw: string): void {
    const message: GeminiServerMessage = JSON.parse(raw);

    if (message.setupComplete) {
      this.markReady();
    }

    const content = message.serverContent;
    if (content) {
      for (const part of content.modelTurn?.parts ?? []) {
        if (part.inlineData?.data) {
          this.emit({ type: 'audio', pcm: Buffer.from(part.inlineData.data, 'base64') });
        } else if (part.text) {
          this.emit({ type: 'text', text: part.text });
        }
      }
      if (content.interrupted) this.emit({ type: 'interrupted' });
      if (content.turnComplete) this.emit({ type: 'turn_complete' });
    }

    for (const call of message.toolCall?.functionCalls ?? []) {
      this.emit({ type: 'tool_call', id: call.id ?? '', name: call.name, args: call.args ?? {} });
    }

    if (message.goAway) {
      this.log.warn({ timeLeft: message.goAway.timeLeft }, 'Gemini announced disconnect');
    }
  }
}
