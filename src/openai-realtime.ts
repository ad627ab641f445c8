import { RealtimeSocketClient } from './agent-client';
import type { AgentConfig } from './utils/env';
import type { Logger } from './utils/logger';
import type {
  InputAudioBufferAppendEvent,
  OpenAIServerEvent,
  SessionUpdateEvent,
} from './types/openai';

/**
 * OpenAI Realtime client. The API speaks 24kHz pcm16 in both directions.
 */
export class OpenAIRealtimeClient extends RealtimeSocketClient {
  readonly provider = 'openai' as const;
  private readonly voice: string;
  private readonly instructions: string;

  constructor(config: AgentConfig, log: Logger) {
    super({
      url: `${config.url}?model=${encodeURIComponent(config.model)}`,
      headers: {
        Authorization: `Bearer ${config.apiKey}`,
        'OpenAI-Beta': 'realtime=v1',
      },
      connectTimeoutMs: config.connectTimeoutMs,
      inputSampleRate: config.inputSampleRate,
      outputSampleRate: config.outputSampleRate,
      log,
    });
    this.voice = config.voice;
    this.instructions = config.systemPrompt;
  }

  protected onOpen(): void {
    const update: SessionUpdateEvent = {
      type: 'session.update',
      session: {
        modalities: ['text', 'audio'],
        instructions: this.instructions,
        voice: this.voice,
        input_audio_format: 'pcm16',
        output_audio_format: 'pcm16',
        turn_detection: {
          type: 'server_vad',
          threshold: 0.5,
          prefix_padding_ms: 300,
          silence_duration_ms: 500,
          create_response: true,
        },
      },
    };
    this.send(update).catch((err) => this.log.error({ err }, 'Failed to send session.update'));
  }

  protected audioMessage(pcm16: Buffer): InputAudioBufferAppendEvent {
    return {
      type: 'input_audio_buffer.append',
      audio: pcm16.toString('base64'),
    };
  }

  private parseArguments(raw: string): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.log.warn({ err, argsStr: raw }, 'Failed to parse function call arguments');
      return {};
    }
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return {};
  }

  protected handleMessage(raw: string): void {
    const event: OpenAIServerEvent = JSON.parse(raw);
    const eventType: string = event.type;

    switch (event.type) {
      case 'session.created':
        this.log.info({ sessionId: event.session.id }, 'OpenAI session created');
        break;

      case 'session.updated':
        this.log.info('OpenAI session updated');
        this.markReady();
        break;

      // ── VAD: caller started talking over the AI ─────────────────────
      case 'input_audio_buffer.speech_started':
        this.emit({ type: 'interrupted' });
        break;

      // ── Response audio ──────────────────────────────────────────────
      case 'response.audio.delta':
        this.emit({ type: 'audio', pcm: Buffer.from(event.delta, 'base64') });
        break;

      case 'response.audio.done':
        this.emit({ type: 'turn_complete' });
        break;

      case 'response.audio_transcript.done':
        this.emit({ type: 'text', text: event.transcript });
        break;

      case 'response.function_call_arguments.done':
        this.emit({
          type: 'tool_call',
          id: event.call_id,
          name: event.name,
          args: this.parseArguments(event.arguments),
        });
        break;

      case 'error':
        this.log.error({ error: event.error }, 'OpenAI error');
        break;

      default:
        this.log.debug({ eventType }, 'OpenAI event');
    }
  }
}
