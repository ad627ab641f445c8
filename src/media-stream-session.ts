import type { VoiceAgentClient } from './agent-client';
import { AudioTranscoder } from './audio-transcoder';
import type { AgentEvent } from './types/agent';
import type { TwilioMediaStreamMedia, TwilioMediaStreamStart, TwilioOutboundMessage } from './types/twilio';
import type { TelephonyTransport } from './telephony-transport';
import { FrameBuffer } from './utils/frame-buffer.util';
import { ConnectionError, errorMessage } from './utils/errors';
import logger, { type Logger } from './utils/logger';
import { toTwilioEvent } from './utils/twilio-message.util';

export type SessionState = 'awaiting_start' | 'active' | 'closing' | 'closed';

export interface MediaStreamSessionOptions {
  /** Inbound frame threshold in bytes of PCM16 at the agent input rate */
  frameBytes: number;
  /** Hard limit on call length; 0 or absent disables it */
  maxCallDurationMs?: number;
  log?: Logger;
}

export interface SessionStats {
  mediaReceived: number;
  framesSentToAgent: number;
  chunksSentToTelephony: number;
  droppedBeforeStart: number;
  droppedAgentChunks: number;
  malformedPayloads: number;
}

/**
 * One phone call. Bridges a Twilio Media Stream to a real-time AI peer:
 *
 * - inbound: `handleMessage` is fed by the telephony message loop, one message
 *   at a time; audio is transcoded, framed and sent to the agent.
 * - outbound: a background pump started by `open()` drains the agent's event
 *   stream and writes μ-law media back through the transport.
 *
 * Lifecycle: awaiting_start → active → closing → closed. Teardown aborts the
 * pump and waits for it before closing the agent and the telephony socket.
 */
export class MediaStreamSession {
  private currentState: SessionState = 'awaiting_start';
  private sid: string | null = null;
  private callSidValue = '';
  private callerValue = 'unknown';
  private log: Logger;

  private readonly transcoder: AudioTranscoder;
  private readonly frames: FrameBuffer;
  private readonly pumpAbort = new AbortController();
  private pump: Promise<void> | null = null;
  private closing: Promise<void> | null = null;
  private callTimeout: ReturnType<typeof setTimeout> | null = null;
  private readonly counters: SessionStats = {
    mediaReceived: 0,
    framesSentToAgent: 0,
    chunksSentToTelephony: 0,
    droppedBeforeStart: 0,
    droppedAgentChunks: 0,
    malformedPayloads: 0,
  };

  constructor(
    private readonly transport: TelephonyTransport,
    private readonly agent: VoiceAgentClient,
    private readonly options: MediaStreamSessionOptions,
  ) {
    this.log = options.log ?? logger;
    this.transcoder = new AudioTranscoder(agent.inputSampleRate, agent.outputSampleRate);
    this.frames = new FrameBuffer(options.frameBytes);
  }

  get state(): SessionState {
    return this.currentState;
  }

  get streamSid(): string | null {
    return this.sid;
  }

  get callSid(): string {
    return this.callSidValue;
  }

  get caller(): string {
    return this.callerValue;
  }

  get stats(): SessionStats {
    return { ...this.counters };
  }

  private get isClosing(): boolean {
    return this.currentState === 'closing' || this.currentState === 'closed';
  }

  // ── Open: connect the agent and start the outbound pump ──────────────

  async open(): Promise<void> {
    if (this.pump || this.isClosing) return;

    try {
      await this.agent.connect();
    } catch (err) {
      if (this.isClosing) {
        // The call ended while the agent was still connecting
        this.log.debug({ err: errorMessage(err) }, 'Agent connect abandoned');
        return;
      }
      this.log.error({ err }, 'Failed to connect to AI agent');
      await this.close('agent_connect_failed');
      throw err instanceof ConnectionError ? err : new ConnectionError(errorMessage(err), { cause: err });
    }

    if (this.isClosing) return;
    this.log.info({ provider: this.agent.provider }, 'AI agent connected');
    this.pump = this.runOutboundPump();
  }

  // ── Twilio inbound events ────────────────────────────────────────────

  async handleMessage(raw: string): Promise<void> {
    if (this.isClosing) return;

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, 'Failed to parse Twilio message');
      return;
    }

    const event = toTwilioEvent(data);
    if (!event) {
      this.log.debug('Ignoring unrecognised Twilio message');
      return;
    }

    switch (event.event) {
      case 'connected':
        this.log.info('Twilio Media Stream connected');
        break;

      case 'start':
        this.onStart(event);
        break;

      case 'media':
        await this.onMedia(event);
        break;

      case 'stop':
        this.log.info('Twilio Media Stream stopped');
        await this.close('twilio_stop');
        break;

      case 'mark':
        this.log.debug({ mark: event.mark.name }, 'Twilio mark received');
        break;
    }
  }

  /** The telephony socket went away; normal end of a call. */
  handleDisconnect(): Promise<void> {
    return this.close('telephony_closed');
  }

  private onStart(event: TwilioMediaStreamStart): void {
    if (this.currentState !== 'awaiting_start') {
      this.log.debug('Ignoring duplicate start event');
      return;
    }

    this.sid = event.start.streamSid;
    this.callSidValue = event.start.callSid ?? '';
    this.callerValue = event.start.customParameters?.caller || 'unknown';
    this.currentState = 'active';
    this.log = this.log.child({ streamSid: this.sid });
    this.log.info({ callSid: this.callSidValue, caller: this.callerValue }, 'Media Stream started');

    const maxMs = this.options.maxCallDurationMs ?? 0;
    if (maxMs > 0) {
      this.callTimeout = setTimeout(() => {
        this.log.warn({ maxMs }, 'Call duration limit reached');
        this.close('max_duration').catch((err) => this.log.error({ err }, 'Failed to close session'));
      }, maxMs);
      this.callTimeout.unref();
    }
  }

  private async onMedia(event: TwilioMediaStreamMedia): Promise<void> {
    if (this.currentState !== 'active') {
      this.counters.droppedBeforeStart++;
      this.log.debug('Dropping media received before stream start');
      return;
    }

    const payload = event.media.payload;
    if (!payload) {
      this.counters.malformedPayloads++;
      this.log.warn('Media message without payload');
      return;
    }

    this.counters.mediaReceived++;
    let pcm: Buffer;
    try {
      pcm = this.transcoder.telephonyToAgent(payload);
    } catch (err) {
      this.counters.malformedPayloads++;
      this.log.warn({ err: errorMessage(err) }, 'Skipping malformed media payload');
      return;
    }

    this.frames.push(pcm);
    for (let frame = this.frames.drain(); frame; frame = this.frames.drain()) {
      try {
        await this.agent.sendAudio(frame, this.agent.inputSampleRate);
        this.counters.framesSentToAgent++;
      } catch (err) {
        this.log.error({ err }, 'Failed to send audio to AI agent');
        await this.close('agent_send_failed');
        return;
      }
      if (this.isClosing) return;
    }
  }

  // ── Outbound pump: agent → Twilio ────────────────────────────────────

  private async runOutboundPump(): Promise<void> {
    let reason = 'agent_closed';
    try {
      for await (const event of this.agent.receiveAudio(this.pumpAbort.signal)) {
        await this.onAgentEvent(event);
      }
    } catch (err) {
      if (!this.pumpAbort.signal.aborted) {
        this.log.error({ err }, 'AI agent stream failed');
        reason = 'agent_error';
      }
    }

    if (!this.pumpAbort.signal.aborted) {
      // The agent went away on its own; teardown awaits this pump, which is about to return
      this.close(reason).catch((err) => this.log.error({ err }, 'Failed to close session'));
    }
  }

  private async onAgentEvent(event: AgentEvent): Promise<void> {
    if (this.isClosing) return;

    switch (event.type) {
      case 'audio': {
        const streamSid = this.sid;
        if (!streamSid) {
          this.counters.droppedAgentChunks++;
          this.log.debug('Dropping agent audio received before stream start');
          return;
        }

        let payload: string;
        try {
          payload = this.transcoder.agentToTelephony(event.pcm);
        } catch (err) {
          this.log.warn({ err: errorMessage(err) }, 'Skipping malformed agent audio chunk');
          return;
        }
        if (!payload) return;

        if (await this.sendToTelephony({ event: 'media', streamSid, media: { payload } })) {
          this.counters.chunksSentToTelephony++;
          if (this.counters.chunksSentToTelephony % 50 === 1) {
            this.log.info({ count: this.counters.chunksSentToTelephony }, 'Audio chunks sent to Twilio');
          }
        }
        break;
      }

      case 'interrupted':
        if (this.sid) {
          await this.sendToTelephony({ event: 'clear', streamSid: this.sid });
          this.log.debug('Cleared Twilio audio buffer (interruption)');
        }
        break;

      case 'turn_complete':
        this.log.info('AI turn complete');
        break;

      case 'text':
        this.log.debug({ text: event.text }, 'AI text');
        break;

      case 'tool_call':
        this.log.warn({ tool: event.name, callId: event.id }, 'Ignoring tool call; no tools are registered');
        break;
    }
  }

  private async sendToTelephony(message: TwilioOutboundMessage): Promise<boolean> {
    if (!this.transport.isOpen) return false;
    try {
      await this.transport.send(message);
      return true;
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, 'Failed to write to Twilio');
      return false;
    }
  }

  // ── Teardown ─────────────────────────────────────────────────────────

  /** Idempotent; every caller gets the same teardown. */
  close(reason: string): Promise<void> {
    if (!this.closing) this.closing = this.teardown(reason);
    return this.closing;
  }

  private async teardown(reason: string): Promise<void> {
    this.currentState = 'closing';
    this.log.info({ reason }, 'Closing media stream');

    if (this.callTimeout) {
      clearTimeout(this.callTimeout);
      this.callTimeout = null;
    }

    this.pumpAbort.abort();
    if (this.pump) await this.pump;

    try {
      await this.agent.close();
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, 'Error closing AI agent connection');
    }

    try {
      this.transport.close();
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, 'Error closing Twilio WebSocket');
    }

    this.frames.clear();
    this.currentState = 'closed';
    this.log.info({ reason, ...this.counters }, 'Media stream closed');
  }
}
