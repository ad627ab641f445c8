import WebSocket from 'ws';
import type { AgentProvider } from './utils/env';
import type { Logger } from './utils/logger';
import { AsyncQueue } from './utils/async-queue';
import { ConnectionError, errorMessage } from './utils/errors';
import { rawToString } from './utils/ws-data.util';
import type { AgentEvent } from './types/agent';

/**
 * What the bridge needs from a real-time voice AI peer. Provider wire formats
 * stay behind this interface; the session only sees `AgentEvent`s.
 */
export interface VoiceAgentClient {
  readonly provider: AgentProvider;
  /** Sample rate `sendAudio` expects */
  readonly inputSampleRate: number;
  /** Sample rate of `audio` events */
  readonly outputSampleRate: number;
  /** Rejects with ConnectionError on auth/network failure or timeout. */
  connect(): Promise<void>;
  sendAudio(pcm16: Buffer, sampleRate: number): Promise<void>;
  /**
   * Events until the connection closes or `signal` aborts. Single consumer;
   * throws ConnectionError if the peer drops the link abnormally.
   */
  receiveAudio(signal?: AbortSignal): AsyncIterable<AgentEvent>;
  /** Idempotent. */
  close(): Promise<void>;
}

export interface RealtimeSocketOptions {
  url: string;
  headers?: Record<string, string>;
  connectTimeoutMs: number;
  inputSampleRate: number;
  outputSampleRate: number;
  log: Logger;
}

const CLOSE_GRACE_MS = 2_000;

/**
 * Shared plumbing for providers that speak JSON over a WebSocket: connect with
 * timeout, handshake, event queue, serialized sends and idempotent close.
 */
export abstract class RealtimeSocketClient implements VoiceAgentClient {
  abstract readonly provider: AgentProvider;
  readonly inputSampleRate: number;
  readonly outputSampleRate: number;

  protected readonly log: Logger;
  private readonly options: RealtimeSocketOptions;
  private ws: WebSocket | null = null;
  private readonly events = new AsyncQueue<AgentEvent>();
  private ready = false;
  private closed = false;
  private consuming = false;
  private closing: Promise<void> | null = null;
  private onReady: (() => void) | null = null;

  constructor(options: RealtimeSocketOptions) {
    this.options = options;
    this.inputSampleRate = options.inputSampleRate;
    this.outputSampleRate = options.outputSampleRate;
    this.log = options.log;
  }

  /** Send the provider's session setup once the socket opens. */
  protected abstract onOpen(): void;

  /** Decode one text frame; call `markReady`/`emit` as appropriate. */
  protected abstract handleMessage(message: string): void;

  protected abstract audioMessage(pcm16: Buffer, sampleRate: number): object;

  protected markReady(): void {
    this.onReady?.();
  }

  protected emit(event: AgentEvent): void {
    this.events.push(event);
  }

  get isOpen(): boolean {
    return this.ready && this.ws?.readyState === WebSocket.OPEN;
  }

  // ── Connection ────────────────────────────────────────────────────────

  connect(): Promise<void> {
    if (this.ready) return Promise.resolve();
    if (this.closed) return Promise.reject(new ConnectionError('Agent client already closed'));
    if (this.ws) return Promise.reject(new ConnectionError('Agent client is already connecting'));

    return new Promise<void>((resolve, reject) => {
      const ws = new WebSocket(this.options.url, { headers: this.options.headers });
      this.ws = ws;
      let settled = false;

      const fail = (err: ConnectionError): void => {
        if (settled) return;
        settled = true;
        clearTimeout(connectTimeout);
        this.onReady = null;
        reject(err);
        if (ws.readyState !== WebSocket.CLOSED) ws.terminate();
      };

      const connectTimeout = setTimeout(() => {
        fail(new ConnectionError(`${this.provider} connection timed out after ${this.options.connectTimeoutMs}ms`));
      }, this.options.connectTimeoutMs);

      this.onReady = () => {
        if (settled) return;
        settled = true;
        clearTimeout(connectTimeout);
        this.onReady = null;
        this.ready = true;
        this.log.info({ provider: this.provider }, 'Agent session ready');
        resolve();
      };

      ws.on('open', () => {
        this.log.info({ provider: this.provider }, 'Agent WebSocket connected');
        this.onOpen();
      });

      ws.on('message', (data) => {
        try {
          this.handleMessage(rawToString(data));
        } catch (err) {
          this.log.error({ err }, 'Failed to decode agent message');
        }
      });

      ws.on('error', (err) => {
        this.log.error({ err }, 'Agent WebSocket error');
        fail(new ConnectionError(`${this.provider} connection failed: ${err.message}`, { cause: err }));
      });

      ws.on('close', (code, reason) => {
        const reasonStr = reason.toString();
        fail(new ConnectionError(`${this.provider} closed before session was ready (code ${code}${reasonStr ? `: ${reasonStr}` : ''})`));
        this.ready = false;

        if (this.closed || code === 1000) {
          this.log.info({ code, reason: reasonStr }, 'Agent WebSocket closed');
          this.events.end();
        } else {
          this.log.warn({ code, reason: reasonStr }, 'Agent WebSocket closed unexpectedly');
          this.events.fail(new ConnectionError(`${this.provider} connection lost (code ${code})`));
        }
      });
    });
  }

  // ── Send helpers ──────────────────────────────────────────────────────

  protected send(message: object): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ConnectionError(`${this.provider} is not connected`));
    }
    return new Promise<void>((resolve, reject) => {
      ws.send(JSON.stringify(message), (err) => {
        if (err) reject(new ConnectionError(err.message, { cause: err }));
        else resolve();
      });
    });
  }

  sendAudio(pcm16: Buffer, sampleRate: number): Promise<void> {
    if (sampleRate !== this.inputSampleRate) {
      return Promise.reject(
        new RangeError(`${this.provider} expects ${this.inputSampleRate}Hz input, got ${sampleRate}Hz`),
      );
    }
    if (!this.isOpen) {
      return Promise.reject(new ConnectionError(`${this.provider} is not connected`));
    }
    return this.send(this.audioMessage(pcm16, sampleRate));
  }

  receiveAudio(signal?: AbortSignal): AsyncIterable<AgentEvent> {
    if (this.consuming) {
      throw new Error('receiveAudio() already has a consumer; reconnect to restart the stream');
    }
    this.consuming = true;
    return this.events.iterate(signal);
  }

  // ── Close ─────────────────────────────────────────────────────────────

  close(): Promise<void> {
    if (!this.closing) this.closing = this.shutdown();
    return this.closing;
  }

  private shutdown(): Promise<void> {
    this.closed = true;
    this.ready = false;
    this.events.end();

    const ws = this.ws;
    if (!ws || ws.readyState === WebSocket.CLOSED) return Promise.resolve();

    return new Promise<void>((resolve) => {
      const grace = setTimeout(() => {
        ws.terminate();
        resolve();
      }, CLOSE_GRACE_MS);
      grace.unref();

      ws.once('close', () => {
        clearTimeout(grace);
        resolve();
      });

      try {
        if (ws.readyState === WebSocket.OPEN) {
          ws.close(1000);
        } else if (ws.readyState === WebSocket.CONNECTING) {
          ws.terminate();
        }
      } catch (err) {
        this.log.warn({ err: errorMessage(err) }, 'Error while closing agent WebSocket');
        clearTimeout(grace);
        resolve();
      }
    });
  }
}
