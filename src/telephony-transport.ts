import WebSocket from 'ws';
import type { TwilioOutboundMessage } from './types/twilio';

/** The single write path back to the telephony peer. */
export interface TelephonyTransport {
  readonly isOpen: boolean;
  send(message: TwilioOutboundMessage): Promise<void>;
  close(): void;
}

/**
 * Wraps the Twilio WebSocket. Sends are chained so a frame is handed to the
 * socket only after the previous one was flushed; messages to a socket that is
 * no longer open are dropped.
 */
export class WebSocketTelephonyTransport implements TelephonyTransport {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly ws: WebSocket) {}

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  send(message: TwilioOutboundMessage): Promise<void> {
    const write = this.tail.then(() => this.write(JSON.stringify(message)));
    // Keep the chain alive after a failed write; the caller still sees the error
    this.tail = write.catch(() => undefined);
    return write;
  }

  private write(data: string): Promise<void> {
    if (!this.isOpen) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      this.ws.send(data, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close(): void {
    if (this.ws.readyState === WebSocket.OPEN) this.ws.close();
  }
}
