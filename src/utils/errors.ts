/** Error types raised across the bridge. */

export type BridgeErrorCode = 'AGENT_CONNECTION' | 'AUDIO_FORMAT' | 'CONFIG';

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;

  constructor(code: BridgeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The AI peer could not be reached, rejected the handshake, or dropped the link. */
export class ConnectionError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AGENT_CONNECTION', message, options);
  }
}

/** An audio payload could not be decoded (bad base64, odd-length PCM, etc). */
export class AudioFormatError extends BridgeError {
  constructor(message: string) {
    super('AUDIO_FORMAT', message);
  }
}

export class ConfigError extends BridgeError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super('CONFIG', message);
    this.missing = missing;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
