import { describe, expect, it } from 'vitest';

import { frameBytesFor, loadConfig } from './env';
import { ConfigError } from './errors';

const REQUIRED = {
  PUBLIC_URL: 'https://bridge.example.com/',
  TWILIO_AUTH_TOKEN: 'test-secret',
  GEMINI_API_KEY: 'test-key',
};

describe('loadConfig', () => {
  it('applies Gemini defaults', () => {
    const config = loadConfig(REQUIRED);

    expect(config.server).toEqual({
      host: '0.0.0.0',
      port: 8082,
      publicUrl: 'https://bridge.example.com',
      nodeEnv: 'development',
    });
    expect(config.agent).toMatchObject({
      provider: 'gemini',
      apiKey: 'test-key',
      model: 'models/gemini-2.0-flash-exp',
      voice: 'Aoede',
      inputSampleRate: 16000,
      outputSampleRate: 24000,
      connectTimeoutMs: 10000,
    });
    expect(config.bridge).toEqual({ inboundFrameMs: 300, maxCallDurationMinutes: 10 });
    expect(config.twilio).toEqual({
      authToken: 'test-secret',
      enableWebhookValidation: true,
      greeting: 'Connecting you now.',
    });
  });

  it('pins OpenAI to 24kHz in both directions', () => {
    const config = loadConfig({
      PUBLIC_URL: 'https://bridge.example.com',
      TWILIO_AUTH_TOKEN: 'test-secret',
      AI_PROVIDER: 'openai',
      OPENAI_API_KEY: 'test-key',
      AGENT_INPUT_SAMPLE_RATE: '16000',
    });

    expect(config.agent).toMatchObject({
      provider: 'openai',
      voice: 'alloy',
      url: 'wss://api.openai.com/v1/realtime',
      inputSampleRate: 24000,
      outputSampleRate: 24000,
    });
  });

  it('names every missing variable', () => {
    let caught: unknown;
    try {
      loadConfig({});
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ missing: ['PUBLIC_URL', 'TWILIO_AUTH_TOKEN', 'GEMINI_API_KEY'] });
  });

  it('does not require an auth token when validation is disabled', () => {
    const config = loadConfig({
      PUBLIC_URL: 'http://localhost:8082',
      GEMINI_API_KEY: 'test-key',
      ENABLE_WEBHOOK_VALIDATION: 'false',
    });
    expect(config.twilio.enableWebhookValidation).toBe(false);
  });

  it('rejects bad numbers and providers', () => {
    expect(() => loadConfig({ ...REQUIRED, PORT: 'eighty' })).toThrow(ConfigError);
    expect(() => loadConfig({ ...REQUIRED, INBOUND_FRAME_MS: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ ...REQUIRED, AI_PROVIDER: 'claude' })).toThrow(ConfigError);
  });
});

describe('frameBytesFor', () => {
  it('sizes frames as PCM16 bytes', () => {
    expect(frameBytesFor(300, 16000)).toBe(9600);
    expect(frameBytesFor(20, 24000)).toBe(960);
    expect(frameBytesFor(0.01, 8000)).toBe(2);
  });
});
