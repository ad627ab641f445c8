import dotenv from 'dotenv';
import { ConfigError } from './errors';

dotenv.config();

export type AgentProvider = 'gemini' | 'openai';

export interface AgentConfig {
  provider: AgentProvider;
  apiKey: string;
  model: string;
  url: string;
  voice: string;
  systemPrompt: string;
  inputSampleRate: number;
  outputSampleRate: number;
  connectTimeoutMs: number;
}

export interface AppConfig {
  server: {
    host: string;
    port: number;
    publicUrl: string;
    nodeEnv: string;
  };
  twilio: {
    authToken: string;
    enableWebhookValidation: boolean;
    greeting: string;
  };
  agent: AgentConfig;
  bridge: {
    inboundFrameMs: number;
    maxCallDurationMinutes: number;
  };
}

const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful AI assistant on a phone call. ' +
  'Be conversational, concise, and natural. ' +
  'Speak clearly and at a moderate pace.';

const GEMINI_LIVE_URL =
  'wss://generativelanguage.googleapis.com/ws/google.ai.generativelanguage.v1beta.GenerativeService.BidiGenerateContent';
const OPENAI_REALTIME_URL = 'wss://api.openai.com/v1/realtime';

// OpenAI Realtime only speaks 24kHz pcm16 in both directions.
const OPENAI_SAMPLE_RATE = 24000;

type EnvSource = Record<string, string | undefined>;

function int(source: EnvSource, key: string, fallback: number): number {
  const raw = source[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function str(source: EnvSource, key: string, fallback = ''): string {
  const raw = source[key];
  return raw === undefined || raw === '' ? fallback : raw;
}

function provider(source: EnvSource): AgentProvider {
  const raw = str(source, 'AI_PROVIDER', 'gemini').toLowerCase();
  if (raw === 'gemini' || raw === 'openai') return raw;
  throw new ConfigError(`AI_PROVIDER must be "gemini" or "openai", got "${raw}"`);
}

/**
 * Builds the application config from an environment record.
 * Throws a ConfigError naming every required variable that is missing.
 */
export function loadConfig(source: EnvSource = process.env): AppConfig {
  const ai = provider(source);
  const enableWebhookValidation = source.ENABLE_WEBHOOK_VALIDATION !== 'false';

  const missing: string[] = [];
  const required = (key: string): string => {
    const value = str(source, key);
    if (!value) missing.push(key);
    return value;
  };

  const publicUrl = required('PUBLIC_URL').replace(/\/+$/, '');
  const authToken = enableWebhookValidation ? required('TWILIO_AUTH_TOKEN') : str(source, 'TWILIO_AUTH_TOKEN');
  const apiKey = required(ai === 'gemini' ? 'GEMINI_API_KEY' : 'OPENAI_API_KEY');

  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`, missing);
  }

  const agent: AgentConfig =
    ai === 'gemini'
      ? {
          provider: ai,
          apiKey,
          model: str(source, 'GEMINI_MODEL', 'models/gemini-2.0-flash-exp'),
          url: str(source, 'GEMINI_LIVE_URL', GEMINI_LIVE_URL),
          voice: str(source, 'AGENT_VOICE', 'Aoede'),
          systemPrompt: str(source, 'SYSTEM_PROMPT', DEFAULT_SYSTEM_PROMPT),
          inputSampleRate: int(source, 'AGENT_INPUT_SAMPLE_RATE', 16000),
          outputSampleRate: int(source, 'AGENT_OUTPUT_SAMPLE_RATE', 24000),
          connectTimeoutMs: int(source, 'AGENT_CONNECT_TIMEOUT_MS', 10_000),
        }
      : {
          provider: ai,
          apiKey,
          model: str(source, 'OPENAI_REALTIME_MODEL', 'gpt-4o-realtime-preview-2024-10-01'),
          url: str(source, 'OPENAI_REALTIME_URL', OPENAI_REALTIME_URL),
          voice: str(source, 'AGENT_VOICE', 'alloy'),
          systemPrompt: str(source, 'SYSTEM_PROMPT', DEFAULT_SYSTEM_PROMPT),
          inputSampleRate: OPENAI_SAMPLE_RATE,
          outputSampleRate: OPENAI_SAMPLE_RATE,
          connectTimeoutMs: int(source, 'AGENT_CONNECT_TIMEOUT_MS', 10_000),
        };

  if (agent.inputSampleRate === 0 || agent.outputSampleRate === 0) {
    throw new ConfigError('Agent sample rates must be positive');
  }

  const inboundFrameMs = int(source, 'INBOUND_FRAME_MS', 300);
  if (inboundFrameMs === 0) {
    throw new ConfigError('INBOUND_FRAME_MS must be positive');
  }

  return {
    server: {
      host: str(source, 'HOST', '0.0.0.0'),
      port: int(source, 'PORT', 8082),
      publicUrl,
      nodeEnv: str(source, 'NODE_ENV', 'development'),
    },
    twilio: {
      authToken,
      enableWebhookValidation,
      greeting: str(source, 'CALL_GREETING', 'Connecting you now.'),
    },
    agent,
    bridge: {
      inboundFrameMs,
      maxCallDurationMinutes: int(source, 'MAX_CALL_DURATION_MINUTES', 10),
    },
  };
}

/** Frame threshold in bytes: `ms` worth of PCM16 mono at `sampleRate`. */
export function frameBytesFor(ms: number, sampleRate: number): number {
  const samples = Math.max(1, Math.round((sampleRate * ms) / 1000));
  return samples * 2;
}
