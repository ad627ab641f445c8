import type { VoiceAgentClient } from './agent-client';
import { GeminiLiveClient } from './gemini-live';
import { OpenAIRealtimeClient } from './openai-realtime';
import type { AgentConfig } from './utils/env';
import type { Logger } from './utils/logger';

/** A fresh client per call; connections are never pooled. */
export function createAgentClient(config: AgentConfig, log: Logger): VoiceAgentClient {
  switch (config.provider) {
    case 'gemini':
      return new GeminiLiveClient(config, log);
    case 'openai':
      return new OpenAIRealtimeClient(config, log);
  }
}
