/** Gemini Live (BidiGenerateContent) wire types, camelCase JSON */

// --- Client -> Server ---

export interface GeminiSetupMessage {
  setup: {
    model: string;
    generationConfig: {
      responseModalities: ['AUDIO'];
      speechConfig: {
        voiceConfig: { prebuiltVoiceConfig: { voiceName: string } };
      };
    };
    systemInstruction?: { parts: Array<{ text: string }> };
  };
}

export interface GeminiRealtimeInputMessage {
  realtimeInput: {
    mediaChunks: Array<{ mimeType: string; data: string }>;
  };
}

// --- Server -> Client ---

export interface GeminiPart {
  text?: string;
  inlineData?: {
    mimeType?: string;
    data?: string; // Base64
  };
}

export interface GeminiServerContent {
  modelTurn?: { parts?: GeminiPart[] };
  turnComplete?: boolean;
  interrupted?: boolean;
}

export interface GeminiFunctionCall {
  id?: string;
  name: string;
  args?: Record<string, unknown>;
}

/** One server frame; exactly one of the top-level fields is normally set. */
export interface GeminiServerMessage {
  setupComplete?: Record<string, never>;
  serverContent?: GeminiServerContent;
  toolCall?: { functionCalls?: GeminiFunctionCall[] };
  goAway?: { timeLeft?: string };
}
