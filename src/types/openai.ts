/** OpenAI Realtime API wire types (the subset the bridge speaks) */

export interface OpenAISessionConfig {
  modalities: ('text' | 'audio')[];
  instructions: string;
  voice: string;
  input_audio_format: 'pcm16';
  output_audio_format: 'pcm16';
  turn_detection: {
    type: 'server_vad';
    threshold: number;
    prefix_padding_ms: number;
    silence_duration_ms: number;
    create_response: boolean;
  };
}

// --- Client -> Server events ---

export interface SessionUpdateEvent {
  type: 'session.update';
  session: OpenAISessionConfig;
}

export interface InputAudioBufferAppendEvent {
  type: 'input_audio_buffer.append';
  audio: string; // Base64 PCM16 24kHz
}

// --- Server -> Client events ---

export interface SessionCreatedEvent {
  type: 'session.created';
  session: { id: string };
}

export interface SessionUpdatedEvent {
  type: 'session.updated';
  session: { id: string };
}

export interface InputAudioBufferSpeechStartedEvent {
  type: 'input_audio_buffer.speech_started';
  audio_start_ms: number;
  item_id: string;
}

export interface ResponseAudioDeltaEvent {
  type: 'response.audio.delta';
  response_id: string;
  item_id: string;
  delta: string; // Base64 PCM16
}

export interface ResponseAudioDoneEvent {
  type: 'response.audio.done';
  response_id: string;
  item_id: string;
}

export interface ResponseAudioTranscriptDoneEvent {
  type: 'response.audio_transcript.done';
  response_id: string;
  item_id: string;
  transcript: string;
}

export interface ResponseFunctionCallArgumentsDoneEvent {
  type: 'response.function_call_arguments.done';
  response_id: string;
  item_id: string;
  call_id: string;
  name: string;
  arguments: string;
}

export interface ErrorEvent {
  type: 'error';
  error: {
    type: string;
    code?: string;
    message: string;
  };
}

export type OpenAIServerEvent =
  | SessionCreatedEvent
  | SessionUpdatedEvent
  | InputAudioBufferSpeechStartedEvent
  | ResponseAudioDeltaEvent
  | ResponseAudioDoneEvent
  | ResponseAudioTranscriptDoneEvent
  | ResponseFunctionCallArgumentsDoneEvent
  | ErrorEvent;
