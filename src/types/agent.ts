/** Events decoded from the AI peer's stream, independent of provider. */

export interface AgentAudioEvent {
  type: 'audio';
  /** PCM16 little-endian at the client's output sample rate */
  pcm: Buffer;
}

export interface AgentTurnCompleteEvent {
  type: 'turn_complete';
}

/** The caller barged in; queued playback should be discarded. */
export interface AgentInterruptedEvent {
  type: 'interrupted';
}

export interface AgentTextEvent {
  type: 'text';
  text: string;
}

export interface AgentToolCallEvent {
  type: 'tool_call';
  id: string;
  name: string;
  args: Record<string, unknown>;
}

export type AgentEvent =
  | AgentAudioEvent
  | AgentTurnCompleteEvent
  | AgentInterruptedEvent
  | AgentTextEvent
  | AgentToolCallEvent;
