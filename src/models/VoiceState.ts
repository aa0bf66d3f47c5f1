export enum VoiceState {
  LISTENING = 'listening',
  TRANSCRIPT_RECEIVED = 'transcript_received',
  GENERATING = 'generating',
  SPEAKING = 'speaking',
  INTERRUPTED = 'interrupted'
}

export interface AudioFragment {
  id: number;
  /** Text this audio speaks */
  text: string;
  audio: Buffer;
}

export interface VoiceStateChange {
  from: VoiceState;
  to: VoiceState;
  reason: string;
}
