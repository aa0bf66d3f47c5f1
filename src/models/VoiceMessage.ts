import { z } from 'zod';
import type { VoiceState } from './VoiceState';

// Browser → server
export const ClientVoiceMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('transcript'),
    text: z.string(),
    is_final: z.boolean().default(true)
  }),
  z.object({ type: z.literal('speech_started') }),
  z.object({
    type: z.literal('playback_finished'),
    id: z.number().int()
  })
]);

export type ClientVoiceMessage = z.infer<typeof ClientVoiceMessageSchema>;

// Server → browser
export type ServerVoiceMessage =
  | { type: 'state'; state: VoiceState; reason: string }
  | { type: 'response_text'; text: string }
  | {
      type: 'audio';
      id: number;
      text: string;
      /** base64 PCM */
      audio: string;
      encoding: string;
      sample_rate: number;
    }
  | { type: 'stop_audio' }
  | { type: 'error'; message: string; retry_after?: number };
