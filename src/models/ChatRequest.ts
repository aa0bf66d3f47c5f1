import { z } from 'zod';
import { MAX_MESSAGE_LENGTH } from '../config/constants';
import { SessionIdSchema } from './Session';

const MessageSchema = z
  .string({ required_error: 'Message is required' })
  .trim()
  .min(1, 'Message is required')
  .max(MAX_MESSAGE_LENGTH, `Message must be at most ${MAX_MESSAGE_LENGTH} characters`);

export const ChatRequestSchema = z.object({
  message: MessageSchema,
  session_id: SessionIdSchema.optional()
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

// Voice clients send the finalized transcript; `transcript` is accepted as an alias
export const VoiceChatRequestSchema = z
  .object({
    message: z.string().optional(),
    transcript: z.string().optional(),
    session_id: SessionIdSchema.optional()
  })
  .transform((body) => ({
    message: body.message ?? body.transcript ?? '',
    session_id: body.session_id
  }))
  .pipe(ChatRequestSchema);

export type VoiceChatRequest = z.infer<typeof VoiceChatRequestSchema>;
