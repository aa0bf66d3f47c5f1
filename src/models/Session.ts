import { z } from 'zod';

export const SessionTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string()
});

export const SessionHistorySchema = z.array(SessionTurnSchema);

export type SessionTurn = z.infer<typeof SessionTurnSchema>;

export const SessionIdSchema = z.string().uuid('session_id must be a UUID');
