import type { Response } from 'express';

export const SSE_DONE = 'data: [DONE]\n\n';

export function sseFrame(payload: { content: string } | { error: string }): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

export function openEventStream(res: Response, headers: Record<string, string> = {}): void {
  res.status(200);
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  // Disable proxy buffering (nginx)
  res.setHeader('X-Accel-Buffering', 'no');
  for (const [name, value] of Object.entries(headers)) {
    res.setHeader(name, value);
  }
  res.flushHeaders();
}

/**
 * AbortController that fires when the client goes away before the response ends
 */
export function abortOnDisconnect(res: Response): AbortController {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller;
}
