import type { IncomingMessage, Server } from 'http';
import type { Duplex } from 'stream';
import WebSocket, { WebSocketServer } from 'ws';
import { SessionIdSchema } from '../models/Session';
import { VoiceConnection, type VoiceConnectionDeps } from './VoiceConnection';
import { generateCorrelationId } from '../utils/correlationId';
import { resolveClientIp } from '../utils/clientIp';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'VoiceWebSocketServer' });

export const VOICE_STREAM_PATH = '/api/voice/stream';

export interface VoiceWebSocketServerOptions {
  /** null when voice is disabled: upgrades are refused with 403 */
  voice: VoiceConnectionDeps | null;
  tickIntervalMs?: number;
  /** Same meaning as the HTTP app's `trust proxy` setting */
  trustProxy?: boolean;
}

function rejectUpgrade(socket: Duplex, status: string): void {
  socket.write(`HTTP/1.1 ${status}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

/**
 * Voice gateway: binds one VoiceTurnController to each browser socket on
 * the HTTP server's upgrade path.
 */
export class VoiceWebSocketServer {
  private server: WebSocketServer;

  constructor(
    httpServer: Server,
    private options: VoiceWebSocketServerOptions
  ) {
    this.server = new WebSocketServer({ noServer: true });

    httpServer.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });

    this.server.on('error', (error) => {
      logger.error({ error }, 'Voice WebSocket error');
    });
  }

  close(): void {
    this.server.clients.forEach((client) => client.close(1001, 'Server shutting down'));
    this.server.close();
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (url.pathname !== VOICE_STREAM_PATH) {
      rejectUpgrade(socket, '404 Not Found');
      return;
    }

    const voice = this.options.voice;
    if (!voice) {
      rejectUpgrade(socket, '403 Forbidden');
      return;
    }

    const rawSessionId = url.searchParams.get('session_id');
    const parsed = rawSessionId ? SessionIdSchema.safeParse(rawSessionId) : undefined;
    if (parsed && !parsed.success) {
      rejectUpgrade(socket, '400 Bad Request');
      return;
    }

    const clientIp = resolveClientIp(req.headers, req.socket.remoteAddress, this.options.trustProxy ?? true);

    this.server.handleUpgrade(req, socket, head, (ws) => {
      this.handleConnection(ws, voice, clientIp, parsed?.data);
    });
  }

  private handleConnection(ws: WebSocket, voice: VoiceConnectionDeps, clientIp: string, sessionId?: string): void {
    const connectionId = generateCorrelationId();
    const connectionLogger = logger.child({ connectionId, sessionId, clientIp });

    const connection = new VoiceConnection(
      voice,
      (message) => {
        if (ws.readyState === WebSocket.OPEN) {
          ws.send(JSON.stringify(message));
        }
      },
      connectionLogger,
      clientIp,
      sessionId
    );

    const interval = setInterval(() => connection.tick(), this.options.tickIntervalMs ?? 1000);

    connectionLogger.info('Voice client connected');

    ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) {
        return;
      }
      connection.handleMessage(data.toString()).catch((error: unknown) => connection.reportFailure(error));
    });

    ws.on('close', (code: number) => {
      clearInterval(interval);
      connection.close();
      connectionLogger.info({ code }, 'Voice client disconnected');
    });

    ws.on('error', (error: Error) => {
      connectionLogger.warn({ error: error.message }, 'Voice socket error');
    });
  }
}
