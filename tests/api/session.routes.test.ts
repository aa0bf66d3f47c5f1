import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { startTestServer, type TestServer } from '../helpers/testApp';

let server: TestServer;

beforeEach(async () => {
  server = await startTestServer({ voiceEnabled: false });
});

afterEach(async () => {
  await server.close();
});

describe('session and status routes', () => {
  it('reports health and public config', async () => {
    const health = await fetch(`${server.baseUrl}/api/health`);
    const config = await fetch(`${server.baseUrl}/api/config`);

    expect(await health.json()).toEqual({ status: 'ok' });
    expect(await config.json()).toEqual({ voiceEnabled: false });
  });

  it('creates a session with empty history', async () => {
    const res = await fetch(`${server.baseUrl}/api/session`, { method: 'POST' });
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toEqual({ session_id: expect.stringMatching(/^[0-9a-f-]{36}$/) });
    expect([...server.kv.entries.keys()].filter((key) => key.startsWith('chat_session:'))).toHaveLength(1);
  });

  it('deletes a session', async () => {
    const sessionId = '0b7f6c1e-3f4a-4d2b-9c8e-1a2b3c4d5e6f';
    await server.sessions.append(sessionId, { role: 'user', content: 'Hi' });

    const res = await fetch(`${server.baseUrl}/api/session/${sessionId}`, { method: 'DELETE' });

    expect(res.status).toBe(204);
    expect(await server.sessions.read(sessionId)).toEqual([]);
  });

  it('rejects a malformed session id', async () => {
    const res = await fetch(`${server.baseUrl}/api/session/not-a-uuid`, { method: 'DELETE' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'ValidationError', message: 'session_id must be a UUID' });
  });
});

describe('client identification for rate limits', () => {
  it('keys buckets by x-real-ip behind a trusted proxy', async () => {
    const res = await fetch(`${server.baseUrl}/api/session`, { method: 'POST', headers: { 'x-real-ip': '10.0.0.1' } });

    expect(res.status).toBe(200);
    expect(server.kv.entries.get('rl:session:10.0.0.1')?.value).toBe('1');
  });

  it('ignores forwarding headers when no proxy is trusted', async () => {
    const direct = await startTestServer({ trustProxy: false });
    try {
      const statuses: number[] = [];
      for (let i = 1; i <= 11; i++) {
        const res = await fetch(`${direct.baseUrl}/api/session`, {
          method: 'POST',
          headers: { 'x-real-ip': `10.0.0.${i}` }
        });
        statuses.push(res.status);
      }

      expect(statuses.filter((status) => status === 200)).toHaveLength(10);
      expect(statuses[10]).toBe(429);
      expect(direct.kv.entries.get('rl:session:127.0.0.1')?.value).toBe('11');
    } finally {
      await direct.close();
    }
  });
});
