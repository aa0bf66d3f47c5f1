import type { Server } from 'http';
import { afterEach, describe, it, expect } from 'vitest';
import express from 'express';
import { errorHandler } from '../../src/middleware/errorHandler';
import { ServiceUnavailableError } from '../../src/utils/errors';

let server: Server | undefined;

afterEach(async () => {
  await new Promise<void>((resolve) => (server ? server.close(() => resolve()) : resolve()));
  server = undefined;
});

async function serve(app: express.Express): Promise<string> {
  const listening: Server = await new Promise((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  server = listening;
  const address = listening.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server is not listening on a port');
  }
  return `http://127.0.0.1:${address.port}`;
}

describe('errorHandler', () => {
  it('hides the message of unexpected errors', async () => {
    const app = express();
    app.get('/boom', () => {
      throw new Error('connection string with credentials');
    });
    app.use(errorHandler);

    const res = await fetch(`${await serve(app)}/boom`);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Internal server error', message: 'Something went wrong' });
  });

  it('uses the status and message of exposed application errors', async () => {
    const app = express();
    app.get('/unavailable', (_req, _res, next) => {
      next(new ServiceUnavailableError('Voice credentials are not configured'));
    });
    app.use(errorHandler);

    const res = await fetch(`${await serve(app)}/unavailable`);

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: 'ServiceUnavailableError',
      message: 'Voice credentials are not configured'
    });
  });
});
