/**
 * HTTP API tests. Each test starts the app on an OS-assigned port with a fake
 * explanation requester and closes it afterwards.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import type { Server } from 'http';
import { createApp } from '../../server/app';
import { loadConfig } from '../../server/config';
import type { Env } from '../../server/config';
import type { ExplanationRequester } from '../../server/services/explanationService';

// ============================================================================
// Helpers
// ============================================================================

interface Running {
  server: Server;
  baseUrl: string;
  explain: Mock<ExplanationRequester['explain']>;
}

function start(env: Env): Promise<Running> {
  const explain = vi.fn<ExplanationRequester['explain']>(async () => ({
    success: true,
    text: '### Explanation\nLooks fine.',
    modelUsed: 'test-model',
  }));
  const app = createApp({ config: loadConfig(env), requester: { model: 'test-model', explain } });

  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('server did not bind a TCP port'));
        return;
      }
      resolve({ server, baseUrl: `http://127.0.0.1:${address.port}`, explain });
    });
  });
}

function stop(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

function postJson(url: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

const GATED: Env = { DEBUG_ASSISTANT_PASSWORD: 'test-secret' };

// ============================================================================
// Tests
// ============================================================================

describe('HTTP API', () => {
  let running: Running | undefined;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    if (running) {
      await stop(running.server);
      running = undefined;
    }
    vi.restoreAllMocks();
  });

  describe('GET /api/config', () => {
    it('describes the server without leaking secrets', async () => {
      running = await start({ ...GATED, OPENAI_API_KEY: 'test-key' });

      const res = await fetch(`${running.baseUrl}/api/config`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        passwordRequired: true,
        model: 'test-model',
        explanationConfigured: true,
      });
    });

    it('reports an open server without a key', async () => {
      running = await start({});

      const res = await fetch(`${running.baseUrl}/api/config`);

      expect(await res.json()).toEqual({
        passwordRequired: false,
        model: 'test-model',
        explanationConfigured: false,
      });
    });
  });

  describe('POST /api/login', () => {
    it('accepts the right password', async () => {
      running = await start(GATED);

      const res = await postJson(`${running.baseUrl}/api/login`, { password: 'test-secret' });

      expect(res.status).toBe(204);
    });

    it('rejects a wrong password', async () => {
      running = await start(GATED);

      const res = await postJson(`${running.baseUrl}/api/login`, { password: 'guess' });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ message: 'Incorrect password. Please try again.' });
    });

    it('rejects a body without a password', async () => {
      running = await start(GATED);

      const res = await postJson(`${running.baseUrl}/api/login`, {});

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ message: 'Password is required' });
    });
  });

  describe('POST /api/explain', () => {
    const body = { source: 'x = 1', findings: [] };

    it('requires the access password', async () => {
      running = await start(GATED);

      const res = await postJson(`${running.baseUrl}/api/explain`, body);

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ message: 'Incorrect password. Please log in again.' });
      expect(running.explain).not.toHaveBeenCalled();
    });

    it('validates the request body', async () => {
      running = await start(GATED);

      const res = await postJson(
        `${running.baseUrl}/api/explain`,
        { source: '', findings: [] },
        { 'x-access-password': 'test-secret' },
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ message: 'Source code is required' });
    });

    it('returns the explanation and forwards the caller key', async () => {
      running = await start(GATED);

      const res = await postJson(
        `${running.baseUrl}/api/explain`,
        { ...body, apiKey: 'user-key' },
        { 'x-access-password': 'test-secret' },
      );

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        success: true,
        text: '### Explanation\nLooks fine.',
        modelUsed: 'test-model',
      });
      expect(running.explain).toHaveBeenCalledWith(
        { source: 'x = 1', findings: [] },
        { apiKey: 'user-key', signal: expect.any(AbortSignal) },
      );
    });

    it('answers 200 with a failed result when the explanation fails', async () => {
      running = await start({});
      running.explain.mockResolvedValueOnce({
        success: false,
        text: '',
        modelUsed: 'test-model',
        errorMessage: 'The explanation request timed out after 20 ms.',
      });

      const res = await postJson(`${running.baseUrl}/api/explain`, body);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        success: false,
        text: '',
        modelUsed: 'test-model',
        errorMessage: 'The explanation request timed out after 20 ms.',
      });
    });

    it('is open when no password is configured', async () => {
      running = await start({});

      const res = await postJson(`${running.baseUrl}/api/explain`, body);

      expect(res.status).toBe(200);
    });
  });

  it('answers unknown API routes with 404', async () => {
    running = await start({});

    const res = await fetch(`${running.baseUrl}/api/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ message: 'Not found' });
  });
});
