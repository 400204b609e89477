import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'node:http';
import fetch from 'node-fetch';
import { createApp } from '../src/server.js';
import { createFakeUpstream, jsonResponse } from './helpers/upstream.js';

describe('HTTP host', () => {
  let server: Server;
  let base: string;

  beforeAll(async () => {
    const { client } = createFakeUpstream(() => jsonResponse({ title: 'Genesis', order: [1] }));
    const app = createApp({ client });
    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
  });

  const rpc = (body: unknown) =>
    fetch(`${base}/mcp`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json, text/event-stream' },
      body: JSON.stringify(body)
    });

  it('answers tool calls over stateless Streamable HTTP', async () => {
    const resp = await rpc({
      jsonrpc: '2.0',
      id: 1,
      method: 'tools/call',
      params: { name: 'get_index', arguments: { title: 'Genesis' } }
    });
    expect(resp.status).toBe(200);
    expect(await resp.json()).toMatchObject({
      jsonrpc: '2.0',
      id: 1,
      result: { content: [{ type: 'text', text: JSON.stringify({ title: 'Genesis' }, null, 2) }] }
    });
  });

  it('reports request and tool counts on the health endpoint', async () => {
    const resp = await fetch(`${base}/healthz`);
    expect(await resp.json()).toMatchObject({
      ok: true,
      upstream: 'https://sefaria.test',
      requests: 1,
      errors: 0,
      toolCounts: { get_index: 1 },
      sseSessions: 0
    });
  });

  it('rejects GET on the stateless endpoint', async () => {
    const resp = await fetch(`${base}/mcp`);
    expect(resp.status).toBe(405);
  });

  it('requires a known session for SSE messages', async () => {
    expect((await fetch(`${base}/messages`, { method: 'POST' })).status).toBe(400);
    expect((await fetch(`${base}/messages?sessionId=missing`, { method: 'POST' })).status).toBe(404);
  });
});
