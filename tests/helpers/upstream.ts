import { Headers, Response, type RequestInit } from 'node-fetch';
import { UpstreamClient, type FetchLike } from '../../src/upstream.js';
import type { Logger, LogLevel } from '../../src/logger.js';

export const TEST_BASE_URL = 'https://sefaria.test';

export interface RecordedCall {
  url: string;
  method: string;
  headers: Headers;
  body?: string;
}

export type Route = (call: RecordedCall, init?: RequestInit) => Response | Promise<Response>;

export const jsonResponse = (data: unknown, status = 200) =>
  new Response(JSON.stringify(data), { status, headers: { 'content-type': 'application/json' } });

export const textResponse = (text: string, status = 200) =>
  new Response(text, { status, headers: { 'content-type': 'text/plain' } });

export const binaryResponse = (bytes: Buffer, contentType?: string) =>
  new Response(bytes, { status: 200, headers: contentType ? { 'content-type': contentType } : {} });

/** In-process stand-in for the Sefaria API: records every request and answers from `route`. */
export function createFakeUpstream(route: Route, timeoutMs = 5000) {
  const calls: RecordedCall[] = [];
  const fetch: FetchLike = async (url, init) => {
    const call: RecordedCall = {
      url,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : undefined
    };
    calls.push(call);
    return route(call, init);
  };
  const client = new UpstreamClient({ baseUrl: TEST_BASE_URL, timeoutMs, userAgent: 'test-agent', fetch });
  return { client, calls };
}

export const requestBody = (call: RecordedCall | undefined): unknown => JSON.parse(call?.body ?? 'null');

export interface RecordingLogger extends Logger {
  records: Array<{ level: LogLevel; message: string }>;
}

export function createRecordingLogger(): RecordingLogger {
  const records: RecordingLogger['records'] = [];
  return {
    records,
    debug: message => records.push({ level: 'debug', message }),
    info: message => records.push({ level: 'info', message }),
    warning: message => records.push({ level: 'warning', message }),
    error: message => records.push({ level: 'error', message })
  };
}
