import nodeFetch, { type RequestInit, type Response } from 'node-fetch';
import http from 'node:http';
import https from 'node:https';
import { Buffer } from 'node:buffer';
import { ParseError, TransportError, UpstreamError, UpstreamStatusError } from './errors.js';
import { jsonSchema, type JsonValue } from './types/json.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface UpstreamClientOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent?: string;
  fetch?: FetchLike;
}

export type QueryInit = URLSearchParams | Record<string, string | number | undefined>;

export interface BinaryPayload {
  bytes: Buffer;
  contentType: string | null;
}

const httpAgent = new http.Agent({ keepAlive: true, maxSockets: 50 });
const httpsAgent = new https.Agent({ keepAlive: true, maxSockets: 50 });

/** Percent-encodes one user-supplied path segment (a ref, title, slug or name). */
export const encodeSegment = (segment: string) => encodeURIComponent(segment);

function toSearchParams(query: QueryInit): URLSearchParams {
  if (query instanceof URLSearchParams) return query;
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) params.append(key, String(value));
  }
  return params;
}

/**
 * Thin GET/POST client over the Sefaria API.
 *
 * Raises {@link TransportError}, {@link UpstreamStatusError} or
 * {@link ParseError}; it never retries.
 */
export class UpstreamClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string | undefined;
  private readonly fetchImpl: FetchLike;

  constructor(options: UpstreamClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.userAgent = options.userAgent;
    this.fetchImpl = options.fetch ?? nodeFetch;
  }

  urlFor(path: string, query?: QueryInit): string {
    const base = `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
    const qs = query ? toSearchParams(query).toString() : '';
    return qs ? `${base}?${qs}` : base;
  }

  async fetchJson(path: string, query?: QueryInit): Promise<JsonValue> {
    const url = this.urlFor(path, query);
    const text = await this.request(url, { method: 'GET', headers: { Accept: 'application/json' } }, this.timeoutMs, resp => resp.text());
    return this.parseJson(url, text);
  }

  async postJson(path: string, body: JsonValue): Promise<JsonValue> {
    const url = this.urlFor(path);
    const text = await this.request(
      url,
      { method: 'POST', headers: { 'Content-Type': 'application/json', Accept: 'application/json' }, body: JSON.stringify(body) },
      this.timeoutMs,
      resp => resp.text()
    );
    return this.parseJson(url, text);
  }

  async fetchText(path: string): Promise<string> {
    const url = this.urlFor(path);
    return this.request(url, { method: 'GET' }, this.timeoutMs, resp => resp.text());
  }

  /** Downloads an absolute URL (not relative to the base URL). */
  async fetchBinary(url: string, timeoutMs: number): Promise<BinaryPayload> {
    return this.request(url, { method: 'GET' }, timeoutMs, async resp => ({
      bytes: Buffer.from(await resp.arrayBuffer()),
      contentType: resp.headers.get('content-type')
    }));
  }

  private async request<T>(
    url: string,
    req: { method: 'GET' | 'POST'; headers?: Record<string, string>; body?: string },
    timeoutMs: number,
    read: (resp: Response) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const headers: Record<string, string> = { ...req.headers };
    if (this.userAgent) headers['User-Agent'] = this.userAgent;
    try {
      const resp = await this.fetchImpl(url, {
        method: req.method,
        headers,
        body: req.body,
        agent: parsed => (parsed.protocol === 'http:' ? httpAgent : httpsAgent),
        signal: controller.signal
      });
      if (!resp.ok) {
        const text = await resp.text().catch(() => '');
        throw new UpstreamStatusError(url, resp.status, text);
      }
      return await read(resp);
    } catch (err) {
      if (err instanceof UpstreamError) throw err;
      throw new TransportError(url, controller.signal.aborted ? new Error(`timed out after ${timeoutMs} ms`) : err);
    } finally {
      clearTimeout(timer);
    }
  }

  private parseJson(url: string, text: string): JsonValue {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ParseError(url, err instanceof Error ? err.message : 'invalid JSON', { cause: err });
    }
    const parsed = jsonSchema.safeParse(raw);
    if (!parsed.success) throw new ParseError(url, 'not a JSON document');
    return parsed.data;
  }
}
