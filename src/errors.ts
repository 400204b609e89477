/**
 * Error hierarchy for the Sefaria bridge.
 *
 * Every error carries a stable `code` so the tool boundary can render it for
 * the model after the class identity is gone.
 *
 * ```
 * SefariaMcpError
 *   ├── UpstreamError            (url)
 *   │     ├── TransportError       TRANSPORT_FAILED
 *   │     ├── UpstreamStatusError  UPSTREAM_STATUS (status, excerpt)
 *   │     └── ParseError           PARSE_FAILED
 *   ├── ResolutionError          RESOLUTION_FAILED
 *   ├── TranscodeError           TRANSCODE_FAILED
 *   └── UnknownLexiconError      UNKNOWN_LEXICON
 * ```
 */

export type ErrorCode =
  | 'TRANSPORT_FAILED'
  | 'UPSTREAM_STATUS'
  | 'PARSE_FAILED'
  | 'RESOLUTION_FAILED'
  | 'TRANSCODE_FAILED'
  | 'UNKNOWN_LEXICON';

export class SefariaMcpError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class UpstreamError extends SefariaMcpError {
  readonly url: string;

  constructor(message: string, code: ErrorCode, url: string, options?: { cause?: unknown }) {
    super(message, code, options);
    this.url = url;
  }
}

/** Network unreachable, connection reset or timeout. */
export class TransportError extends UpstreamError {
  constructor(url: string, cause: unknown) {
    super(`Request to ${url} failed: ${errorMessage(cause)}`, 'TRANSPORT_FAILED', url, { cause });
  }
}

export class UpstreamStatusError extends UpstreamError {
  readonly status: number;
  readonly excerpt: string;

  constructor(url: string, status: number, body: string) {
    const excerpt = body.slice(0, 200);
    super(`HTTP ${status} from ${url}${excerpt ? `: ${excerpt}` : ''}`, 'UPSTREAM_STATUS', url);
    this.status = status;
    this.excerpt = excerpt;
  }
}

/** Body was not valid JSON, or JSON of a shape the caller cannot use. */
export class ParseError extends UpstreamError {
  constructor(url: string, detail: string, options?: { cause?: unknown }) {
    super(`Could not parse response from ${url}: ${detail}`, 'PARSE_FAILED', url, options);
  }
}

export class ResolutionError extends SefariaMcpError {
  constructor(message: string) {
    super(message, 'RESOLUTION_FAILED');
  }
}

/** Raised inside the transcoder only; it always falls back to the original bytes. */
export class TranscodeError extends SefariaMcpError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TRANSCODE_FAILED', { cause });
  }
}

export class UnknownLexiconError extends SefariaMcpError {
  readonly path: string;

  constructor(path: string) {
    super(`Search hit from unknown lexicon path '${path}'`, 'UNKNOWN_LEXICON');
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
