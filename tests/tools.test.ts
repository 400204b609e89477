import { describe, it, expect, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema, LoggingMessageNotificationSchema, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { createMcpServer } from '../src/tools.js';
import { binaryResponse, createFakeUpstream, jsonResponse, textResponse, type Route } from './helpers/upstream.js';

const closers: Array<() => Promise<void>> = [];

afterEach(async () => {
  while (closers.length) await closers.pop()?.();
});

async function connect(route: Route) {
  const { client: upstream, calls } = createFakeUpstream(route);
  const server = createMcpServer(upstream);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const mcp = new Client({ name: 'test-client', version: '0.0.0' });
  const logs: string[] = [];
  mcp.setNotificationHandler(LoggingMessageNotificationSchema, notification => {
    logs.push(String(notification.params.data));
  });
  await server.connect(serverTransport);
  await mcp.connect(clientTransport);
  closers.push(() => mcp.close(), () => server.close());

  const call = async (name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> =>
    CallToolResultSchema.parse(await mcp.callTool({ name, arguments: args }));
  return { mcp, call, calls, logs };
}

const textOf = (result: CallToolResult, index = 0) => {
  const block = result.content[index];
  return block?.type === 'text' ? block.text : undefined;
};

describe('tool registry', () => {
  it('exposes the full tool set', async () => {
    const { mcp } = await connect(() => jsonResponse({}));
    const { tools } = await mcp.listTools();
    expect(tools.map(t => t.name).sort()).toEqual([
      'get_english_translations',
      'get_index',
      'get_links',
      'get_manuscript',
      'get_manuscript_info',
      'get_name',
      'get_search_path_filter',
      'get_shape',
      'get_situational_info',
      'get_text',
      'get_topics',
      'search_dictionaries',
      'search_in_book',
      'search_texts'
    ]);
    const manuscript = tools.find(t => t.name === 'get_manuscript');
    expect(Object.keys(manuscript?.outputSchema?.properties ?? {})).toContain('image_data');
  });
});

describe('tool results', () => {
  it('returns the reduced text document and logs the call to the client', async () => {
    const { call, logs } = await connect(() => jsonResponse({ ref: 'Genesis 1:1', heRef: 'בראשית א:א' }));
    const result = await call('get_text', { reference: 'Genesis 1:1' });

    expect(result.isError ?? false).toBe(false);
    expect(JSON.parse(textOf(result) ?? '')).toEqual({ ref: 'Genesis 1:1' });
    expect(logs).toContain('[get_text] called with reference="Genesis 1:1", version_language=undefined');
  });

  it('returns the resolved path for a book', async () => {
    const { call } = await connect(() => textResponse('Tanakh/Torah/Genesis'));
    expect(textOf(await call('get_search_path_filter', { book_name: 'Genesis' }))).toBe('Tanakh/Torah/Genesis');
  });

  it('reports a book that cannot be resolved', async () => {
    const { call, calls } = await connect(() => textResponse(''));
    const result = await call('search_in_book', { query: 'light', book_name: 'Nowhere' });
    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe("Could not find valid filter path for book 'Nowhere'");
    expect(calls).toHaveLength(1);
  });

  it('prefixes upstream status failures with the tool wording', async () => {
    const { call } = await connect(() => textResponse('boom', 500));
    const result = await call('search_texts', { query: 'light' });
    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('Error during search: HTTP 500 from https://sefaria.test/api/search-wrapper/es8: boom');
  });

  it('prefixes transport failures with the API wording', async () => {
    const { call } = await connect(() => {
      throw new Error('socket hang up');
    });
    const result = await call('get_links', { reference: 'Genesis 1:1' });
    expect(textOf(result)).toBe(
      'Error during links API request: Request to https://sefaria.test/api/links/Genesis%201%3A1?with_text=0 failed: socket hang up'
    );
  });

  it('reports unparseable bodies as parse failures', async () => {
    const { call } = await connect(() => textResponse('<html>oops</html>'));
    const result = await call('get_index', { title: 'Genesis' });
    expect(result.isError).toBe(true);
    expect(textOf(result)).toMatch(
      /^Error: Failed to parse JSON response: Could not parse response from https:\/\/sefaria\.test\/api\/v2\/raw\/index\/Genesis: /
    );
  });

  it('returns a manuscript as an image block plus the full result', async () => {
    const bytes = Buffer.from('png bytes');
    const { call } = await connect(() => binaryResponse(bytes, 'image/png'));
    const result = await call('get_manuscript', { image_url: 'https://images.test/ms/folio.png' });
    const expected = {
      success: true,
      image_data: bytes.toString('base64'),
      mime_type: 'image/png',
      size: bytes.length,
      original_size: bytes.length,
      was_resized: false,
      filename: 'folio.png',
      title: 'Manuscript: folio.png',
      source_url: 'https://images.test/ms/folio.png'
    };

    expect(result.content[0]).toEqual({ type: 'image', data: expected.image_data, mimeType: 'image/png' });
    expect(JSON.parse(textOf(result, 1) ?? '')).toEqual(expected);
    expect(result.structuredContent).toEqual(expected);
    expect(Buffer.from(String(result.structuredContent?.image_data), 'base64').equals(bytes)).toBe(true);
  });

  it('returns a failed manuscript download as an error payload', async () => {
    const { call } = await connect(() => textResponse('gone', 410));
    const result = await call('get_manuscript', { image_url: 'https://images.test/ms/folio.png' });
    const expected = {
      success: false,
      error: 'Error downloading manuscript image: HTTP 410 from https://images.test/ms/folio.png: gone'
    };
    expect(result.isError).toBe(true);
    expect(JSON.parse(textOf(result) ?? '')).toEqual(expected);
    expect(result.structuredContent).toEqual(expected);
  });
});
