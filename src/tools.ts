import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult, ServerNotification } from '@modelcontextprotocol/sdk/types.js';
import { Buffer } from 'node:buffer';
import { z } from 'zod';
import { ParseError, ResolutionError, errorMessage } from './errors.js';
import {
  getEnglishTranslations,
  getIndex,
  getLinks,
  getManuscriptInfo,
  getName,
  getShape,
  getSituationalInfo,
  getText,
  getTopics
} from './library.js';
import { ensureLogger, mcpLogCallback, type Logger } from './logger.js';
import { fetchManuscript, type ManuscriptResult } from './manuscript.js';
import { getSearchPathFilter, searchDictionaries, searchInBook, searchTexts } from './search.js';
import { toJsonText } from './types/json.js';
import type { UpstreamClient } from './upstream.js';

export const SERVER_INFO = { name: 'sefaria-library-mcp', version: '0.1.0' } as const;

type RequestContext = { sendNotification: (notification: ServerNotification) => Promise<void> };

interface FailureWording {
  /** Prefix for transport and status failures, and anything unexpected. */
  request: string;
  /** Prefix when the upstream body could not be parsed. */
  parse?: string;
}

const API_FAILURE = (api: string): FailureWording => ({
  request: `Error during ${api} API request`,
  parse: 'Error: Failed to parse JSON response'
});

export const payloadSize = (payload: string | object) =>
  Buffer.byteLength(typeof payload === 'string' ? payload : JSON.stringify(payload), 'utf8');

const textResult = (text: string, isError = false): CallToolResult => ({
  content: [{ type: 'text', text }],
  ...(isError ? { isError: true } : {})
});

const describeArgs = (args: Record<string, unknown>) =>
  Object.entries(args)
    .map(([key, value]) => `${key}=${JSON.stringify(value) ?? 'undefined'}`)
    .join(', ');

/**
 * Runs one tool body and turns every failure into text for the model.
 * Nothing thrown here reaches the SDK.
 */
async function runTool(
  name: string,
  args: Record<string, unknown>,
  extra: RequestContext,
  wording: FailureWording,
  body: (logger: Logger) => Promise<string>
): Promise<CallToolResult> {
  const logger = ensureLogger(mcpLogCallback(extra, name));
  logger.info(`[${name}] called with ${describeArgs(args)}`);
  let result: CallToolResult;
  try {
    result = textResult(await body(logger));
  } catch (err) {
    logger.error(`[${name}] failed: ${errorMessage(err)}`);
    if (err instanceof ResolutionError) result = textResult(err.message, true);
    else if (err instanceof ParseError && wording.parse) result = textResult(`${wording.parse}: ${err.message}`, true);
    else result = textResult(`${wording.request}: ${errorMessage(err)}`, true);
  }
  const first = result.content[0];
  logger.info(`[${name}] response size: ${payloadSize(first?.type === 'text' ? first.text : result)} bytes`);
  return result;
}

// Optional fields: one shape covers both the asset and the download error.
const manuscriptOutputShape = {
  success: z.boolean(),
  image_data: z.string().optional(),
  mime_type: z.string().optional(),
  size: z.number().int().optional(),
  original_size: z.number().int().optional(),
  was_resized: z.boolean().optional(),
  filename: z.string().optional(),
  title: z.string().optional(),
  source_url: z.string().optional(),
  error: z.string().optional()
};

function manuscriptResult(result: ManuscriptResult): CallToolResult {
  const structuredContent = { ...result };
  if (!result.success) return { ...textResult(toJsonText(result), true), structuredContent };
  return {
    content: [
      { type: 'image', data: result.image_data, mimeType: result.mime_type },
      { type: 'text', text: toJsonText(result) }
    ],
    structuredContent
  };
}

const referenceParam = z.string().min(1).describe("Specific text reference, e.g. 'Genesis 1:1' or 'Berakhot 2a'");
const sizeParam = z.number().int().min(1).max(100).optional().describe('Maximum number of results to return (default 10)');

export function registerTools(server: McpServer, client: UpstreamClient): void {
  server.registerTool(
    'get_text',
    {
      title: 'Get Text',
      description: 'Retrieve the text of a specific reference in the Jewish library, with its available versions.',
      inputSchema: {
        reference: referenceParam,
        version_language: z
          .enum(['source', 'english', 'both'])
          .optional()
          .describe("'source' for the original language, 'english', 'both', or omit for all versions")
      }
    },
    async ({ reference, version_language }, extra) =>
      runTool('get_text', { reference, version_language }, extra, { request: 'Error fetching text', parse: 'Error parsing response' },
        logger => getText(client, logger, reference, version_language))
  );

  server.registerTool(
    'get_english_translations',
    {
      title: 'English Translations',
      description: 'Retrieve every available English translation of a reference (version title and text only).',
      inputSchema: { reference: referenceParam }
    },
    async ({ reference }, extra) =>
      runTool('get_english_translations', { reference }, extra, { request: 'Error fetching translations', parse: 'Error parsing response' },
        logger => getEnglishTranslations(client, logger, reference))
  );

  server.registerTool(
    'get_index',
    {
      title: 'Index',
      description: 'Retrieve the bibliographic and structural record of a work (titles, categories, structure, authors, dates).',
      inputSchema: { title: z.string().min(1).describe("Title of the work, e.g. 'Genesis' or 'Mishnah Berakhot'") }
    },
    async ({ title }, extra) =>
      runTool('get_index', { title }, extra, API_FAILURE('index'), logger => getIndex(client, logger, title))
  );

  server.registerTool(
    'get_links',
    {
      title: 'Links',
      description: 'List cross-references and commentaries connected to a passage.',
      inputSchema: {
        reference: z.string().describe("Specific text reference, e.g. 'Genesis 1:1'"),
        with_text: z.enum(['0', '1']).optional().describe("'1' to include the linked text (truncated), '0' to omit it")
      }
    },
    async ({ reference, with_text }, extra) =>
      runTool('get_links', { reference, with_text }, extra, API_FAILURE('links'),
        logger => getLinks(client, logger, reference, with_text))
  );

  server.registerTool(
    'get_name',
    {
      title: 'Name Lookup',
      description: 'Validate and autocomplete text names, book titles, references and topic slugs.',
      inputSchema: {
        name: z.string().min(1).describe('Partial or complete name'),
        limit: z.number().int().min(0).optional().describe('Maximum number of suggestions (0 for no limit)'),
        type_filter: z.string().optional().describe("Restrict results to one type, e.g. 'ref' or 'Topic'")
      }
    },
    async ({ name, limit, type_filter }, extra) =>
      runTool('get_name', { name, limit, type_filter }, extra, API_FAILURE('name'),
        logger => getName(client, logger, name, limit, type_filter))
  );

  server.registerTool(
    'get_shape',
    {
      title: 'Shape',
      description: 'Retrieve the structure of a text, or the list of texts in a category such as Tanakh or Mishnah.',
      inputSchema: { name: z.string().min(1).describe('Text title or category name') }
    },
    async ({ name }, extra) =>
      runTool('get_shape', { name }, extra, API_FAILURE('shape'), logger => getShape(client, logger, name))
  );

  server.registerTool(
    'get_topics',
    {
      title: 'Topics',
      description: 'Retrieve a topic with its description and, optionally, its first related topics and tagged references.',
      inputSchema: {
        topic_slug: z.string().describe("Topic slug, e.g. 'moses' or 'sabbath'"),
        with_links: z.boolean().optional().describe('Include links to related topics'),
        with_refs: z.boolean().optional().describe('Include references tagged with the topic')
      }
    },
    async ({ topic_slug, with_links, with_refs }, extra) =>
      runTool('get_topics', { topic_slug, with_links, with_refs }, extra, API_FAILURE('topics'),
        logger => getTopics(client, logger, topic_slug, with_links, with_refs))
  );

  server.registerTool(
    'get_manuscript_info',
    {
      title: 'Manuscript Info',
      description: 'List historical manuscripts for a passage, with their image URLs.',
      inputSchema: { reference: referenceParam }
    },
    async ({ reference }, extra) =>
      runTool('get_manuscript_info', { reference }, extra, API_FAILURE('manuscripts'),
        logger => getManuscriptInfo(client, logger, reference))
  );

  server.registerTool(
    'search_texts',
    {
      title: 'Search Texts',
      description:
        'Full-text search across the library. Filters are category paths such as "Tanakh/Torah" or "Talmud/Bavli"; ' +
        'when they yield nothing the search is repeated without them and the results say so.',
      inputSchema: {
        query: z.string().min(1).describe('Search terms'),
        filters: z.union([z.string(), z.array(z.string())]).optional().describe('Category path or paths limiting the search'),
        size: sizeParam
      }
    },
    async ({ query, filters, size }, extra) =>
      runTool('search_texts', { query, filters, size }, extra, { request: 'Error during search' },
        async logger => toJsonText(await searchTexts(client, logger, query, filters, size)))
  );

  server.registerTool(
    'search_in_book',
    {
      title: 'Search in Book',
      description: 'Search within one book, e.g. "Genesis" or "Bereishit Rabbah".',
      inputSchema: {
        query: z.string().min(1).describe('Search terms'),
        book_name: z.string().min(1).describe('Exact name of the book'),
        size: sizeParam
      }
    },
    async ({ query, book_name, size }, extra) =>
      runTool('search_in_book', { query, book_name, size }, extra, { request: 'Error during book search' },
        async logger => toJsonText(await searchInBook(client, logger, query, book_name, size)))
  );

  server.registerTool(
    'search_dictionaries',
    {
      title: 'Search Dictionaries',
      description: 'Search the reference dictionaries (Jastrow, Klein, BDB, BDB Aramaic, Kovetz Yesodot VaChakirot).',
      inputSchema: { query: z.string().min(1).describe('Hebrew, Aramaic or English term') }
    },
    async ({ query }, extra) =>
      runTool('search_dictionaries', { query }, extra, { request: 'Error during dictionary search' },
        async logger => toJsonText(await searchDictionaries(client, logger, query)))
  );

  server.registerTool(
    'get_search_path_filter',
    {
      title: 'Search Path Filter',
      description: 'Convert a book name into the category path used as a search filter.',
      inputSchema: { book_name: z.string().min(1).describe('Name of the book') }
    },
    async ({ book_name }, extra) =>
      runTool('get_search_path_filter', { book_name }, extra, { request: 'Error during search path filter request' },
        async logger => {
          const path = await getSearchPathFilter(client, logger, book_name);
          if (path === null) throw new ResolutionError(`Could not find valid filter path for book '${book_name}'`);
          return path;
        })
  );

  server.registerTool(
    'get_manuscript',
    {
      title: 'Manuscript Image',
      description: 'Download a manuscript image by URL; images over 1 MB are scaled down to fit.',
      inputSchema: {
        image_url: z.string().url().describe('Image URL, usually taken from get_manuscript_info'),
        manuscript_title: z.string().optional().describe('Title to display with the image')
      },
      outputSchema: manuscriptOutputShape
    },
    async ({ image_url, manuscript_title }, extra) => {
      const logger = ensureLogger(mcpLogCallback(extra, 'get_manuscript'));
      logger.info(`[get_manuscript] called with ${describeArgs({ image_url, manuscript_title })}`);
      const result = await fetchManuscript(client, logger, image_url, manuscript_title);
      logger.info(`[get_manuscript] response size: ${payloadSize(result)} bytes`);
      return manuscriptResult(result);
    }
  );

  server.registerTool(
    'get_situational_info',
    {
      title: 'Situational Info',
      description: "Today's Hebrew date, the weekly parasha and the daily learning schedule."
    },
    async extra =>
      runTool('get_situational_info', {}, extra, { request: 'Error retrieving situational information' },
        logger => getSituationalInfo(client, logger))
  );
}

export function createMcpServer(client: UpstreamClient): McpServer {
  const server = new McpServer(SERVER_INFO, { capabilities: { logging: {} } });
  registerTools(server, client);
  return server;
}

