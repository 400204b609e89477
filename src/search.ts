import { z } from 'zod';
import { config } from './config.js';
import { ResolutionError, UnknownLexiconError, UpstreamError, ParseError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { jsonSchema, type JsonValue } from './types/json.js';
import { encodeSegment, type UpstreamClient } from './upstream.js';

export const FILTER_CORRECTION = 'Removed filters due to no results';
export const SNIPPET_LIMIT = 300;
export const HIGHLIGHT_SEPARATOR = ' [...] ';

/** Internal lexicon category path → display name. Filters and lookups share this table. */
export const LEXICONS: ReadonlyMap<string, string> = new Map([
  ['Reference/Dictionary/Jastrow', 'Jastrow Dictionary'],
  ['Reference/Dictionary/Klein Dictionary', 'Klein Dictionary'],
  ['Reference/Dictionary/BDB', 'BDB Dictionary'],
  ['Reference/Dictionary/BDB Aramaic', 'BDB Aramaic Dictionary'],
  ['Reference/Encyclopedic Works/Kovetz Yesodot VaChakirot', 'Kovetz Yesodot VaChakirot']
]);

export const LEXICON_FILTERS: readonly string[] = Object.freeze([...LEXICONS.keys()]);

export type SearchFilters = string | string[] | null | undefined;

export interface SearchResult {
  ref: string;
  categories: JsonValue;
  text_snippet: string;
  original_filter?: string | string[];
  filter_correction?: string;
}

export interface DictionaryEntry {
  ref: string;
  headword: string;
  lexicon_name: string;
  text: string;
}

const hitSchema = z.object({
  _source: z.record(jsonSchema),
  highlight: z.record(z.array(z.string())).optional()
});

const searchResponseSchema = z.object({
  hits: z
    .object({
      hits: z.array(hitSchema).default([]),
      total: z.union([z.number(), z.object({ value: z.number() })]).optional()
    })
    .optional()
});

export type SearchHit = z.infer<typeof hitSchema>;

export const normalizeFilters = (filters: SearchFilters): string[] =>
  Array.isArray(filters) ? filters : filters ? [filters] : [];

export function buildSearchPayload(query: string, filters: string[], size: number): JsonValue {
  return {
    aggs: [],
    field: 'naive_lemmatizer',
    filter_fields: filters.map(() => null),
    filters,
    query,
    size,
    slop: 10,
    sort_fields: ['pagesheetrank'],
    sort_method: 'score',
    sort_reverse: false,
    sort_score_missing: 0.04,
    source_proj: true,
    type: 'text'
  };
}

/** One POST to the search wrapper. Throws on transport, status or shape errors. */
export async function runSearch(
  client: UpstreamClient,
  logger: Logger,
  query: string,
  filters: string[],
  size: number
): Promise<SearchHit[]> {
  const path = `api/search-wrapper/${config.search.engine}`;
  const data = await client.postJson(path, buildSearchPayload(query, filters, size));
  const parsed = searchResponseSchema.safeParse(data);
  if (!parsed.success) {
    logger.error(`Unexpected search response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    throw new ParseError(client.urlFor(path), 'unexpected search response shape');
  }
  const hits = parsed.data.hits?.hits ?? [];
  logger.debug(`Search for '${query}' with ${filters.length} filter(s) returned ${hits.length} hit(s)`);
  return hits;
}

export function snippetFor(hit: SearchHit): string {
  for (const fragments of Object.values(hit.highlight ?? {})) {
    if (fragments.length > 0) return fragments.join(HIGHLIGHT_SEPARATOR);
  }
  for (const field of ['naive_lemmatizer', 'exact']) {
    const content = hit._source[field];
    if (typeof content === 'string' && content) {
      return content.length > SNIPPET_LIMIT ? `${content.slice(0, SNIPPET_LIMIT)}...` : content;
    }
  }
  return '';
}

/**
 * Full-text search. When filters produce nothing, the search is repeated once
 * without them and every result records the correction.
 */
export async function searchTexts(
  client: UpstreamClient,
  logger: Logger,
  query: string,
  filters?: SearchFilters,
  size: number = config.search.defaultSize
): Promise<SearchResult[]> {
  const filterList = normalizeFilters(filters);
  let hits = await runSearch(client, logger, query, filterList, size);
  let corrected = false;

  if (hits.length === 0 && filterList.length > 0) {
    logger.info('No results with filters. Attempting search without filters.');
    hits = await runSearch(client, logger, query, [], size);
    corrected = true;
  }

  const results = hits.slice(0, size).map(hit => {
    const result: SearchResult = {
      ref: typeof hit._source.ref === 'string' ? hit._source.ref : '',
      categories: hit._source.categories ?? [],
      text_snippet: snippetFor(hit)
    };
    if (corrected && filters) {
      result.original_filter = filters;
      result.filter_correction = FILTER_CORRECTION;
    }
    return result;
  });

  if (results.length === 0) logger.debug(`No results found for '${query}'`);
  return results;
}

/** Resolves a book name to its search filter path; null when the API has none. */
export async function getSearchPathFilter(
  client: UpstreamClient,
  logger: Logger,
  bookName: string
): Promise<string | null> {
  try {
    const path = (await client.fetchText(`api/search-path-filter/${encodeSegment(bookName)}`)).trim();
    logger.debug(`Search path filter for '${bookName}': ${path}`);
    return path || null;
  } catch (err) {
    if (!(err instanceof UpstreamError)) throw err;
    logger.error(`Error during search path filter API request: ${errorMessage(err)}`);
    return null;
  }
}

export async function searchInBook(
  client: UpstreamClient,
  logger: Logger,
  query: string,
  bookName: string,
  size: number = config.search.defaultSize
): Promise<SearchResult[]> {
  const filterPath = await getSearchPathFilter(client, logger, bookName);
  if (!filterPath) throw new ResolutionError(`Could not find valid filter path for book '${bookName}'`);
  return searchTexts(client, logger, query, [filterPath], size);
}

/** Searches only the fixed lexicons; never widens to the whole library. */
export async function searchDictionaries(
  client: UpstreamClient,
  logger: Logger,
  query: string
): Promise<DictionaryEntry[]> {
  const hits = await runSearch(client, logger, query, [...LEXICON_FILTERS], config.search.dictionarySize);
  const entries = hits.map(({ _source: source }) => {
    const path = typeof source.path === 'string' ? source.path : '';
    const lexiconName = LEXICONS.get(path);
    if (lexiconName === undefined) throw new UnknownLexiconError(path);
    const variants = source.titleVariants;
    const headword = Array.isArray(variants) && typeof variants[0] === 'string' ? variants[0] : '';
    return {
      ref: typeof source.ref === 'string' ? source.ref : '',
      headword,
      lexicon_name: lexiconName,
      text: typeof source.exact === 'string' ? source.exact : ''
    };
  });
  logger.debug(`Dictionary search results count: ${entries.length}`);
  return entries;
}
