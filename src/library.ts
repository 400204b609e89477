import { HDate } from '@hebcal/core';
import { UpstreamError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { optimizeIndex, optimizeLinks, optimizeText, optimizeTopics } from './optimize.js';
import { isJsonObject, toJsonText, type JsonObject, type JsonValue } from './types/json.js';
import { encodeSegment, type UpstreamClient } from './upstream.js';

export type VersionLanguage = 'source' | 'english' | 'both';

const VERSION_PARAMS: Record<VersionLanguage, string[]> = {
  source: ['source'],
  english: ['english'],
  both: ['english', 'source']
};

export async function getText(
  client: UpstreamClient,
  logger: Logger,
  reference: string,
  versionLanguage?: VersionLanguage
): Promise<string> {
  const query = new URLSearchParams();
  for (const version of versionLanguage ? VERSION_PARAMS[versionLanguage] : []) query.append('version', version);
  logger.debug(`Text API request URL: ${client.urlFor(`api/v3/texts/${encodeSegment(reference)}`, query)}`);
  const data = await client.fetchJson(`api/v3/texts/${encodeSegment(reference)}`, query);
  return toJsonText(optimizeText(data));
}

export async function getEnglishTranslations(client: UpstreamClient, logger: Logger, reference: string): Promise<string> {
  const path = `api/v3/texts/${encodeSegment(reference)}`;
  const query = { version: 'english|all' };
  logger.debug(`English translations API request URL: ${client.urlFor(path, query)}`);
  const data = await client.fetchJson(path, query);
  const versions = isJsonObject(data) && Array.isArray(data.versions) ? data.versions : [];
  const englishTranslations = versions.filter(isJsonObject).map(version => ({
    versionTitle: version.versionTitle ?? '',
    text: version.text ?? ''
  }));
  return toJsonText({ reference, englishTranslations });
}

export async function getIndex(client: UpstreamClient, logger: Logger, title: string): Promise<string> {
  const path = `api/v2/raw/index/${encodeSegment(title)}`;
  logger.debug(`Index API request URL: ${client.urlFor(path)}`);
  return toJsonText(optimizeIndex(await client.fetchJson(path)));
}

export async function getLinks(
  client: UpstreamClient,
  logger: Logger,
  reference: string,
  withText: '0' | '1' = '0'
): Promise<string> {
  if (!reference) return 'No reference provided';
  const path = `api/links/${encodeSegment(reference)}`;
  const query = { with_text: withText };
  logger.debug(`Links API request URL: ${client.urlFor(path, query)}`);
  return toJsonText(optimizeLinks(await client.fetchJson(path, query)));
}

export async function getName(
  client: UpstreamClient,
  logger: Logger,
  name: string,
  limit?: number,
  typeFilter?: string
): Promise<string> {
  const path = `api/name/${encodeSegment(name)}`;
  const query = { limit, type: typeFilter };
  logger.debug(`Name API request URL: ${client.urlFor(path, query)}`);
  return toJsonText(await client.fetchJson(path, query));
}

export async function getShape(client: UpstreamClient, logger: Logger, name: string): Promise<string> {
  const path = `api/shape/${encodeSegment(name)}`;
  logger.debug(`Shape API request URL: ${client.urlFor(path)}`);
  return toJsonText(await client.fetchJson(path));
}

export async function getTopics(
  client: UpstreamClient,
  logger: Logger,
  topicSlug: string,
  withLinks = false,
  withRefs = false
): Promise<string> {
  if (!topicSlug) return 'No topic slug provided';
  const path = `api/v2/topics/${encodeSegment(topicSlug)}`;
  const query = { with_links: withLinks ? 1 : undefined, with_refs: withRefs ? 1 : undefined };
  logger.debug(`Topics API request URL: ${client.urlFor(path, query)}`);
  return toJsonText(optimizeTopics(await client.fetchJson(path, query)));
}

const isEmptyDocument = (data: JsonValue) =>
  data === null || data === '' ||
  (Array.isArray(data) && data.length === 0) ||
  (isJsonObject(data) && Object.keys(data).length === 0);

export async function getManuscriptInfo(client: UpstreamClient, logger: Logger, reference: string): Promise<string> {
  const path = `api/manuscripts/${encodeSegment(reference)}`;
  logger.debug(`Manuscripts API request URL: ${client.urlFor(path)}`);
  const data = await client.fetchJson(path);
  if (isEmptyDocument(data)) return `No manuscripts found for reference '${reference}'`;
  return toJsonText(data);
}

export interface Parasha {
  ref: string;
  name: string;
}

/** Picks the weekly portion out of the calendars payload. */
export function findParasha(calendar: JsonValue): Parasha | null {
  if (!isJsonObject(calendar) || !Array.isArray(calendar.calendar_items)) return null;
  for (const item of calendar.calendar_items) {
    if (!isJsonObject(item) || !isJsonObject(item.title) || item.title.en !== 'Parashat Hashavua') continue;
    const display = isJsonObject(item.displayValue) ? item.displayValue.en : undefined;
    return {
      ref: typeof item.ref === 'string' ? item.ref : '',
      name: typeof display === 'string' ? display : ''
    };
  }
  return null;
}

/**
 * Hebrew date plus the upstream calendar of daily and weekly learning.
 * The date follows the server clock, which may be a day off for the user.
 */
export async function getSituationalInfo(client: UpstreamClient, logger: Logger, now: Date = new Date()): Promise<string> {
  const hebrewDate = new HDate(now).toString();
  let calendar: JsonValue;
  try {
    calendar = await client.fetchJson('api/calendars');
  } catch (err) {
    if (!(err instanceof UpstreamError)) throw err;
    logger.error(`Could not retrieve calendar data: ${errorMessage(err)}`);
    return toJsonText({ error: 'Could not retrieve calendar data from Sefaria', 'Hebrew Date': hebrewDate });
  }
  if (!isJsonObject(calendar)) {
    return toJsonText({ error: 'Could not retrieve calendar data from Sefaria', 'Hebrew Date': hebrewDate });
  }
  const out: JsonObject = { ...calendar, 'Hebrew Date': hebrewDate };
  const parasha = findParasha(calendar);
  if (parasha) out.parasha = { ref: parasha.ref, name: parasha.name };
  else logger.debug('Calendar has no Parashat Hashavua item');
  return toJsonText(out);
}
