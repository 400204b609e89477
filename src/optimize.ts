/**
 * Reducers that cut upstream documents down to what a model needs.
 *
 * The upstream schema is not guaranteed, so each reducer checks the shape
 * first and hands anything unexpected back untouched. None of them throw.
 */
import { asString, isJsonObject, type JsonObject, type JsonValue } from './types/json.js';

export const TEXT_FIELDS = [
  'ref', 'versions', 'available_versions', 'requestedRef', 'spanningRefs',
  'textType', 'sectionRef', 'he', 'text', 'primary_title'
] as const;

export const TOPIC_FIELDS = [
  'slug', 'titles', 'description', 'categoryDescription', 'numSources',
  'primaryTitle', 'image', 'good_to_promote'
] as const;

export const INDEX_FIELDS = [
  'title', 'heTitle', 'titleVariants', 'schema', 'categories',
  'sectionNames', 'addressTypes', 'length', 'lengths',
  'textDepth', 'primaryTitle', 'compDate', 'era', 'authors'
] as const;

export const LINK_TEXT_LIMIT = 500;
export const TOPIC_LIST_LIMIT = 10;

function pick(doc: JsonObject, fields: readonly string[]): JsonObject {
  const out: JsonObject = {};
  for (const field of fields) {
    const value = doc[field];
    if (value !== undefined) out[field] = value;
  }
  return out;
}

const mapObjects = (value: JsonValue, fn: (entry: JsonObject) => JsonObject): JsonValue =>
  Array.isArray(value) ? value.filter(isJsonObject).map(fn) : value;

export function optimizeText(doc: JsonValue): JsonValue {
  if (!isJsonObject(doc)) return doc;
  const out = pick(doc, TEXT_FIELDS);
  if (out.versions !== undefined) {
    out.versions = mapObjects(out.versions, v => ({
      text: v.text ?? '',
      versionTitle: v.versionTitle ?? '',
      languageFamilyName: v.languageFamilyName ?? '',
      versionSource: v.versionSource ?? ''
    }));
  }
  if (out.available_versions !== undefined) {
    out.available_versions = mapObjects(out.available_versions, v => ({
      versionTitle: v.versionTitle ?? '',
      languageFamilyName: v.languageFamilyName ?? ''
    }));
  }
  return out;
}

export function truncateText(text: string, limit: number): string {
  return text.length <= limit ? text : `${text.slice(0, limit)}...`;
}

export function optimizeLinks(doc: JsonValue): JsonValue {
  if (!Array.isArray(doc)) return doc;
  return doc.filter(isJsonObject).map(link => {
    const out: JsonObject = {
      ref: asString(link.ref),
      sourceRef: asString(link.sourceRef),
      anchorText: asString(link.anchorText),
      type: asString(link.type),
      category: asString(link.category)
    };
    if (typeof link.text === 'string') out.text = truncateText(link.text, LINK_TEXT_LIMIT);
    return out;
  });
}

export function optimizeTopics(doc: JsonValue): JsonValue {
  if (!isJsonObject(doc)) return doc;
  const out = pick(doc, TOPIC_FIELDS);
  if (Array.isArray(doc.links)) out.links = doc.links.slice(0, TOPIC_LIST_LIMIT);
  if (Array.isArray(doc.refs)) {
    out.refs = doc.refs.slice(0, TOPIC_LIST_LIMIT);
    if (doc.refs.length > TOPIC_LIST_LIMIT) {
      out.refs_note = `Showing first ${TOPIC_LIST_LIMIT} of ${doc.refs.length} total refs`;
    } else if (typeof doc.refs_note === 'string') {
      // already reduced once
      out.refs_note = doc.refs_note;
    }
  }
  return out;
}

export function optimizeIndex(doc: JsonValue): JsonValue {
  if (!isJsonObject(doc)) return doc;
  return pick(doc, INDEX_FIELDS);
}
