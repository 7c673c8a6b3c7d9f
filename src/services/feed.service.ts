import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { getConfig } from '../config/index.js';
import { createChildLogger } from '../utils/logger.js';
import { FeedError, errorMessage } from '../utils/errors.js';
import { safeFetch } from '../utils/safe-fetch.js';
import type { HostResolver } from '../utils/url-validator.js';
import { PRODUCT_ID_MAX_LENGTH } from '../db/schema.js';
import { feedCacheService, type FeedCacheService } from './feed-cache.service.js';
import type { ParseOutcome, ParsedFeed, ProductRecord } from '../types/project.types.js';

const logger = createChildLogger({ service: 'feed' });

/** Item elements: Atom entries and RSS items */
const ITEM_ELEMENTS = new Set(['entry', 'item']);

const ID_FIELD = 'id';
const IMAGE_FIELD = 'image_link';

/** Prefixes of the document's own vocabulary; any other prefix is an extension such as `g:` */
const DOCUMENT_PREFIXES = new Set(['', 'atom']);

export interface FeedFetchOptions {
  timeoutMs: number;
  maxBytes: number;
  allowedPorts: readonly number[];
  maxRedirects: number;
  resolver?: HostResolver;
}

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  removeNSPrefix: false,
  parseTagValue: false,
  trimValues: true,
  isArray: (name) => ITEM_ELEMENTS.has(localName(name)),
});

function localName(tag: string): string {
  const colon = tag.indexOf(':');
  return colon === -1 ? tag : tag.slice(colon + 1);
}

function prefixOf(tag: string): string {
  const colon = tag.indexOf(':');
  return colon === -1 ? '' : tag.slice(0, colon);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Text content of a parsed element. Repeated elements yield their first text.
 */
function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (Array.isArray(value)) {
    for (const entry of value) {
      const text = textOf(entry);
      if (text) return text;
    }
    return undefined;
  }
  if (isRecord(value)) {
    return textOf(value['#text']);
  }
  return undefined;
}

/**
 * Collect item elements in document order. Items are not searched for nested items.
 */
function collectItems(node: unknown, items: unknown[]): void {
  if (Array.isArray(node)) {
    for (const child of node) {
      collectItems(child, items);
    }
    return;
  }
  if (!isRecord(node)) {
    return;
  }
  for (const [key, value] of Object.entries(node)) {
    if (ITEM_ELEMENTS.has(localName(key))) {
      items.push(...(Array.isArray(value) ? value : [value]));
    } else {
      collectItems(value, items);
    }
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Text of an item field by local name. An extension element (`g:id`) wins
 * over the document's own (`id`, `atom:id`) whatever their order.
 */
function fieldOf(item: Record<string, unknown>, name: string): string | undefined {
  let fallback: string | undefined;
  for (const [key, value] of Object.entries(item)) {
    if (localName(key) !== name) {
      continue;
    }
    const text = textOf(value);
    if (!text) {
      continue;
    }
    if (!DOCUMENT_PREFIXES.has(prefixOf(key))) {
      return text;
    }
    fallback ??= text;
  }
  return fallback;
}

function parseItem(item: unknown, index: number): ParseOutcome {
  if (!isRecord(item)) {
    return { ok: false, index, reason: 'item has no fields' };
  }

  const productId = fieldOf(item, ID_FIELD);
  if (!productId) {
    return { ok: false, index, reason: 'missing product id' };
  }
  if (productId.length > PRODUCT_ID_MAX_LENGTH) {
    return { ok: false, index, reason: `product id longer than ${PRODUCT_ID_MAX_LENGTH} characters` };
  }

  const imageUrl = fieldOf(item, IMAGE_FIELD);
  if (!imageUrl) {
    return { ok: false, index, reason: `missing image link for product ${productId}` };
  }
  if (!isHttpUrl(imageUrl)) {
    return { ok: false, index, reason: `image link for product ${productId} is not an http(s) URL` };
  }

  const attributes: Record<string, string> = {};
  for (const [key, value] of Object.entries(item)) {
    const name = localName(key);
    if (name === ID_FIELD || name === IMAGE_FIELD || typeof value !== 'string' || name in attributes) {
      continue;
    }
    attributes[name] = value;
  }

  return { ok: true, record: { productId, imageUrl, attributes } };
}

/**
 * Parse a feed document into product records. Bad items are skipped with a
 * warning; only a malformed document is an error.
 *
 * @throws FeedError when the document is empty or not well-formed XML
 */
export function parseFeed(xml: string, feedUrl = 'inline'): ParsedFeed {
  if (xml.trim().length === 0) {
    throw new FeedError(feedUrl, 'Feed document is empty');
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new FeedError(feedUrl, `Malformed feed XML at line ${line}: ${msg}`);
  }

  const document: unknown = parser.parse(xml);
  const items: unknown[] = [];
  collectItems(document, items);

  const outcomes = items.map((item, index) => parseItem(item, index));
  const records: ProductRecord[] = [];
  const warnings: string[] = [];

  for (const outcome of outcomes) {
    if (outcome.ok) {
      records.push(outcome.record);
    } else {
      warnings.push(`Item ${outcome.index + 1} skipped: ${outcome.reason}`);
    }
  }

  return { records, warnings, outcomes };
}

/**
 * Feed Service
 * Fetches product feeds through the SSRF checks and parses them
 */
export class FeedService {
  constructor(
    private readonly fetchOptions?: FeedFetchOptions,
    private readonly cache: Pick<FeedCacheService, 'getFirstProduct' | 'setFirstProduct'> = feedCacheService
  ) {}

  private resolveOptions(): FeedFetchOptions {
    if (this.fetchOptions) {
      return this.fetchOptions;
    }
    const { fetch } = getConfig();
    return {
      timeoutMs: fetch.feedTimeoutMs,
      maxBytes: fetch.feedMaxBytes,
      allowedPorts: fetch.allowedPorts,
      maxRedirects: fetch.maxRedirects,
    };
  }

  /**
   * Fetch and parse a feed
   * @throws FeedError on fetch failure, unsafe URL, non-2xx or malformed XML
   */
  async fetchAndParse(feedUrl: string): Promise<ParsedFeed> {
    const options = this.resolveOptions();

    let xml: string;
    try {
      const response = await safeFetch(feedUrl, { kind: 'feed', ...options });
      xml = response.body.toString('utf8');
    } catch (error) {
      logger.warn({ feedUrl, error: errorMessage(error) }, 'Feed fetch failed');
      throw new FeedError(feedUrl, `Feed fetch failed: ${errorMessage(error)}`);
    }

    const parsed = parseFeed(xml, feedUrl);

    logger.info(
      { feedUrl, records: parsed.records.length, skipped: parsed.warnings.length },
      'Feed parsed'
    );

    return parsed;
  }

  /**
   * First valid product of a feed, or null when it has none. Served from the
   * feed cache when it holds one.
   */
  async firstProduct(feedUrl: string): Promise<ProductRecord | null> {
    const cached = await this.cache.getFirstProduct(feedUrl);
    if (cached) {
      return cached;
    }

    const { records } = await this.fetchAndParse(feedUrl);
    const first = records[0] ?? null;
    if (first) {
      await this.cache.setFirstProduct(feedUrl, first);
    }
    return first;
  }
}

export const feedService = new FeedService();
