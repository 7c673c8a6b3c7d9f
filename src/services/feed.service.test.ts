import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { FeedService, parseFeed } from './feed.service.js';
import { FeedError } from '../utils/errors.js';

const mockFetch = vi.fn();
global.fetch = mockFetch;

const ATOM_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom" xmlns:g="http://base.google.com/ns/1.0">
  <title>Test Shop</title>
  <entry>
    <g:id>SKU-1</g:id>
    <title>Red Mug</title>
    <g:image_link>https://cdn.example.com/sku-1.jpg</g:image_link>
    <g:price>9.99 USD</g:price>
  </entry>
  <entry>
    <title>No id here</title>
    <g:image_link>https://cdn.example.com/orphan.jpg</g:image_link>
  </entry>
  <entry>
    <g:id>SKU-3</g:id>
    <g:image_link>   </g:image_link>
  </entry>
  <entry>
    <g:id>SKU-4</g:id>
    <g:image_link>ftp://cdn.example.com/sku-4.jpg</g:image_link>
  </entry>
  <entry>
    <g:id>  SKU-5  </g:id>
    <g:image_link>http://cdn.example.com/sku-5.png</g:image_link>
    <unknown><nested>ignored</nested></unknown>
  </entry>
</feed>`;

const RSS_FEED = `<?xml version="1.0"?>
<rss version="2.0" xmlns:g="http://base.google.com/ns/1.0">
  <channel>
    <title>Test Shop</title>
    <item>
      <g:id>A</g:id>
      <g:image_link>https://cdn.example.com/a.jpg</g:image_link>
    </item>
    <item>
      <g:id>B</g:id>
      <g:image_link>https://cdn.example.com/b.jpg</g:image_link>
    </item>
    <item>
      <g:id>A</g:id>
      <g:image_link>https://cdn.example.com/a-v2.jpg</g:image_link>
    </item>
  </channel>
</rss>`;

const resolver = async () => ['93.184.216.34'];

const service = new FeedService({
  timeoutMs: 1000,
  maxBytes: 1024 * 1024,
  allowedPorts: [80, 443],
  maxRedirects: 3,
  resolver,
});

function feedResponse(body: string, status = 200): Response {
  return new Response(body, {
    status,
    headers: { 'content-type': 'application/atom+xml; charset=utf-8' },
  });
}

describe('parseFeed', () => {
  it('should parse Atom entries with namespaced fields', () => {
    const { records } = parseFeed(ATOM_FEED);

    expect(records[0]).toEqual({
      productId: 'SKU-1',
      imageUrl: 'https://cdn.example.com/sku-1.jpg',
      attributes: { title: 'Red Mug', price: '9.99 USD' },
    });
  });

  it('should skip bad items with a warning and keep going', () => {
    const { records, warnings, outcomes } = parseFeed(ATOM_FEED);

    expect(records.map((record) => record.productId)).toEqual(['SKU-1', 'SKU-5']);
    expect(warnings).toEqual([
      'Item 2 skipped: missing product id',
      'Item 3 skipped: missing image link for product SKU-3',
      'Item 4 skipped: image link for product SKU-4 is not an http(s) URL',
    ]);
    expect(outcomes).toHaveLength(5);
    expect(outcomes[1]).toEqual({ ok: false, index: 1, reason: 'missing product id' });
  });

  it('should trim values and ignore unknown nested elements', () => {
    const { records } = parseFeed(ATOM_FEED);

    expect(records[1]).toEqual({
      productId: 'SKU-5',
      imageUrl: 'http://cdn.example.com/sku-5.png',
      attributes: {},
    });
  });

  it('should parse RSS items in document order and keep duplicate ids', () => {
    const { records, warnings } = parseFeed(RSS_FEED);

    expect(records.map((record) => `${record.productId}:${record.imageUrl}`)).toEqual([
      'A:https://cdn.example.com/a.jpg',
      'B:https://cdn.example.com/b.jpg',
      'A:https://cdn.example.com/a-v2.jpg',
    ]);
    expect(warnings).toEqual([]);
  });

  it('should treat a single item as a list', () => {
    const { records } = parseFeed(
      '<feed><entry><id>only</id><image_link>https://cdn.example.com/o.jpg</image_link></entry></feed>'
    );

    expect(records).toHaveLength(1);
    expect(records[0].productId).toBe('only');
  });

  it('should return no records for a well-formed feed without items', () => {
    const result = parseFeed('<feed><title>Empty</title></feed>');

    expect(result).toEqual({ records: [], warnings: [], outcomes: [] });
  });

  it('should reject malformed XML', () => {
    expect(() => parseFeed('<feed><entry></feed>')).toThrow(FeedError);
    expect(() => parseFeed('<feed><entry></feed>')).toThrow(/^Malformed feed XML at line 1/);
  });

  it('should reject an empty document', () => {
    expect(() => parseFeed('   ')).toThrow('Feed document is empty');
  });

  it('should skip a product id too long to store', () => {
    const image = '<g:image_link>https://cdn.example.com/z.jpg</g:image_link>';
    const { records, warnings } = parseFeed(
      `<feed xmlns:g="http://base.google.com/ns/1.0">` +
        `<entry><g:id>${'z'.repeat(300)}</g:id>${image}</entry>` +
        `<entry><g:id>${'y'.repeat(255)}</g:id>${image}</entry>` +
        `</feed>`
    );

    expect(records.map((record) => record.productId)).toEqual(['y'.repeat(255)]);
    expect(warnings).toEqual(['Item 1 skipped: product id longer than 255 characters']);
  });

  it('should prefer the extension id over the Atom id in either order', () => {
    const { records } = parseFeed(`<feed xmlns="http://www.w3.org/2005/Atom" xmlns:g="http://base.google.com/ns/1.0">
      <entry>
        <id>tag:shop,2024:1</id>
        <g:id>SKU1</g:id>
        <g:image_link>https://cdn.example.com/1.jpg</g:image_link>
      </entry>
      <entry>
        <g:id>SKU2</g:id>
        <id>tag:shop,2024:2</id>
        <g:image_link>https://cdn.example.com/2.jpg</g:image_link>
      </entry>
    </feed>`);

    expect(records).toEqual([
      { productId: 'SKU1', imageUrl: 'https://cdn.example.com/1.jpg', attributes: {} },
      { productId: 'SKU2', imageUrl: 'https://cdn.example.com/2.jpg', attributes: {} },
    ]);
  });
});

describe('FeedService', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  describe('fetchAndParse', () => {
    it('should fetch and parse a feed', async () => {
      mockFetch.mockResolvedValueOnce(feedResponse(RSS_FEED));

      const result = await service.fetchAndParse('https://shop.example.com/feed.xml');

      expect(result.records).toHaveLength(3);
      expect(String(mockFetch.mock.calls[0][0])).toBe('https://shop.example.com/feed.xml');
    });

    it('should raise FeedError on a non-2xx response', async () => {
      mockFetch.mockResolvedValueOnce(feedResponse('oops', 500));

      const promise = service.fetchAndParse('https://shop.example.com/feed.xml');

      await expect(promise).rejects.toBeInstanceOf(FeedError);
      await expect(promise).rejects.toThrow(
        'Feed fetch failed: HTTP 500 fetching https://shop.example.com/feed.xml'
      );
    });

    it('should raise FeedError for a feed URL on a private address', async () => {
      await expect(service.fetchAndParse('http://10.1.2.3/feed.xml')).rejects.toThrow(
        'Feed fetch failed: Address 10.1.2.3 is in a blocked range (private)'
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should raise FeedError when the response is not XML', async () => {
      mockFetch.mockResolvedValueOnce(
        new Response('{}', { status: 200, headers: { 'content-type': 'application/json' } })
      );

      await expect(service.fetchAndParse('https://shop.example.com/feed.xml')).rejects.toThrow(
        'Feed fetch failed: Content-type application/json is not an accepted feed type'
      );
    });

    it('should raise FeedError for malformed documents', async () => {
      mockFetch.mockResolvedValueOnce(feedResponse('<feed><entry></feed>'));

      await expect(
        service.fetchAndParse('https://shop.example.com/feed.xml')
      ).rejects.toBeInstanceOf(FeedError);
    });
  });

  describe('firstProduct', () => {
    it('should serve a cached product without fetching the feed', async () => {
      const cached = { productId: 'SKU-9', imageUrl: 'https://cdn.example.com/sku-9.jpg', attributes: {} };
      const cache = {
        getFirstProduct: vi.fn().mockResolvedValue(cached),
        setFirstProduct: vi.fn().mockResolvedValue(undefined),
      };
      const cachedService = new FeedService(
        { timeoutMs: 1000, maxBytes: 1024 * 1024, allowedPorts: [80, 443], maxRedirects: 3, resolver },
        cache
      );

      await expect(cachedService.firstProduct('https://shop.example.com/feed.xml')).resolves.toEqual(cached);
      expect(mockFetch).not.toHaveBeenCalled();
      expect(cache.setFirstProduct).not.toHaveBeenCalled();
    });

    it('should cache the first product after a miss', async () => {
      mockFetch.mockResolvedValueOnce(feedResponse(ATOM_FEED));
      const cache = {
        getFirstProduct: vi.fn().mockResolvedValue(null),
        setFirstProduct: vi.fn().mockResolvedValue(undefined),
      };
      const cachedService = new FeedService(
        { timeoutMs: 1000, maxBytes: 1024 * 1024, allowedPorts: [80, 443], maxRedirects: 3, resolver },
        cache
      );

      await cachedService.firstProduct('https://shop.example.com/feed.xml');

      expect(cache.setFirstProduct).toHaveBeenCalledWith('https://shop.example.com/feed.xml', {
        productId: 'SKU-1',
        imageUrl: 'https://cdn.example.com/sku-1.jpg',
        attributes: { title: 'Red Mug', price: '9.99 USD' },
      });
    });

    it('should always fetch for a bulk run', async () => {
      mockFetch.mockResolvedValueOnce(feedResponse(RSS_FEED));
      const cache = {
        getFirstProduct: vi.fn().mockResolvedValue(null),
        setFirstProduct: vi.fn().mockResolvedValue(undefined),
      };
      const cachedService = new FeedService(
        { timeoutMs: 1000, maxBytes: 1024 * 1024, allowedPorts: [80, 443], maxRedirects: 3, resolver },
        cache
      );

      await cachedService.fetchAndParse('https://shop.example.com/feed.xml');

      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(cache.getFirstProduct).not.toHaveBeenCalled();
    });


    it('should return the first valid record', async () => {
      mockFetch.mockResolvedValueOnce(feedResponse(ATOM_FEED));

      const product = await service.firstProduct('https://shop.example.com/feed.xml');

      expect(product?.productId).toBe('SKU-1');
    });

    it('should return null for a feed without valid items', async () => {
      mockFetch.mockResolvedValueOnce(feedResponse('<feed><entry><title>x</title></entry></feed>'));

      const product = await service.firstProduct('https://shop.example.com/feed.xml');

      expect(product).toBeNull();
    });
  });
});
