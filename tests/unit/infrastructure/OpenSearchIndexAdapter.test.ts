import { describe, it, expect, vi, afterEach } from 'vitest';
import { OpenSearchIndexAdapter, toIndexDocument } from '../../../src/infrastructure/search/OpenSearchIndexAdapter.js';
import { IndexSetupError, UpstreamServiceError } from '../../../src/domain/errors/DomainErrors.js';
import type { DocumentRecord } from '../../../src/domain/entities/Document.js';

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

function respond(status: number, body: unknown = {}) {
  return vi.fn(async (..._args: FetchArgs): Promise<Response> =>
    new Response(typeof body === 'string' ? body : JSON.stringify(body), { status }));
}

const RECORD: DocumentRecord = {
  id: 'abc123',
  contentHash: 'abc123',
  path: '/docs/Client X/Mission 1/Facture.pdf',
  fileName: 'Facture.pdf',
  extension: 'pdf',
  category1: 'Client X',
  category2: 'Mission 1',
  title: 'Facture',
  textContent: 'Total 42',
  mediaType: 'application/pdf',
  modifiedAt: '2024-03-01T10:00:00.000Z',
  sizeBytes: 1234,
  suggestionTerms: ['Client X', 'Mission 1', 'Facture'],
};

describe('OpenSearchIndexAdapter', () => {
  const adapter = new OpenSearchIndexAdapter({
    baseUrl: 'http://search.test:9200/',
    name: 'ndf-docs',
    checkTimeoutMs: 1000,
    upsertTimeoutMs: 1000,
    aggregationTimeoutMs: 1000,
    settingsTimeoutMs: 1000,
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('maps records to the index field names', () => {
    expect(toIndexDocument(RECORD)).toEqual({
      id: 'abc123',
      path: '/docs/Client X/Mission 1/Facture.pdf',
      file_name: 'Facture.pdf',
      level1: 'Client X',
      level2: 'Mission 1',
      title: 'Facture',
      content: 'Total 42',
      media_type: 'application/pdf',
      ext: 'pdf',
      modified_at: '2024-03-01T10:00:00.000Z',
      size_bytes: 1234,
      sha256: 'abc123',
      suggest: ['Client X', 'Mission 1', 'Facture'],
    });
  });

  describe('checkIndex', () => {
    it('maps 200 to present and 404 to missing', async () => {
      vi.stubGlobal('fetch', respond(200));
      expect(await adapter.checkIndex()).toBe('present');

      vi.stubGlobal('fetch', respond(404));
      expect(await adapter.checkIndex()).toBe('missing');
    });

    it('throws IndexSetupError on any other status', async () => {
      vi.stubGlobal('fetch', respond(500));
      await expect(adapter.checkIndex()).rejects.toBeInstanceOf(IndexSetupError);
    });

    it('wraps transport failures in UpstreamServiceError', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => { throw new TypeError('fetch failed'); }));
      await expect(adapter.checkIndex()).rejects.toBeInstanceOf(UpstreamServiceError);
    });
  });

  describe('createIndex', () => {
    it('PUTs the mapping to the index URL', async () => {
      const fetchMock = respond(200, { acknowledged: true });
      vi.stubGlobal('fetch', fetchMock);

      await adapter.createIndex({ mappings: {} });

      const [url, init] = fetchMock.mock.calls[0];
      expect(String(url)).toBe('http://search.test:9200/ndf-docs');
      expect(init?.method).toBe('PUT');
      expect(init?.body).toBe('{"mappings":{}}');
    });

    it('accepts an index created concurrently', async () => {
      vi.stubGlobal('fetch', respond(400, { error: { type: 'resource_already_exists_exception' } }));
      await expect(adapter.createIndex({})).resolves.toBeUndefined();
    });

    it('rejects other failures', async () => {
      vi.stubGlobal('fetch', respond(400, { error: { type: 'mapper_parsing_exception' } }));
      await expect(adapter.createIndex({})).rejects.toBeInstanceOf(IndexSetupError);
    });
  });

  it('updateSettings targets the _settings endpoint', async () => {
    const fetchMock = respond(200);
    vi.stubGlobal('fetch', fetchMock);

    await adapter.updateSettings({ 'index.highlight.max_analyzed_offset': 5 });

    expect(String(fetchMock.mock.calls[0][0])).toBe('http://search.test:9200/ndf-docs/_settings');
  });

  describe('upsert', () => {
    it('PUTs the document under its id', async () => {
      const fetchMock = respond(201);
      vi.stubGlobal('fetch', fetchMock);

      await adapter.upsert(RECORD);

      const [url, init] = fetchMock.mock.calls[0];
      expect(String(url)).toBe('http://search.test:9200/ndf-docs/_doc/abc123');
      expect(init?.method).toBe('PUT');
      expect(init?.body).toBe(JSON.stringify(toIndexDocument(RECORD)));
    });

    it('raises UpstreamServiceError on non-2xx', async () => {
      vi.stubGlobal('fetch', respond(503, 'unavailable'));

      await expect(adapter.upsert(RECORD)).rejects.toThrow(
        new UpstreamServiceError('index', 'Upsert of abc123 returned 503: unavailable'),
      );
    });
  });

  describe('aggregateCategories', () => {
    it('turns terms buckets into category stats', async () => {
      const fetchMock = respond(200, {
        hits: { total: { value: 5, relation: 'eq' } },
        aggregations: {
          by_level1: {
            buckets: [
              { key: 'A', doc_count: 3, by_level2: { buckets: [{ key: 'X', doc_count: 2 }, { key: 'Y', doc_count: 1 }] } },
              { key: 'B', doc_count: 2, by_level2: { buckets: [{ key: 'X', doc_count: 2 }] } },
            ],
          },
          by_level2: { buckets: [{ key: 'X', doc_count: 4 }, { key: 'Y', doc_count: 1 }] },
        },
      });
      vi.stubGlobal('fetch', fetchMock);

      const stats = await adapter.aggregateCategories();

      expect(stats).toEqual({
        total: 5,
        byCategory1: { A: 3, B: 2 },
        byCategory2: { X: 4, Y: 1 },
        byCategoryPair: { A: { X: 2, Y: 1 }, B: { X: 2 } },
      });
      const [url, init] = fetchMock.mock.calls[0];
      expect(String(url)).toBe('http://search.test:9200/ndf-docs/_search');
      expect(init?.method).toBe('POST');
      expect(JSON.parse(String(init?.body))).toMatchObject({ size: 0, track_total_hits: true });
    });

    it('accepts a numeric hits.total and empty aggregations', async () => {
      vi.stubGlobal('fetch', respond(200, { hits: { total: 0 } }));

      expect(await adapter.aggregateCategories()).toEqual({
        total: 0, byCategory1: {}, byCategory2: {}, byCategoryPair: {},
      });
    });

    it('keeps buckets whose keys collide with built-in object keys', async () => {
      vi.stubGlobal('fetch', respond(200, {
        hits: { total: 3 },
        aggregations: {
          by_level1: {
            buckets: [
              { key: '__proto__', doc_count: 2, by_level2: { buckets: [{ key: 'constructor', doc_count: 2 }] } },
              { key: 'toString', doc_count: 1 },
            ],
          },
          by_level2: { buckets: [{ key: 'constructor', doc_count: 2 }] },
        },
      }));

      const stats = await adapter.aggregateCategories();

      expect(Object.keys(stats.byCategory1)).toEqual(['__proto__', 'toString']);
      expect(stats.byCategory1['__proto__']).toBe(2);
      expect(stats.byCategory2['constructor']).toBe(2);
      expect(stats.byCategoryPair['__proto__']['constructor']).toBe(2);
      expect(stats.byCategoryPair['toString']).toEqual({});
    });

    it('raises UpstreamServiceError on an unexpected response shape', async () => {
      vi.stubGlobal('fetch', respond(200, { hits: { total: 'many' } }));
      await expect(adapter.aggregateCategories()).rejects.toBeInstanceOf(UpstreamServiceError);
    });
  });
});
