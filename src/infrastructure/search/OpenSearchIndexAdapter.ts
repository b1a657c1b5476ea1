import { z } from 'zod';
import type { IndexPresence, SearchIndexPort } from '../../domain/ports/SearchIndexPort.js';
import type { DocumentRecord } from '../../domain/entities/Document.js';
import {
  addCount,
  emptyTable,
  type CategoryStats,
  type CategoryCounts,
} from '../../domain/entities/CategoryStats.js';
import { IndexSetupError, UpstreamServiceError } from '../../domain/errors/DomainErrors.js';
import { errorMessage } from '../../shared/Logger.js';

/**
 * OpenSearch REST Adapter
 *
 * 索引中的欄位名稱沿用既有搜尋 API 查詢的名稱（level1、level2、content、suggest…），
 * domain 的 DocumentRecord 在這裡轉成索引文件。
 */

export interface OpenSearchConfig {
  baseUrl: string;
  name: string;
  checkTimeoutMs: number;
  upsertTimeoutMs: number;
  aggregationTimeoutMs: number;
  settingsTimeoutMs: number;
}

/** 寫進索引的 JSON 文件 */
export interface IndexDocument {
  id: string;
  path: string;
  file_name: string;
  level1: string;
  level2: string;
  title: string;
  content: string;
  media_type: string;
  ext: string;
  modified_at: string;
  size_bytes: number;
  sha256: string;
  suggest: string[];
}

export function toIndexDocument(record: DocumentRecord): IndexDocument {
  return {
    id: record.id,
    path: record.path,
    file_name: record.fileName,
    level1: record.category1,
    level2: record.category2,
    title: record.title,
    content: record.textContent,
    media_type: record.mediaType,
    ext: record.extension,
    modified_at: record.modifiedAt,
    size_bytes: record.sizeBytes,
    sha256: record.contentHash,
    suggest: record.suggestionTerms,
  };
}

const LEVEL1_AGG_SIZE = 500;
const LEVEL2_AGG_SIZE = 1000;

const BucketSchema = z.object({
  key: z.union([z.string(), z.number()]),
  doc_count: z.number(),
});

const AggregationResponseSchema = z.object({
  hits: z.object({
    // 舊版回傳數字，新版回傳 { value, relation }
    total: z.union([z.number(), z.object({ value: z.number() })]).optional(),
  }).optional(),
  aggregations: z.object({
    by_level1: z.object({
      buckets: z.array(BucketSchema.extend({
        by_level2: z.object({ buckets: z.array(BucketSchema) }).optional(),
      })),
    }).optional(),
    by_level2: z.object({ buckets: z.array(BucketSchema) }).optional(),
  }).optional(),
});

function toCounts(buckets: Array<z.infer<typeof BucketSchema>> | undefined): CategoryCounts {
  const counts = emptyTable<number>();
  for (const bucket of buckets ?? []) {
    addCount(counts, String(bucket.key), bucket.doc_count);
  }
  return counts;
}

export class OpenSearchIndexAdapter implements SearchIndexPort {
  readonly indexName: string;
  private readonly baseUrl: string;

  constructor(private readonly config: OpenSearchConfig) {
    this.indexName = config.name;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  async checkIndex(): Promise<IndexPresence> {
    const response = await this.request('GET', '', undefined, this.config.checkTimeoutMs);
    if (response.status === 200) return 'present';
    if (response.status === 404) return 'missing';
    throw new IndexSetupError(
      this.indexName,
      `Unexpected status ${response.status} while checking index "${this.indexName}"`,
      response.status,
    );
  }

  async createIndex(mapping: Record<string, unknown>): Promise<void> {
    const response = await this.request('PUT', '', mapping, this.config.checkTimeoutMs);
    if (response.ok) return;

    const body = await response.text();
    // 另一個 process 剛好先建立了索引
    if (response.status === 400 && body.includes('resource_already_exists_exception')) return;
    throw new IndexSetupError(
      this.indexName,
      `Failed to create index "${this.indexName}" (${response.status}): ${body}`,
      response.status,
    );
  }

  async updateSettings(settings: Record<string, unknown>): Promise<void> {
    const response = await this.request('PUT', '/_settings', settings, this.config.settingsTimeoutMs);
    if (!response.ok) {
      throw new UpstreamServiceError('index', `Settings update returned ${response.status}`, response.status);
    }
  }

  async upsert(record: DocumentRecord): Promise<void> {
    const response = await this.request(
      'PUT',
      `/_doc/${encodeURIComponent(record.id)}`,
      toIndexDocument(record),
      this.config.upsertTimeoutMs,
    );
    if (!response.ok) {
      throw new UpstreamServiceError(
        'index',
        `Upsert of ${record.id} returned ${response.status}: ${await response.text()}`,
        response.status,
      );
    }
  }

  async aggregateCategories(): Promise<CategoryStats> {
    const body = {
      size: 0,
      track_total_hits: true,
      aggs: {
        by_level1: {
          terms: { field: 'level1', size: LEVEL1_AGG_SIZE },
          aggs: {
            by_level2: { terms: { field: 'level2', size: LEVEL2_AGG_SIZE } },
          },
        },
        by_level2: { terms: { field: 'level2', size: LEVEL2_AGG_SIZE } },
      },
    };

    const response = await this.request('POST', '/_search', body, this.config.aggregationTimeoutMs);
    if (!response.ok) {
      throw new UpstreamServiceError(
        'index',
        `Aggregation query returned ${response.status}: ${await response.text()}`,
        response.status,
      );
    }

    const parsed = AggregationResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UpstreamServiceError('index', `Unexpected aggregation response: ${parsed.error.message}`);
    }

    const { hits, aggregations } = parsed.data;
    const total = hits?.total;
    const level1Buckets = aggregations?.by_level1?.buckets ?? [];

    const byCategoryPair = emptyTable<CategoryCounts>();
    for (const bucket of level1Buckets) {
      byCategoryPair[String(bucket.key)] = toCounts(bucket.by_level2?.buckets);
    }

    return {
      total: typeof total === 'number' ? total : total?.value ?? 0,
      byCategory1: toCounts(level1Buckets),
      byCategory2: toCounts(aggregations?.by_level2?.buckets),
      byCategoryPair,
    };
  }

  /** 送出請求；連線錯誤與逾時轉成 UpstreamServiceError，狀態碼交給呼叫端判斷 */
  private async request(
    method: 'GET' | 'PUT' | 'POST',
    suffix: string,
    body: unknown,
    timeoutMs: number,
  ): Promise<Response> {
    const url = `${this.baseUrl}/${encodeURIComponent(this.indexName)}${suffix}`;
    try {
      return await fetch(url, {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new UpstreamServiceError(
        'index',
        `${method} ${url} failed: ${errorMessage(err)}`,
        undefined,
        { cause: err },
      );
    }
  }
}
