import type { DocumentRecord } from '../entities/Document.js';
import type { CategoryStats } from '../entities/CategoryStats.js';

/** 索引存在檢查的結果 */
export type IndexPresence = 'present' | 'missing';

/** 外部全文索引服務（OpenSearch 相容） */
export interface SearchIndexPort {
  readonly indexName: string;

  /** 回傳 present / missing；其他狀態拋出 IndexSetupError */
  checkIndex(): Promise<IndexPresence>;
  /** 以 mapping 建立索引；失敗拋出 IndexSetupError */
  createIndex(mapping: Record<string, unknown>): Promise<void>;
  updateSettings(settings: Record<string, unknown>): Promise<void>;

  /** 以 record.id 覆寫式寫入 */
  upsert(record: DocumentRecord): Promise<void>;

  /** 依 category 分組的文件數 */
  aggregateCategories(): Promise<CategoryStats>;
}
