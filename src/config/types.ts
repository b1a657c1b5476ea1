import type { LogLevel } from '../shared/Logger.js';
import type { RetryPolicy } from '../shared/RetryPolicy.js';

/** 文件樹與分類設定 */
export interface DocumentsConfig {
  /** 文件根目錄（絕對路徑） */
  root: string;
  /** 含點的副檔名（".pdf"） */
  allowedExtensions: string[];
  /** 空陣列 = 不限制 */
  category1AllowList: string[];
  category2AllowList: string[];
  /** 0 = 不限制 */
  maxDocs: number;
}

/** 文字抽取服務設定 */
export interface ExtractionConfig {
  baseUrl: string;
  /** 超過此大小（MiB）不送抽取 */
  maxExtractMb: number;
  metaTimeoutMs: number;
  textTimeoutMs: number;
}

/** 索引服務設定 */
export interface IndexConfig {
  baseUrl: string;
  name: string;
  /** mapping 定義檔；未設定時使用內建的 resources/opensearch-index.json */
  mappingPath?: string;
  checkTimeoutMs: number;
  upsertTimeoutMs: number;
  aggregationTimeoutMs: number;
  settingsTimeoutMs: number;
}

/** 批次進度輸出 */
export interface ProgressConfig {
  /** 前 N 筆每筆都輸出 */
  firstN: number;
  /** 之後每 M 筆輸出一次 */
  every: number;
}

/** 完整設定 */
export interface IngestConfig {
  documents: DocumentsConfig;
  extraction: ExtractionConfig;
  index: IndexConfig;
  retry: RetryPolicy;
  progress: ProgressConfig;
  logLevel: LogLevel;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof IngestConfig]?: IngestConfig[K] extends object ? Partial<IngestConfig[K]> : IngestConfig[K];
};
