import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONFIG } from './defaults.js';
import type { IngestConfig, PartialConfig } from './types.js';

export type { IngestConfig, PartialConfig } from './types.js';

export const CONFIG_FILE_NAME = '.ndf-ingest.json';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/** 設定檔內容：每個區段都是部分覆蓋，未知欄位視為錯誤 */
const PartialConfigSchema = z.object({
  documents: z.object({
    root: z.string().min(1),
    allowedExtensions: z.array(z.string().min(1)).min(1),
    category1AllowList: z.array(z.string()),
    category2AllowList: z.array(z.string()),
    maxDocs: z.number().int().nonnegative(),
  }).partial().strict().optional(),
  extraction: z.object({
    baseUrl: z.string().url(),
    maxExtractMb: z.number().nonnegative(),
    metaTimeoutMs: z.number().int().positive(),
    textTimeoutMs: z.number().int().positive(),
  }).partial().strict().optional(),
  index: z.object({
    baseUrl: z.string().url(),
    name: z.string().min(1),
    mappingPath: z.string().min(1),
    checkTimeoutMs: z.number().int().positive(),
    upsertTimeoutMs: z.number().int().positive(),
    aggregationTimeoutMs: z.number().int().positive(),
    settingsTimeoutMs: z.number().int().positive(),
  }).partial().strict().optional(),
  retry: z.object({
    maxAttempts: z.number().int().min(1),
    baseDelayMs: z.number().nonnegative(),
    maxDelayMs: z.number().nonnegative(),
  }).partial().strict().optional(),
  progress: z.object({
    firstN: z.number().int().nonnegative(),
    every: z.number().int().positive(),
  }).partial().strict().optional(),
  logLevel: LogLevelSchema.optional(),
}).strict();

/** 空字串等同未設定 */
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const EnvSchema = z.object({
  DOC_ROOT: optionalText,
  TIKA_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  OPENSEARCH_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  INDEX_NAME: optionalText,
  INDEX_MAPPING_PATH: optionalText,
  FILTER_LEVEL1: optionalText,
  FILTER_LEVEL2: optionalText,
  MAX_DOCS: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().optional()),
  MAX_OCR_MB: z.preprocess(blankToUndefined, z.coerce.number().nonnegative().optional()),
  LOG_LEVEL: z.preprocess(blankToUndefined, LogLevelSchema.optional()),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function splitList(raw: string): string[] {
  return raw.split(',').map((s) => s.trim()).filter(Boolean);
}

/** 去掉值為 undefined 的欄位，避免覆蓋掉 base */
function definedOnly<T extends object>(section: Partial<T> | undefined): Partial<T> {
  const out: Partial<T> = {};
  if (!section) return out;
  for (const key of Object.keys(section) as (keyof T)[]) {
    const value = section[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function merge(base: IngestConfig, partial: PartialConfig): IngestConfig {
  return {
    documents: { ...base.documents, ...definedOnly(partial.documents) },
    extraction: { ...base.extraction, ...definedOnly(partial.extraction) },
    index: { ...base.index, ...definedOnly(partial.index) },
    retry: { ...base.retry, ...definedOnly(partial.retry) },
    progress: { ...base.progress, ...definedOnly(partial.progress) },
    logLevel: partial.logLevel ?? base.logLevel,
  };
}

function readConfigFile(cwd: string): PartialConfig {
  const configPath = path.join(cwd, CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) return {};

  const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  const parsed = PartialConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid ${CONFIG_FILE_NAME}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** 環境變數 → 部分設定（只帶有設定的欄位） */
function readEnv(env: NodeJS.ProcessEnv): PartialConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  const e = parsed.data;

  return {
    documents: {
      root: e.DOC_ROOT,
      category1AllowList: e.FILTER_LEVEL1 === undefined ? undefined : splitList(e.FILTER_LEVEL1),
      category2AllowList: e.FILTER_LEVEL2 === undefined ? undefined : splitList(e.FILTER_LEVEL2),
      maxDocs: e.MAX_DOCS,
    },
    extraction: {
      baseUrl: e.TIKA_URL,
      maxExtractMb: e.MAX_OCR_MB,
    },
    index: {
      baseUrl: e.OPENSEARCH_URL,
      name: e.INDEX_NAME,
      mappingPath: e.INDEX_MAPPING_PATH,
    },
    logLevel: e.LOG_LEVEL,
  };
}

/** 驗證設定值的合法性 */
function validate(config: IngestConfig): void {
  if (config.documents.allowedExtensions.length === 0) {
    throw new Error('allowedExtensions must not be empty');
  }
  if (!Number.isInteger(config.retry.maxAttempts) || config.retry.maxAttempts < 1) {
    throw new Error('retry.maxAttempts must be a positive integer');
  }
  if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
    throw new Error('retry.maxDelayMs must be >= retry.baseDelayMs');
  }
  if (config.progress.every < 1) {
    throw new Error('progress.every must be >= 1');
  }
}

function freeze(config: IngestConfig): IngestConfig {
  // 陣列可能仍指向 DEFAULT_CONFIG，先複製再凍結
  config.documents.allowedExtensions = [...config.documents.allowedExtensions];
  config.documents.category1AllowList = [...config.documents.category1AllowList];
  config.documents.category2AllowList = [...config.documents.category2AllowList];
  Object.freeze(config.documents.allowedExtensions);
  Object.freeze(config.documents.category1AllowList);
  Object.freeze(config.documents.category2AllowList);
  Object.freeze(config.documents);
  Object.freeze(config.extraction);
  Object.freeze(config.index);
  Object.freeze(config.retry);
  Object.freeze(config.progress);
  return Object.freeze(config);
}

/**
 * 載入設定：啟動時建立一次，之後以參數傳給各元件
 * @param cwd - 相對路徑（DOC_ROOT、mapping 檔）的基準目錄，也是設定檔所在位置
 * @param env - 環境變數來源
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案與環境變數）
 */
export function loadConfig(
  cwd: string,
  env: NodeJS.ProcessEnv = process.env,
  overrides?: PartialConfig,
): IngestConfig {
  // 合併順序：defaults < file config < env < overrides
  let merged = merge(DEFAULT_CONFIG, readConfigFile(cwd));
  merged = merge(merged, readEnv(env));
  if (overrides) {
    merged = merge(merged, overrides);
  }

  merged.documents.root = path.resolve(cwd, merged.documents.root);
  if (merged.index.mappingPath) {
    merged.index.mappingPath = path.resolve(cwd, merged.index.mappingPath);
  }

  validate(merged);
  return freeze(merged);
}
