import type { IngestConfig } from './types.js';

export const DEFAULT_CONFIG: IngestConfig = {
  documents: {
    root: 'data/Note de frais',
    allowedExtensions: ['.pdf', '.doc', '.docx', '.xls', '.xlsx'],
    category1AllowList: [],
    category2AllowList: [],
    maxDocs: 0,
  },
  extraction: {
    baseUrl: 'http://localhost:9998',
    maxExtractMb: 30,
    metaTimeoutMs: 120_000,
    textTimeoutMs: 300_000, // 大檔的全文抽取
  },
  index: {
    baseUrl: 'http://localhost:9200',
    name: 'ndf-docs',
    checkTimeoutMs: 30_000,
    upsertTimeoutMs: 60_000,
    aggregationTimeoutMs: 30_000,
    settingsTimeoutMs: 5_000,
  },
  retry: {
    maxAttempts: 5,
    baseDelayMs: 1_000,
    maxDelayMs: 8_000,
  },
  progress: {
    firstN: 10,
    every: 50,
  },
  logLevel: 'info',
};
