import fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

/** 隨套件附帶的 mapping 定義檔 */
export const DEFAULT_MAPPING_PATH = fileURLToPath(
  new URL('../../../resources/opensearch-index.json', import.meta.url),
);

/** 定義檔讀不到時使用的最小 mapping */
export const FALLBACK_MAPPING: Record<string, unknown> = {
  mappings: {
    properties: {
      content: { type: 'text' },
      level1: { type: 'keyword' },
      level2: { type: 'keyword' },
    },
  },
};

const MappingSchema = z.record(z.unknown());

/** 讀取並解析 mapping 定義檔；錯誤直接拋出，由呼叫端決定是否退回 FALLBACK_MAPPING */
export async function readIndexMapping(mappingPath: string = DEFAULT_MAPPING_PATH): Promise<Record<string, unknown>> {
  const raw: unknown = JSON.parse(await fs.readFile(mappingPath, 'utf-8'));
  return MappingSchema.parse(raw);
}
