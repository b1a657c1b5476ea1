/** 批次索引統計 */
export interface IngestStats {
  docsIndexed: number;
  docsFailed: number;
  /** 成功送抽取的文件數 */
  extracted: number;
  /** 超過大小上限、未送抽取的文件數 */
  oversized: number;
  /** 抽取失敗、以標題索引的文件數 */
  extractionFailed: number;
  warnings: string[];
  durationMs: number;
}

export function emptyIngestStats(): IngestStats {
  return {
    docsIndexed: 0, docsFailed: 0,
    extracted: 0, oversized: 0, extractionFailed: 0,
    warnings: [], durationMs: 0,
  };
}
