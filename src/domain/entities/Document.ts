/** Classifier 判定為可索引的檔案 */
export interface ClassifiedDocument {
  /** 絕對路徑 */
  path: string;
  fileName: string;
  /** 小寫、不含點 */
  extension: string;
  category1: string;
  category2: string;
  /** category2 與檔案之間的子路徑（以 / 分隔，可為空字串） */
  relativeSubpath: string;
}

/** 寫入索引的單位 */
export interface DocumentRecord {
  /** = contentHash */
  id: string;
  contentHash: string;
  path: string;
  fileName: string;
  extension: string;
  category1: string;
  category2: string;
  title: string;
  textContent: string;
  mediaType: string;
  /** ISO-8601 UTC */
  modifiedAt: string;
  sizeBytes: number;
  suggestionTerms: string[];
}

export type ExtractionOutcome = 'extracted' | 'oversized' | 'failed';

export interface ExtractedContent {
  title: string;
  text: string;
  mediaType: string;
}
