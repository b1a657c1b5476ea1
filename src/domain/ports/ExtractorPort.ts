/**
 * 外部文字抽取服務的抽象介面
 *
 * 一次 extract 代表一次完整的遠端抽取（metadata + 純文字）；
 * 重試與大小政策由 application 層的 ContentExtractor 負責。
 */

export interface ExtractionRequest {
  bytes: Uint8Array;
  fileName: string;
}

export interface ExtractionResponse {
  /** 抽取服務給的標題，沒有時為 undefined */
  title?: string;
  text: string;
  mediaType: string;
}

export interface ExtractorPort {
  readonly providerId: string;
  extract(request: ExtractionRequest): Promise<ExtractionResponse>;
}
