import path from 'node:path';
import type { ExtractorPort } from '../domain/ports/ExtractorPort.js';
import type { DocumentTreePort } from '../domain/ports/DocumentTreePort.js';
import type { ClassifiedDocument, ExtractedContent } from '../domain/entities/Document.js';
import { ExtractionFailedError, isTransient } from '../domain/errors/DomainErrors.js';
import { withRetry, type RetryPolicy } from '../shared/RetryPolicy.js';
import { Logger, errorMessage } from '../shared/Logger.js';

const BYTES_PER_MB = 1024 * 1024;

export interface ContentExtractorOptions {
  /** 超過此大小（MiB）不送抽取 */
  maxExtractMb: number;
  retry: RetryPolicy;
}

export interface ExtractionResult {
  content: ExtractedContent;
  outcome: 'extracted' | 'oversized';
}

/** 抽取被略過或失敗時使用的內容：標題 = 不含副檔名的檔名 */
export function titleOnlyContent(fileName: string): ExtractedContent {
  return { title: path.parse(fileName).name, text: '', mediaType: '' };
}

/**
 * 內容抽取：大小政策 + 重試
 *
 * 大檔直接回傳只有標題的內容；其餘送抽取服務，
 * 重試用盡後拋出 ExtractionFailedError，由呼叫端決定退回方式。
 */
export class ContentExtractor {
  private readonly logger: Logger;

  constructor(
    private readonly extractor: ExtractorPort,
    private readonly tree: DocumentTreePort,
    private readonly options: ContentExtractorOptions,
    logger: Logger = new Logger('ContentExtractor'),
  ) {
    this.logger = logger;
  }

  isOversized(sizeBytes: number): boolean {
    return sizeBytes / BYTES_PER_MB > this.options.maxExtractMb;
  }

  async extract(doc: ClassifiedDocument, sizeBytes: number): Promise<ExtractionResult> {
    const fallback = titleOnlyContent(doc.fileName);
    if (this.isOversized(sizeBytes)) {
      this.logger.debug('Skipping extraction for oversized file', { path: doc.path, sizeBytes });
      return { content: fallback, outcome: 'oversized' };
    }

    const bytes = await this.tree.readFile(doc.path);
    try {
      const response = await withRetry(
        () => this.extractor.extract({ bytes, fileName: doc.fileName }),
        {
          ...this.options.retry,
          isRetryable: isTransient,
          onRetry: (attempt, err, delayMs) => {
            this.logger.warn('Extraction attempt failed, retrying', {
              path: doc.path, attempt, delayMs, error: errorMessage(err),
            });
          },
        },
      );

      return {
        content: {
          title: response.title || fallback.title,
          text: response.text,
          mediaType: response.mediaType,
        },
        outcome: 'extracted',
      };
    } catch (err) {
      throw new ExtractionFailedError(doc.path, { cause: err });
    }
  }
}
