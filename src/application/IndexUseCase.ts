import type { SearchIndexPort } from '../domain/ports/SearchIndexPort.js';
import type { DocumentTreePort } from '../domain/ports/DocumentTreePort.js';
import type {
  ClassifiedDocument,
  DocumentRecord,
  ExtractedContent,
  ExtractionOutcome,
} from '../domain/entities/Document.js';
import { ContentHash } from '../domain/value-objects/ContentHash.js';
import { isTransient } from '../domain/errors/DomainErrors.js';
import { ContentExtractor, titleOnlyContent } from './ContentExtractor.js';
import { withRetry, type RetryPolicy } from '../shared/RetryPolicy.js';
import { Logger, errorMessage } from '../shared/Logger.js';

/** 搜尋 API 的 highlight 需要分析長欄位 */
export const HIGHLIGHT_SETTINGS = { 'index.highlight.max_analyzed_offset': 5_000_000 };

export interface IndexUseCaseOptions {
  retry: RetryPolicy;
  /** 讀取 mapping 定義；失敗時改用 fallbackMapping */
  loadMapping: () => Promise<Record<string, unknown>>;
  fallbackMapping: Record<string, unknown>;
}

export interface IndexOutcome {
  record: DocumentRecord;
  extraction: ExtractionOutcome;
}

/** 類別與標題組成的自動完成詞，去重、去空值 */
export function buildSuggestionTerms(category1: string, category2: string, title: string): string[] {
  return [...new Set([category1, category2, title].filter((term) => term.length > 0))];
}

/**
 * 索引用例：批次與監看兩條路徑唯一的寫入點
 *
 * record 的 id 是檔案內容的 SHA-256，upsert 以 id 覆寫，
 * 同一內容重複寫入只會留下一筆。
 */
export class IndexUseCase {
  private ready?: Promise<void>;
  private readonly logger: Logger;

  constructor(
    private readonly index: SearchIndexPort,
    private readonly extractor: ContentExtractor,
    private readonly tree: DocumentTreePort,
    private readonly options: IndexUseCaseOptions,
    logger: Logger = new Logger('IndexUseCase'),
  ) {
    this.logger = logger;
  }

  /** 確保索引存在（只檢查一次；失敗後下次呼叫會重新檢查） */
  ensureIndex(): Promise<void> {
    if (!this.ready) {
      this.ready = this.prepareIndex().catch((err: unknown) => {
        this.ready = undefined;
        throw err;
      });
    }
    return this.ready;
  }

  /** 索引單一檔案：建立 record 後以重試策略 upsert */
  async indexDocument(doc: ClassifiedDocument): Promise<IndexOutcome> {
    await this.ensureIndex();
    const { record, extraction } = await this.buildRecord(doc);

    await withRetry(() => this.index.upsert(record), {
      ...this.options.retry,
      isRetryable: isTransient,
      onRetry: (attempt, err, delayMs) => {
        this.logger.warn('Upsert attempt failed, retrying', {
          path: doc.path, id: record.id, attempt, delayMs, error: errorMessage(err),
        });
      },
    });

    return { record, extraction };
  }

  /** stat + hash + 抽取；抽取失敗時退回只有標題的 record */
  async buildRecord(doc: ClassifiedDocument): Promise<IndexOutcome> {
    const info = await this.tree.getFileInfo(doc.path);
    if (!info?.isFile) {
      throw new Error(`Not a regular file: ${doc.path}`);
    }
    const contentHash = (await ContentHash.fromFile(doc.path)).value;

    let content: ExtractedContent;
    let extraction: ExtractionOutcome;
    try {
      ({ content, outcome: extraction } = await this.extractor.extract(doc, info.size));
    } catch (err) {
      this.logger.warn('Extraction failed, indexing without content', {
        path: doc.path, error: errorMessage(err),
      });
      content = titleOnlyContent(doc.fileName);
      extraction = 'failed';
    }

    const title = content.title || titleOnlyContent(doc.fileName).title;
    const record: DocumentRecord = {
      id: contentHash,
      contentHash,
      path: doc.path,
      fileName: doc.fileName,
      extension: doc.extension,
      category1: doc.category1,
      category2: doc.category2,
      title,
      textContent: content.text,
      mediaType: content.mediaType,
      modifiedAt: new Date(info.mtimeMs).toISOString(),
      sizeBytes: info.size,
      suggestionTerms: buildSuggestionTerms(doc.category1, doc.category2, title),
    };

    return { record, extraction };
  }

  private async prepareIndex(): Promise<void> {
    const presence = await this.index.checkIndex();
    if (presence === 'missing') {
      await this.index.createIndex(await this.loadMapping());
      this.logger.info('Created index', { index: this.index.indexName });
    }
    await this.tuneHighlightSettings();
  }

  private async loadMapping(): Promise<Record<string, unknown>> {
    try {
      return await this.options.loadMapping();
    } catch (err) {
      this.logger.warn('Index mapping unavailable, using fallback mapping', { error: errorMessage(err) });
      return this.options.fallbackMapping;
    }
  }

  /** 設定更新失敗不影響索引流程：記錄後繼續 */
  private async tuneHighlightSettings(): Promise<void> {
    try {
      await this.index.updateSettings(HIGHLIGHT_SETTINGS);
    } catch (err) {
      this.logger.warn('Highlight settings update failed, continuing', {
        index: this.index.indexName, error: errorMessage(err),
      });
    }
  }
}
