import type { ScanUseCase } from './ScanUseCase.js';
import type { IndexOutcome, IndexUseCase } from './IndexUseCase.js';
import { emptyIngestStats, type IngestStats } from './dto/IngestStats.js';
import { Logger, errorMessage } from '../shared/Logger.js';

export interface ProgressOptions {
  firstN: number;
  every: number;
}

/** 將單筆結果累加到統計 */
export function recordOutcome(stats: IngestStats, outcome: IndexOutcome): void {
  stats.docsIndexed++;
  if (outcome.extraction === 'extracted') stats.extracted++;
  else if (outcome.extraction === 'oversized') stats.oversized++;
  else stats.extractionFailed++;
}

/**
 * 批次索引用例：依序走過整棵文件樹
 *
 * 單一檔案失敗（讀不到、抽取或 upsert 重試用盡）只記錄後繼續下一個檔案。
 * 沒有續傳狀態；重新執行會從頭掃描，靠 content hash 冪等。
 */
export class IngestUseCase {
  private readonly logger: Logger;

  constructor(
    private readonly scan: ScanUseCase,
    private readonly indexer: IndexUseCase,
    private readonly progress: ProgressOptions,
    logger: Logger = new Logger('IngestUseCase'),
  ) {
    this.logger = logger;
  }

  async runFullPass(): Promise<IngestStats> {
    const start = Date.now();
    const stats = emptyIngestStats();

    for await (const doc of this.scan.discover()) {
      try {
        recordOutcome(stats, await this.indexer.indexDocument(doc));
        if (this.shouldReport(stats.docsIndexed)) {
          this.logger.info('Indexed documents', { total: stats.docsIndexed, last: doc.fileName });
        }
      } catch (err) {
        stats.docsFailed++;
        stats.warnings.push(`${doc.path}: ${errorMessage(err)}`);
        this.logger.error('Failed to index document', { path: doc.path, error: errorMessage(err) });
      }
    }

    stats.durationMs = Date.now() - start;
    this.logger.info('Initial indexing complete', {
      indexed: stats.docsIndexed, failed: stats.docsFailed, durationMs: stats.durationMs,
    });
    return stats;
  }

  /** 前 firstN 筆每筆輸出，之後每 every 筆輸出一次 */
  private shouldReport(total: number): boolean {
    return total <= this.progress.firstN || total % this.progress.every === 0;
  }
}
