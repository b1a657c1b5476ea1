import type { SearchIndexPort } from '../domain/ports/SearchIndexPort.js';
import type { ScanUseCase } from './ScanUseCase.js';
import type { ReconcileReport } from './dto/ReconcileReport.js';
import {
  countOf,
  emptyCategoryStats,
  emptyTable,
  recordCategories,
  type CategoryCounts,
  type CategoryStats,
} from '../domain/entities/CategoryStats.js';
import { UpstreamServiceError } from '../domain/errors/DomainErrors.js';
import { Logger, errorMessage } from '../shared/Logger.js';

/** 兩組計數相減（a − b），鍵為兩者聯集並依名稱排序 */
export function diffCounts(a: CategoryCounts, b: CategoryCounts): CategoryCounts {
  const keys = [...new Set([...Object.keys(a), ...Object.keys(b)])].sort();
  const diff = emptyTable<number>();
  for (const key of keys) {
    diff[key] = countOf(a, key) - countOf(b, key);
  }
  return diff;
}

function pairOf(stats: CategoryStats, category1: string): CategoryCounts {
  return Object.hasOwn(stats.byCategoryPair, category1) ? stats.byCategoryPair[category1] : emptyTable<number>();
}

/**
 * 對帳用例：比較磁碟上的可索引文件數與索引中的文件數
 *
 * 兩次讀取沒有共同的快照，結果是近似值。
 * 磁碟掃描失敗視為空統計；索引查詢失敗以 UpstreamServiceError 回報。
 */
export class ReconcileUseCase {
  private readonly logger: Logger;

  constructor(
    private readonly scan: ScanUseCase,
    private readonly index: SearchIndexPort,
    logger: Logger = new Logger('ReconcileUseCase'),
  ) {
    this.logger = logger;
  }

  async reconcile(): Promise<ReconcileReport> {
    const disk = await this.scanDisk();
    const index = await this.fetchIndexStats();
    return {
      docRoot: this.scan.rootDir,
      disk,
      index,
      diff: ReconcileUseCase.diff(disk, index),
    };
  }

  static diff(disk: CategoryStats, index: CategoryStats): ReconcileReport['diff'] {
    const level1Keys = [...new Set([
      ...Object.keys(disk.byCategoryPair),
      ...Object.keys(index.byCategoryPair),
    ])].sort();

    const byCategoryPairMissing = emptyTable<CategoryCounts>();
    for (const key of level1Keys) {
      byCategoryPairMissing[key] = diffCounts(pairOf(disk, key), pairOf(index, key));
    }

    return {
      totalMissing: disk.total - index.total,
      byCategory1Missing: diffCounts(disk.byCategory1, index.byCategory1),
      byCategory2Missing: diffCounts(disk.byCategory2, index.byCategory2),
      byCategoryPairMissing,
    };
  }

  /** 整棵樹的統計（不套白名單與上限） */
  async scanDisk(): Promise<CategoryStats> {
    const stats = emptyCategoryStats();
    try {
      for await (const doc of this.scan.discover({ ignoreAllowLists: true, ignoreCap: true })) {
        recordCategories(stats, doc.category1, doc.category2);
      }
    } catch (err) {
      this.logger.warn('Disk scan failed, reporting empty disk statistics', {
        root: this.scan.rootDir, error: errorMessage(err),
      });
      return emptyCategoryStats();
    }
    return stats;
  }

  private async fetchIndexStats(): Promise<CategoryStats> {
    try {
      return await this.index.aggregateCategories();
    } catch (err) {
      if (err instanceof UpstreamServiceError) throw err;
      throw new UpstreamServiceError('index', `Index aggregation failed: ${errorMessage(err)}`, undefined, {
        cause: err,
      });
    }
  }
}
