import type { CategoryCounts, CategoryStats } from '../../domain/entities/CategoryStats.js';

/** 磁碟 − 索引；正值 = 尚未索引，負值 = 索引中有多餘（可能已刪除）的文件 */
export interface ReconcileDiff {
  totalMissing: number;
  byCategory1Missing: CategoryCounts;
  byCategory2Missing: CategoryCounts;
  byCategoryPairMissing: Record<string, CategoryCounts>;
}

export interface ReconcileReport {
  docRoot: string;
  disk: CategoryStats;
  index: CategoryStats;
  diff: ReconcileDiff;
}
