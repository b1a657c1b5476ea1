/** category 名稱 → 文件數 */
export type CategoryCounts = Record<string, number>;

/** 依兩層 category 分組的文件統計（磁碟或索引皆用此形狀） */
export interface CategoryStats {
  total: number;
  byCategory1: CategoryCounts;
  byCategory2: CategoryCounts;
  /** category1 → category2 → 文件數 */
  byCategoryPair: Record<string, CategoryCounts>;
}

/**
 * 以目錄名稱為 key 的表一律沒有 prototype：
 * "constructor"、"__proto__" 之類的名稱只是普通的 key
 */
export function emptyTable<T>(): Record<string, T> {
  return Object.create(null);
}

/** 只讀自有屬性；不存在時為 0 */
export function countOf(counts: CategoryCounts, key: string): number {
  return Object.hasOwn(counts, key) ? counts[key] : 0;
}

export function addCount(counts: CategoryCounts, key: string, amount: number = 1): void {
  counts[key] = countOf(counts, key) + amount;
}

/** 取得（必要時建立）category1 底下的 category2 計數 */
export function pairCounts(stats: CategoryStats, category1: string): CategoryCounts {
  if (!Object.hasOwn(stats.byCategoryPair, category1)) {
    stats.byCategoryPair[category1] = emptyTable<number>();
  }
  return stats.byCategoryPair[category1];
}

/** 累加一份文件 */
export function recordCategories(stats: CategoryStats, category1: string, category2: string): void {
  stats.total++;
  addCount(stats.byCategory1, category1);
  addCount(stats.byCategory2, category2);
  addCount(pairCounts(stats, category1), category2);
}

export function emptyCategoryStats(): CategoryStats {
  return {
    total: 0,
    byCategory1: emptyTable<number>(),
    byCategory2: emptyTable<number>(),
    byCategoryPair: emptyTable<CategoryCounts>(),
  };
}
