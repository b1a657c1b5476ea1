import path from 'node:path';
import type { DocumentTreePort, TreeEntry } from '../domain/ports/DocumentTreePort.js';
import type { ClassifiedDocument } from '../domain/entities/Document.js';
import {
  ClassificationFilter,
  isHiddenSegment,
} from '../domain/value-objects/ClassificationFilter.js';
import { Logger, errorMessage } from '../shared/Logger.js';

/** 掃描設定 */
export interface ScanOptions {
  rootDir: string;
  filter: ClassificationFilter;
  /** 0 = 不限制 */
  maxDocs: number;
}

export interface DiscoverOptions {
  /** 忽略 category 白名單（對帳時統計整棵樹） */
  ignoreAllowLists?: boolean;
  /** 忽略 maxDocs 上限 */
  ignoreCap?: boolean;
}

/**
 * 掃描用例：走訪文件根目錄，依路徑結構判定 category
 * - 第一層目錄 = category1，第二層目錄 = category2
 * - 不符白名單的分支整個略過，不往下走
 * - 隱藏目錄、隱藏檔、Office 鎖定檔不列入
 */
export class ScanUseCase {
  private readonly logger: Logger;

  constructor(
    private readonly tree: DocumentTreePort,
    private readonly options: ScanOptions,
    logger: Logger = new Logger('ScanUseCase'),
  ) {
    this.logger = logger;
  }

  get rootDir(): string {
    return this.options.rootDir;
  }

  /** 只看路徑判斷；不符合時回傳 null */
  classify(filePath: string): ClassifiedDocument | null {
    return this.options.filter.classify(this.options.rootDir, filePath);
  }

  /** 路徑符合且磁碟上是一般檔案才算數（目錄、已刪除的路徑回傳 null） */
  async classifyFile(filePath: string): Promise<ClassifiedDocument | null> {
    const doc = this.classify(filePath);
    if (!doc) return null;
    const info = await this.tree.getFileInfo(doc.path);
    return info?.isFile ? doc : null;
  }

  /**
   * 依深度優先順序逐一產出可索引文件
   * 每次呼叫都從頭開始；根目錄不存在時不產出任何項目
   */
  async *discover(options: DiscoverOptions = {}): AsyncGenerator<ClassifiedDocument> {
    const root = this.options.rootDir;
    const filter = options.ignoreAllowLists
      ? this.options.filter.withoutAllowLists()
      : this.options.filter;
    const cap = options.ignoreCap ? 0 : this.options.maxDocs;

    if (!(await this.tree.directoryExists(root))) return;

    let yielded = 0;
    for (const level1 of await this.tree.listEntries(root)) {
      if (!isVisibleDirectory(level1) || !filter.admitsCategory1(level1.name)) continue;
      const level1Dir = path.join(root, level1.name);

      for (const level2 of await this.listOrSkip(level1Dir)) {
        if (!isVisibleDirectory(level2) || !filter.admitsCategory2(level2.name)) continue;
        const level2Dir = path.join(level1Dir, level2.name);

        for await (const filePath of this.walkFiles(level2Dir)) {
          const doc = filter.classify(root, filePath);
          if (!doc) continue;

          yield doc;
          yielded++;
          if (cap > 0 && yielded >= cap) return;
        }
      }
    }
  }

  /** 遞迴走訪目錄，跳過隱藏目錄 */
  private async *walkFiles(dir: string): AsyncGenerator<string> {
    for (const entry of await this.listOrSkip(dir)) {
      const fullPath = path.join(dir, entry.name);
      if (entry.kind === 'directory') {
        if (!isHiddenSegment(entry.name)) {
          yield* this.walkFiles(fullPath);
        }
      } else if (entry.kind === 'file') {
        yield fullPath;
      }
    }
  }

  /** 子目錄讀取失敗只略過該分支 */
  private async listOrSkip(dir: string): Promise<TreeEntry[]> {
    try {
      return await this.tree.listEntries(dir);
    } catch (err) {
      this.logger.warn('Skipping unreadable directory', { dir, error: errorMessage(err) });
      return [];
    }
  }
}

function isVisibleDirectory(entry: TreeEntry): boolean {
  return entry.kind === 'directory' && !isHiddenSegment(entry.name);
}
