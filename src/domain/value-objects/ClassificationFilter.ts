import path from 'node:path';
import type { ClassifiedDocument } from '../entities/Document.js';

const HIDDEN_PREFIX = '.';
/** Office 開檔時產生的鎖定暫存檔（~$報表.xlsx） */
const OFFICE_LOCK_PREFIX = '~$';

export interface ClassificationFilterOptions {
  allowedExtensions: readonly string[];
  category1AllowList?: readonly string[];
  category2AllowList?: readonly string[];
}

export function isHiddenSegment(segment: string): boolean {
  return segment.startsWith(HIDDEN_PREFIX);
}

export function isOfficeLockFile(fileName: string): boolean {
  return fileName.startsWith(OFFICE_LOCK_PREFIX);
}

/**
 * 不可變的分類規則：副檔名白名單 + 兩層 category 白名單
 *
 * 白名單為空代表不限制。副檔名一律以小寫、含點比對（".pdf"）。
 */
export class ClassificationFilter {
  private readonly extensions: ReadonlySet<string>;
  private readonly category1: ReadonlySet<string>;
  private readonly category2: ReadonlySet<string>;

  constructor(options: ClassificationFilterOptions) {
    this.extensions = new Set(options.allowedExtensions.map(normalizeExtension));
    this.category1 = new Set(options.category1AllowList ?? []);
    this.category2 = new Set(options.category2AllowList ?? []);
  }

  /** 同規則但不套用 category 白名單（對帳時的磁碟掃描用） */
  withoutAllowLists(): ClassificationFilter {
    return new ClassificationFilter({ allowedExtensions: [...this.extensions] });
  }

  admitsCategory1(name: string): boolean {
    return this.category1.size === 0 || this.category1.has(name);
  }

  admitsCategory2(name: string): boolean {
    return this.category2.size === 0 || this.category2.has(name);
  }

  admitsFileName(fileName: string): boolean {
    if (isHiddenSegment(fileName) || isOfficeLockFile(fileName)) return false;
    return this.extensions.has(path.extname(fileName).toLowerCase());
  }

  /**
   * 只看路徑判斷是否可索引
   * 相對 root 至少三段（category1/category2/.../file），否則回傳 null
   */
  classify(rootDir: string, filePath: string): ClassifiedDocument | null {
    const absPath = path.resolve(filePath);
    const rel = path.relative(path.resolve(rootDir), absPath);
    if (rel === '' || rel.startsWith('..') || path.isAbsolute(rel)) return null;

    const parts = rel.split(path.sep);
    if (parts.length < 3) return null;
    if (parts.some(isHiddenSegment)) return null;

    const fileName = parts[parts.length - 1];
    if (!this.admitsFileName(fileName)) return null;

    const [category1, category2] = parts;
    if (!this.admitsCategory1(category1) || !this.admitsCategory2(category2)) return null;

    return {
      path: absPath,
      fileName,
      extension: path.extname(fileName).slice(1).toLowerCase(),
      category1,
      category2,
      relativeSubpath: parts.slice(2, -1).join('/'),
    };
  }
}

function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}
