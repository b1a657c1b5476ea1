export type TreeEntryKind = 'file' | 'directory' | 'other';

export interface TreeEntry {
  name: string;
  kind: TreeEntryKind;
}

export interface FileInfo {
  path: string;
  size: number;
  mtimeMs: number;
  isFile: boolean;
}

/** 文件樹（磁碟）的唯讀存取 */
export interface DocumentTreePort {
  directoryExists(dirPath: string): Promise<boolean>;
  /** 依目錄原本的迭代順序列出項目 */
  listEntries(dirPath: string): Promise<TreeEntry[]>;
  /** 檔案不存在時回傳 undefined */
  getFileInfo(filePath: string): Promise<FileInfo | undefined>;
  readFile(filePath: string): Promise<Uint8Array>;
}
