import fs from 'node:fs/promises';
import type { DocumentTreePort, FileInfo, TreeEntry } from '../../domain/ports/DocumentTreePort.js';

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

export class FileSystemDocumentTree implements DocumentTreePort {
  async directoryExists(dirPath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(dirPath);
      return stat.isDirectory();
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async listEntries(dirPath: string): Promise<TreeEntry[]> {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries.map((entry) => ({
      name: entry.name,
      kind: entry.isDirectory() ? 'directory' : entry.isFile() ? 'file' : 'other',
    }));
  }

  async getFileInfo(filePath: string): Promise<FileInfo | undefined> {
    try {
      // 與 listEntries 相同：符號連結不視為檔案
      const stat = await fs.lstat(filePath);
      return {
        path: filePath,
        size: stat.size,
        mtimeMs: stat.mtimeMs,
        isFile: stat.isFile(),
      };
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  async readFile(filePath: string): Promise<Uint8Array> {
    return new Uint8Array(await fs.readFile(filePath));
  }
}
