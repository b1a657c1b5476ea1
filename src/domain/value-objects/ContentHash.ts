import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

const CHUNK_SIZE = 8192;

/** 不可變的 SHA-256 內容雜湊值物件，同時是 Document Record 的 id */
export class ContentHash {
  private constructor(public readonly value: string) {}

  /** 以固定大小的區塊串流讀取檔案計算 SHA-256，不整檔載入記憶體 */
  static async fromFile(filePath: string): Promise<ContentHash> {
    const hash = createHash('sha256');
    const stream = createReadStream(filePath, { highWaterMark: CHUNK_SIZE });
    for await (const chunk of stream) {
      hash.update(chunk);
    }
    return new ContentHash(hash.digest('hex'));
  }

  static fromBytes(bytes: Uint8Array): ContentHash {
    return new ContentHash(createHash('sha256').update(bytes).digest('hex'));
  }

  /** 從既有的 hex 字串建立（不重新計算） */
  static fromHex(hex: string): ContentHash {
    return new ContentHash(hex);
  }

  equals(other: ContentHash): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
