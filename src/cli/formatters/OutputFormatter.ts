import type { ClassifiedDocument } from '../../domain/entities/Document.js';

export type OutputFormat = 'json' | 'text';
export type DetailLevel = 'brief' | 'normal';

export function parseOutputFormat(raw: string): OutputFormat {
  if (raw === 'json' || raw === 'text') return raw;
  throw new Error(`Unknown format "${raw}" (expected json or text)`);
}

/**
 * CLI 輸出格式化器
 *
 * - json：原樣輸出（給 script / jq）
 * - text：平展成縮排的 key: value
 */
export class OutputFormatter {
  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  /** 文件清單：brief 只列路徑，normal 加上 category */
  formatDocuments(docs: ClassifiedDocument[], format: OutputFormat, level: DetailLevel = 'normal'): string {
    if (format === 'json') {
      return JSON.stringify(docs, null, 2);
    }
    if (docs.length === 0) return 'No documents found.';

    return docs
      .map((d) => (level === 'brief' ? d.path : `${d.category1} / ${d.category2}  ${d.path}`))
      .join('\n');
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }
}
