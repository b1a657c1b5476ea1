import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { ClassificationFilter } from '../../../src/domain/value-objects/ClassificationFilter.js';

const ROOT = path.resolve('/data/ndf');
const EXTENSIONS = ['.pdf', '.doc', '.docx', '.xls', '.xlsx'];

function at(...segments: string[]): string {
  return path.join(ROOT, ...segments);
}

/**
 * Feature: 以路徑分類文件
 *
 * 第一層目錄 = category1，第二層目錄 = category2，更深的目錄只是子路徑。
 */
describe('ClassificationFilter', () => {
  const filter = new ClassificationFilter({ allowedExtensions: EXTENSIONS });

  it('classifies a file three levels deep', () => {
    expect(filter.classify(ROOT, at('Client X', 'Mission 1', 'note.pdf'))).toEqual({
      path: at('Client X', 'Mission 1', 'note.pdf'),
      fileName: 'note.pdf',
      extension: 'pdf',
      category1: 'Client X',
      category2: 'Mission 1',
      relativeSubpath: '',
    });
  });

  it('keeps the intermediate directories as the relative subpath', () => {
    const doc = filter.classify(ROOT, at('A', 'B', '2024', 'Q1', 'receipt.xlsx'));
    expect(doc?.relativeSubpath).toBe('2024/Q1');
    expect(doc?.category2).toBe('B');
  });

  it('rejects files fewer than three levels below the root', () => {
    expect(filter.classify(ROOT, at('A', 'orphan.pdf'))).toBeNull();
    expect(filter.classify(ROOT, at('root.pdf'))).toBeNull();
  });

  it('rejects files outside the root', () => {
    expect(filter.classify(ROOT, path.resolve('/elsewhere/A/B/x.pdf'))).toBeNull();
  });

  it('matches extensions case-insensitively and lowercases them', () => {
    expect(filter.classify(ROOT, at('A', 'B', 'SCAN.PDF'))?.extension).toBe('pdf');
    expect(filter.classify(ROOT, at('A', 'B', 'notes.txt'))).toBeNull();
  });

  it('rejects hidden files, hidden directories and office lock files', () => {
    expect(filter.classify(ROOT, at('A', 'B', '.draft.pdf'))).toBeNull();
    expect(filter.classify(ROOT, at('A', '.cache', 'x.pdf'))).toBeNull();
    expect(filter.classify(ROOT, at('A', 'B', '.git', 'x.pdf'))).toBeNull();
    expect(filter.classify(ROOT, at('A', 'B', '~$budget.xlsx'))).toBeNull();
  });

  it('only checks hidden segments below the root', () => {
    const hiddenRoot = path.resolve('/home/user/.data');
    expect(filter.classify(hiddenRoot, path.join(hiddenRoot, 'A', 'B', 'x.pdf'))).not.toBeNull();
  });

  it('accepts extensions written without a dot', () => {
    const bare = new ClassificationFilter({ allowedExtensions: ['PDF'] });
    expect(bare.classify(ROOT, at('A', 'B', 'x.pdf'))).not.toBeNull();
  });

  describe('allow-lists', () => {
    const restricted = new ClassificationFilter({
      allowedExtensions: EXTENSIONS,
      category1AllowList: ['Client X'],
      category2AllowList: ['Mission 1'],
    });

    it('admits only listed categories', () => {
      expect(restricted.classify(ROOT, at('Client X', 'Mission 1', 'a.pdf'))).not.toBeNull();
      expect(restricted.classify(ROOT, at('Client Y', 'Mission 1', 'a.pdf'))).toBeNull();
      expect(restricted.classify(ROOT, at('Client X', 'Mission 2', 'a.pdf'))).toBeNull();
    });

    it('withoutAllowLists keeps the extension rule but drops category rules', () => {
      const open = restricted.withoutAllowLists();
      expect(open.classify(ROOT, at('Client Y', 'Mission 2', 'a.pdf'))).not.toBeNull();
      expect(open.classify(ROOT, at('Client Y', 'Mission 2', 'a.txt'))).toBeNull();
    });

    it('empty allow-lists admit everything', () => {
      expect(filter.admitsCategory1('anything')).toBe(true);
      expect(filter.admitsCategory2('anything')).toBe(true);
    });
  });
});
