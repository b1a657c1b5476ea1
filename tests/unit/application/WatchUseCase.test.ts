import { describe, it, expect, afterEach } from 'vitest';
import path from 'node:path';
import { IndexSetupError } from '../../../src/domain/errors/DomainErrors.js';
import { createDocTree, removeDocTree, writeDoc } from '../../helpers/fakes.js';
import { buildTestPipeline } from '../../helpers/pipeline.js';

/**
 * Feature: 監看模式
 *
 * 新增或修改的檔案重新分類後寫入索引；其他事件忽略。
 */
describe('WatchUseCase', () => {
  let root = '';

  afterEach(() => {
    if (root) removeDocTree(root);
    root = '';
  });

  it('subscribes at the document root', () => {
    root = createDocTree({});
    const { pipeline, watcher } = buildTestPipeline(root);

    pipeline.watch.start();

    expect(watcher.subscribedRoot).toBe(root);
    expect(pipeline.watch.isRunning).toBe(true);
  });

  /**
   * Scenario: 新檔案
   * Given 監看中
   * When A/B/new.pdf 被建立
   * Then 索引多一筆 record
   */
  it('indexes a created file', async () => {
    root = createDocTree({});
    const { pipeline, watcher, index } = buildTestPipeline(root);
    pipeline.watch.start();

    const filePath = writeDoc(root, 'A/B/new.pdf', 'receipt');
    watcher.emit({ kind: 'created', path: filePath });
    await pipeline.watch.idle();

    expect(index.docs.size).toBe(1);
    expect([...index.docs.values()][0].path).toBe(filePath);
    expect(pipeline.watch.stats).toEqual({ eventsReceived: 1, docsIndexed: 1, docsFailed: 0, eventsIgnored: 0 });
  });

  it('ignores directories, ineligible files and vanished paths', async () => {
    root = createDocTree({ 'A/B/C/keep.pdf': 'x', 'A/shallow.pdf': 'x', 'A/B/notes.txt': 'x' });
    const { pipeline, watcher, index } = buildTestPipeline(root);
    pipeline.watch.start();

    watcher.emit({ kind: 'created', path: path.join(root, 'A', 'B', 'C') });
    watcher.emit({ kind: 'created', path: path.join(root, 'A', 'shallow.pdf') });
    watcher.emit({ kind: 'modified', path: path.join(root, 'A', 'B', 'notes.txt') });
    watcher.emit({ kind: 'created', path: path.join(root, 'A', 'B', 'gone.pdf') });
    await pipeline.watch.idle();

    expect(index.docs.size).toBe(0);
    expect(pipeline.watch.stats.eventsIgnored).toBe(4);
  });

  it('applies the category allow-lists to events', async () => {
    root = createDocTree({ 'A/B/a.pdf': 'a', 'Z/B/z.pdf': 'z' });
    const { pipeline, watcher, index } = buildTestPipeline(root, { FILTER_LEVEL1: 'A' });
    pipeline.watch.start();

    watcher.emit({ kind: 'modified', path: path.join(root, 'Z', 'B', 'z.pdf') });
    watcher.emit({ kind: 'modified', path: path.join(root, 'A', 'B', 'a.pdf') });
    await pipeline.watch.idle();

    expect([...index.docs.values()].map((d) => d.fileName)).toEqual(['a.pdf']);
  });

  it('counts failures without stopping', async () => {
    root = createDocTree({ 'A/B/a.pdf': 'a', 'A/B/b.pdf': 'b' });
    const { pipeline, watcher, index } = buildTestPipeline(root);
    index.upsertFailures = [new IndexSetupError('test-index', 'rejected', 400)];
    pipeline.watch.start();

    watcher.emit({ kind: 'created', path: path.join(root, 'A', 'B', 'a.pdf') });
    await pipeline.watch.idle();
    watcher.emit({ kind: 'created', path: path.join(root, 'A', 'B', 'b.pdf') });
    await pipeline.watch.idle();

    expect(pipeline.watch.stats.docsFailed).toBe(1);
    expect(pipeline.watch.stats.docsIndexed).toBe(1);
  });

  /**
   * Scenario: 一次複製整個資料夾
   * Given 監看中
   * When 20 個檔案的事件連續到達
   * Then 一次只送一個檔案去抽取，全部都會被索引
   */
  it('processes a burst of events one at a time', async () => {
    const files: Record<string, string> = {};
    for (let i = 0; i < 20; i++) files[`A/B/receipt-${i}.pdf`] = `receipt ${i}`;
    root = createDocTree(files);
    const { pipeline, watcher, index, extractor } = buildTestPipeline(root);
    extractor.delayMs = 5;
    pipeline.watch.start();

    for (const rel of Object.keys(files)) {
      watcher.emit({ kind: 'created', path: path.join(root, ...rel.split('/')) });
    }
    await pipeline.watch.idle();

    expect(extractor.peakActive).toBe(1);
    expect(extractor.requests).toHaveLength(20);
    expect(index.docs.size).toBe(20);
    expect(pipeline.watch.stats.docsIndexed).toBe(20);
  });

  it('stop drains queued events before closing the watcher', async () => {
    root = createDocTree({ 'A/B/a.pdf': 'a', 'A/B/b.pdf': 'b', 'A/B/c.pdf': 'c' });
    const { pipeline, watcher, index, extractor } = buildTestPipeline(root);
    extractor.delayMs = 5;
    pipeline.watch.start();

    for (const name of ['a.pdf', 'b.pdf', 'c.pdf']) {
      watcher.emit({ kind: 'created', path: path.join(root, 'A', 'B', name) });
    }
    await pipeline.watch.stop();

    expect(index.docs.size).toBe(3);
    expect(watcher.closed).toBe(true);
  });

  it('stop waits for in-flight work, then closes the watcher', async () => {
    root = createDocTree({ 'A/B/a.pdf': 'a' });
    const { pipeline, watcher, index } = buildTestPipeline(root);
    pipeline.watch.start();

    watcher.emit({ kind: 'created', path: path.join(root, 'A', 'B', 'a.pdf') });
    await pipeline.watch.stop();

    expect(index.docs.size).toBe(1);
    expect(watcher.closed).toBe(true);
    expect(pipeline.watch.isRunning).toBe(false);
  });
});
