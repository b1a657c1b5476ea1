import { describe, it, expect, afterEach } from 'vitest';
import { ContentHash } from '../../../src/domain/value-objects/ContentHash.js';
import { createDocTree, removeDocTree } from '../../helpers/fakes.js';
import path from 'node:path';

describe('ContentHash', () => {
  let root: string | undefined;

  afterEach(() => {
    if (root) removeDocTree(root);
    root = undefined;
  });

  it('should produce the known SHA-256 of the bytes', () => {
    const hash = ContentHash.fromBytes(new TextEncoder().encode('abc'));
    expect(hash.value).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('hashing a file in chunks matches hashing its bytes at once', async () => {
    // 大於一個 8 KiB 區塊
    const bytes = new Uint8Array(20_000).map((_, i) => i % 251);
    root = createDocTree({ 'A/B/big.pdf': bytes });

    const fromFile = await ContentHash.fromFile(path.join(root, 'A', 'B', 'big.pdf'));
    expect(fromFile.equals(ContentHash.fromBytes(bytes))).toBe(true);
  });

  it('identical bytes at different paths share the same hash', async () => {
    root = createDocTree({ 'A/B/one.pdf': 'same', 'C/D/two.pdf': 'same' });

    const h1 = await ContentHash.fromFile(path.join(root, 'A', 'B', 'one.pdf'));
    const h2 = await ContentHash.fromFile(path.join(root, 'C', 'D', 'two.pdf'));
    expect(h1.equals(h2)).toBe(true);
  });

  it('should create from existing hex string', () => {
    const h1 = ContentHash.fromBytes(new TextEncoder().encode('test'));
    const h2 = ContentHash.fromHex(h1.value);
    expect(h1.equals(h2)).toBe(true);
    expect(h2.toString()).toBe(h1.value);
  });
});
