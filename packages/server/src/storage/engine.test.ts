import { mkdtempSync, rmSync, writeFileSync, mkdirSync, readFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StorageError } from '../errors.js';
import { StorageEngine } from './engine.js';

describe('StorageEngine', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = mkdtempSync(join(tmpdir(), 'hydra-storage-'));
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  it('returns the same tree for the same name', () => {
    const storage = StorageEngine.temporary();
    expect(storage.subtree('ingress')).toBe(storage.subtree('ingress'));
    expect(storage.treeNames()).toEqual(['ingress']);
  });

  it('persists trees across engine instances', () => {
    const first = StorageEngine.open(dataDir);
    first.subtree('ingress').insert('b', { n: 2 });
    first.subtree('ingress').insert('a', { n: 1 });
    first.close();

    const second = StorageEngine.open(dataDir);
    const tree = second.subtree('ingress');
    expect(tree.entries()).toEqual([
      { key: 'a', value: { n: 1 } },
      { key: 'b', value: { n: 2 } },
    ]);
  });

  it('writes the tree file on every insert', () => {
    const storage = StorageEngine.open(dataDir);
    storage.subtree('events').insert('k', 'v');

    const file = JSON.parse(readFileSync(join(dataDir, 'trees', 'events.json'), 'utf-8'));
    expect(file).toEqual({ entries: [['k', 'v']] });
  });

  it('rejects tree names that are not plain identifiers', () => {
    const storage = StorageEngine.temporary();
    expect(() => storage.subtree('../escape')).toThrow(StorageError);
    expect(() => storage.subtree('')).toThrow('Invalid tree name ""');
  });

  it('fails on a corrupt tree file', () => {
    mkdirSync(join(dataDir, 'trees'), { recursive: true });
    writeFileSync(join(dataDir, 'trees', 'ingress.json'), '{"entries": 5}');

    const storage = StorageEngine.open(dataDir);
    expect(() => storage.subtree('ingress')).toThrow('Tree file for "ingress" is corrupt');
  });

  it('refuses to open trees after close', () => {
    const storage = StorageEngine.temporary();
    storage.close();
    expect(() => storage.subtree('ingress')).toThrow('Storage engine is closed');
  });
});
