import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { StorageError } from '../errors.js';
import { createLogger } from '../logger.js';
import { Tree, type Entry } from './tree.js';

const log = createLogger('storage');

const TREE_NAME = /^[A-Za-z0-9_-]+$/;

const treeFileSchema = z.object({
  entries: z.array(z.tuple([z.string(), z.unknown()])),
});

/**
 * StorageEngine - named trees of JSON values.
 * A persistent engine keeps each tree in <dataDir>/trees/<name>.json and
 * rewrites the file on every mutation; a temporary engine stays in memory.
 */
export class StorageEngine {
  private trees: Map<string, Tree> = new Map();
  private treeDir: string | null;
  private closed = false;

  private constructor(treeDir: string | null) {
    this.treeDir = treeDir;
  }

  static open(dataDir: string): StorageEngine {
    const treeDir = join(dataDir, 'trees');
    try {
      mkdirSync(treeDir, { recursive: true });
    } catch (error) {
      throw new StorageError(`Failed to create data directory ${treeDir}`, { cause: error });
    }
    log.info('Storage opened', { dir: treeDir });
    return new StorageEngine(treeDir);
  }

  static temporary(): StorageEngine {
    return new StorageEngine(null);
  }

  get isTemporary(): boolean {
    return this.treeDir === null;
  }

  /** Returns the named tree, loading or creating it on first use. */
  subtree(name: string): Tree {
    if (this.closed) {
      throw new StorageError('Storage engine is closed');
    }
    if (!TREE_NAME.test(name)) {
      throw new StorageError(`Invalid tree name "${name}"`);
    }

    const existing = this.trees.get(name);
    if (existing) return existing;

    const tree = this.treeDir === null
      ? new Tree(name)
      : new Tree(name, this.load(name), (t) => this.save(t));
    this.trees.set(name, tree);
    return tree;
  }

  treeNames(): string[] {
    return Array.from(this.trees.keys()).sort();
  }

  close(): void {
    this.closed = true;
    this.trees.clear();
  }

  private pathFor(name: string): string {
    if (this.treeDir === null) {
      throw new StorageError('Temporary storage has no files');
    }
    return join(this.treeDir, `${name}.json`);
  }

  private load(name: string): Entry[] {
    const file = this.pathFor(name);
    if (!existsSync(file)) return [];

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (error) {
      throw new StorageError(`Failed to read tree "${name}"`, { cause: error });
    }

    const parsed = treeFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StorageError(`Tree file for "${name}" is corrupt`);
    }

    log.debug('Tree loaded', { tree: name, entries: parsed.data.entries.length });
    return parsed.data.entries.map(([key, value]) => ({ key, value }));
  }

  private save(tree: Tree): void {
    const file = this.pathFor(tree.name);
    const tmp = `${file}.tmp`;
    try {
      const entries = tree.entries().map(({ key, value }) => [key, value]);
      writeFileSync(tmp, JSON.stringify({ entries }));
      renameSync(tmp, file);
    } catch (error) {
      log.error('Failed to persist tree', { tree: tree.name, error: String(error) });
      throw new StorageError(`Failed to persist tree "${tree.name}"`, { cause: error });
    }
  }
}
