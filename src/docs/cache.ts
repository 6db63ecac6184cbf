/**
 * Persistent Memoizing Cache
 * Disk-backed key/value store with get-or-compute semantics
 */

import { mkdirSync } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { CacheError, CacheKeyNotFoundError, ErrorCode, toError } from '../errors/index.js';

export interface CacheStats {
  hits: number;
  misses: number;
}

/**
 * One file per key under `root`. A key is cached iff its file exists; there is no
 * manifest and no expiry. Not safe for concurrent writers on the same root.
 */
export abstract class PersistentCache<K, V> {
  readonly root: string;
  private hits = 0;
  private misses = 0;

  constructor(root: string) {
    this.root = path.resolve(root);
    mkdirSync(this.root, { recursive: true });
  }

  /**
   * Relative file path for a key
   */
  protected abstract keyPath(key: K): string;

  protected abstract save(filePath: string, value: V): Promise<void>;

  protected abstract load(filePath: string): Promise<V>;

  /**
   * Produce the value for a key that is not cached yet
   */
  abstract compute(key: K): Promise<V>;

  /**
   * Absolute file path for a key
   */
  pathFor(key: K): string {
    const relative = this.keyPath(key);
    const resolved = path.resolve(this.root, relative);
    const fromRoot = path.relative(this.root, resolved);

    if (
      path.isAbsolute(relative) ||
      fromRoot === '' ||
      fromRoot.startsWith('..') ||
      path.isAbsolute(fromRoot)
    ) {
      throw new CacheError(`Cache key maps outside of ${this.root}: ${relative}`, ErrorCode.CACHE_INVALID_KEY, {
        root: this.root,
        path: relative,
      });
    }

    return resolved;
  }

  /**
   * Return the stored value, computing and storing it on a miss
   */
  async get(key: K): Promise<V> {
    try {
      const value = await this.read(key);
      this.hits++;
      return value;
    } catch (error) {
      if (!(error instanceof CacheKeyNotFoundError)) {
        throw error;
      }
    }

    this.misses++;
    const value = await this.compute(key);
    await this.set(key, value);
    return value;
  }

  /**
   * Load a stored value
   */
  async read(key: K): Promise<V> {
    const filePath = this.pathFor(key);
    if (!(await fileExists(filePath))) {
      throw new CacheKeyNotFoundError(filePath);
    }

    try {
      return await this.load(filePath);
    } catch (error) {
      throw new CacheError(
        `Failed to read cache entry ${filePath}: ${toError(error).message}`,
        ErrorCode.CACHE_READ_ERROR,
        { path: filePath },
        toError(error)
      );
    }
  }

  /**
   * Store a value, overwriting any previous one
   */
  async set(key: K, value: V): Promise<void> {
    const filePath = this.pathFor(key);

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await this.save(filePath, value);
    } catch (error) {
      throw new CacheError(
        `Failed to write cache entry ${filePath}: ${toError(error).message}`,
        ErrorCode.CACHE_WRITE_ERROR,
        { path: filePath },
        toError(error)
      );
    }
  }

  /**
   * Remove a stored value. Returns false when there was nothing to remove.
   */
  async delete(key: K): Promise<boolean> {
    const filePath = this.pathFor(key);
    if (!(await fileExists(filePath))) {
      return false;
    }

    try {
      await fs.unlink(filePath);
    } catch (error) {
      throw new CacheError(
        `Failed to delete cache entry ${filePath}: ${toError(error).message}`,
        ErrorCode.CACHE_WRITE_ERROR,
        { path: filePath },
        toError(error)
      );
    }
    return true;
  }

  async has(key: K): Promise<boolean> {
    return fileExists(this.pathFor(key));
  }

  /**
   * Hit/miss counters of `get` since construction
   */
  getStats(): CacheStats {
    return { hits: this.hits, misses: this.misses };
  }
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
