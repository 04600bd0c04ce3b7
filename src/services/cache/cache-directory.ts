import { promises as fs, constants as fsConstants } from 'fs';
import os from 'os';
import path from 'path';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { PageCacheErr, type PageCacheError } from '@/types/errors';

export interface CacheDirectoryOptions {
  /** Directory the cache root is created in. Defaults to the OS temp directory. */
  parent?: string;
  prefix?: string;
}

/**
 * Owns the single temporary directory pages are extracted into.
 */
export class CacheDirectory {
  private root: string | null = null;
  private readonly retired = new Set<string>();

  constructor(private readonly options: CacheDirectoryOptions = {}) {}

  get current(): string | null {
    return this.root;
  }

  /**
   * Remove the active root, if any, and create a fresh one.
   */
  async recreate(): Promise<Result<string, PageCacheError>> {
    const destroyed = await this.destroy();
    if (destroyed.isErr()) {
      return err(destroyed.error);
    }

    const parent = path.resolve(this.options.parent || os.tmpdir());
    try {
      await fs.mkdir(parent, { recursive: true });
      await fs.access(parent, fsConstants.W_OK);
    } catch (error) {
      return err(PageCacheErr.directoryLifecycleFailure(parent, `Cache parent [${parent}] is not writable.`, error));
    }

    const prefix = path.join(parent, this.options.prefix || 'page-cache-');
    try {
      let created = await fs.realpath(await fs.mkdtemp(prefix));
      // A root is never handed out twice in one process
      while (this.retired.has(created)) {
        created = await fs.realpath(await fs.mkdtemp(prefix));
      }
      this.root = created;
      return ok(created);
    } catch (error) {
      return err(PageCacheErr.directoryLifecycleFailure(parent, `Unable to create cache root in [${parent}].`, error));
    }
  }

  /**
   * Absolute path of `relative` inside the active root.
   */
  pathUnder(relative: string): Result<string, PageCacheError> {
    const root = this.root;
    if (!root) {
      return err(PageCacheErr.directoryLifecycleFailure('', 'No cache root is active.'));
    }
    const resolved = path.resolve(root, relative);
    if (resolved !== root && !resolved.startsWith(root + path.sep)) {
      return err(PageCacheErr.directoryLifecycleFailure(resolved, `Path [${relative}] is outside the cache root.`));
    }
    return ok(resolved);
  }

  /**
   * Recursively delete the active root. A root that is already gone counts as
   * deleted.
   */
  async destroy(): Promise<Result<void, PageCacheError>> {
    const root = this.root;
    if (!root) {
      return ok(undefined);
    }
    // Cleared first so concurrent callers do not delete twice
    this.root = null;
    this.retired.add(root);
    try {
      await fs.rm(root, { recursive: true, force: true });
      return ok(undefined);
    } catch (error) {
      this.root = root;
      return err(PageCacheErr.directoryLifecycleFailure(root, `Unable to delete cache root [${root}].`, error));
    }
  }
}
