import { promises as fs } from 'fs';
import path from 'path';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { PageCacheErr, type PageCacheError } from '@/types/errors';
import type { HostLifecycle } from '@/types/lifecycle';
import type { InitializationCoordinator } from './coordinator';
import { foldsPathCase } from './path-mapper';

export type ResolvedTarget =
  | { kind: 'filesystem'; virtualPath: string; path: string }
  | { kind: 'cache'; virtualPath: string; path: string };

export interface RequestRouterOptions {
  /** Physical root of the application; request paths below it are re-rooted into the cache. */
  appRoot: string;
  /** Configured fallback flag, used when `resolve` is not given one. */
  allowFilesystemPages?: () => boolean;
  lifecycle?: HostLifecycle;
  caseInsensitivePaths?: boolean;
}

/**
 * Decides, per request, whether a page is served from the application tree
 * or from the extracted page cache.
 */
export class RequestRouter {
  private readonly appRoot: string;
  private readonly caseInsensitive: boolean;

  constructor(
    private readonly coordinator: InitializationCoordinator,
    private readonly options: RequestRouterOptions
  ) {
    this.appRoot = path.resolve(options.appRoot);
    this.caseInsensitive = options.caseInsensitivePaths ?? foldsPathCase();
  }

  async resolve(
    virtualPath: string,
    physicalPath: string,
    allowFilesystemFallback?: boolean
  ): Promise<Result<ResolvedTarget, PageCacheError>> {
    if (!physicalPath) {
      return err(PageCacheErr.invalidArgument('physicalPath', 'Path to map may not be empty.'));
    }

    const initialized = await this.coordinator.ensureInitialized(this.options.lifecycle);
    if (initialized.isErr()) {
      return err(initialized.error);
    }

    const allowFilesystem = allowFilesystemFallback ?? this.options.allowFilesystemPages?.() ?? false;
    if (allowFilesystem && (await isFile(physicalPath))) {
      return ok({ kind: 'filesystem', virtualPath, path: physicalPath });
    }

    return ok({ kind: 'cache', virtualPath, path: this.mapToCachePath(physicalPath, initialized.value.root) });
  }

  /**
   * Re-root a physical path from the application root into the cache root.
   * Paths outside the application are returned unchanged (but resolved).
   */
  mapToCachePath(physicalPath: string, cacheRoot: string): string {
    const fullPath = path.resolve(physicalPath);
    if (!this.isInsideAppRoot(fullPath)) {
      return fullPath;
    }

    const subPath = fullPath.slice(this.appRoot.length).split('/').join(path.sep);
    const relative = subPath.startsWith(path.sep) ? subPath.slice(1) : subPath;
    return path.join(cacheRoot, relative);
  }

  private isInsideAppRoot(fullPath: string): boolean {
    const root = this.caseInsensitive ? this.appRoot.toLowerCase() : this.appRoot;
    const candidate = this.caseInsensitive ? fullPath.toLowerCase() : fullPath;
    if (candidate === root) {
      return true;
    }
    const prefix = root.endsWith(path.sep) ? root : root + path.sep;
    return candidate.startsWith(prefix);
  }
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}
