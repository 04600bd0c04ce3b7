import path from 'path';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { ConfigurationSource } from '@/config/settings';
import { describeError, type PageCacheError } from '@/types/errors';
import type { HostLifecycle } from '@/types/lifecycle';
import type { PackageLoader } from '@/types/package';
import { createLogger, type Logger } from '@/utils/logger';
import type { CacheDirectory } from './cache-directory';
import { foldsPathCase, mapResourceToFileSystem, validateNamespaceRoot } from './path-mapper';
import { extractResourceToFile } from './resource-extractor';
import { listPageResources } from './resource-catalog';

export type InitializationState = 'uninitialized' | 'initializing' | 'ready';

/**
 * Published result of one extraction pass. `entries` maps each virtual path
 * (cache-root-relative, `/`-separated) to the absolute extracted file.
 */
export interface CacheSnapshot {
  readonly root: string;
  readonly entries: ReadonlyMap<string, string>;
}

export interface CoordinatorOptions {
  cache: CacheDirectory;
  packages: PackageLoader;
  config: ConfigurationSource;
  /** Fold virtual-path case when de-duplicating. Defaults to true on Windows and macOS. */
  caseInsensitivePaths?: boolean;
  logger?: Logger;
}

/**
 * Runs the page extraction pass once per epoch.
 *
 * The first caller of `ensureInitialized` starts the pass; callers arriving
 * while it runs share its outcome. After a failure the state returns to
 * `uninitialized` and the next call starts over.
 */
export class InitializationCoordinator {
  private currentState: InitializationState = 'uninitialized';
  private published: CacheSnapshot | null = null;
  private pending: Promise<Result<CacheSnapshot, PageCacheError>> | null = null;
  private readonly hookedHosts = new WeakSet<HostLifecycle>();
  private readonly caseInsensitive: boolean;
  private readonly log: Logger;

  constructor(private readonly options: CoordinatorOptions) {
    this.caseInsensitive = options.caseInsensitivePaths ?? foldsPathCase();
    this.log = options.logger ?? createLogger('page-cache');
  }

  get state(): InitializationState {
    return this.currentState;
  }

  get snapshot(): CacheSnapshot | null {
    return this.published;
  }

  async ensureInitialized(lifecycle?: HostLifecycle): Promise<Result<CacheSnapshot, PageCacheError>> {
    if (this.currentState === 'ready' && this.published) {
      return ok(this.published);
    }

    // Callers arriving during a pass share its promise
    if (!this.pending) {
      this.currentState = 'initializing';
      this.pending = this.initialize(lifecycle).finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  /**
   * Delete the cache root and forget the index. Waits for a running pass
   * first. Safe to call repeatedly or before any initialization.
   */
  async teardown(): Promise<Result<void, PageCacheError>> {
    if (this.pending) {
      const running = await this.pending;
      if (running.isErr()) {
        this.log.debug(`Tearing down after failed pass: ${describeError(running.error)}`);
      }
    }

    this.published = null;
    this.currentState = 'uninitialized';

    const destroyed = await this.options.cache.destroy();
    if (destroyed.isErr()) {
      this.log.error(`Cache teardown failed: ${describeError(destroyed.error)}`);
      return err(destroyed.error);
    }
    this.log.info('Page cache torn down');
    return ok(undefined);
  }

  private registerShutdownHook(lifecycle: HostLifecycle | undefined): void {
    if (!lifecycle || this.hookedHosts.has(lifecycle)) {
      return;
    }
    this.hookedHosts.add(lifecycle);
    lifecycle.onShutdown(async () => {
      await this.teardown();
    });
  }

  private async initialize(lifecycle: HostLifecycle | undefined): Promise<Result<CacheSnapshot, PageCacheError>> {
    this.registerShutdownHook(lifecycle);

    let result: Result<CacheSnapshot, PageCacheError>;
    try {
      result = await this.extractAll();
    } catch (error) {
      // A throwing loader or package still ends the pass
      this.currentState = 'uninitialized';
      this.published = null;
      this.log.error('Page cache initialization threw:', error);
      throw error;
    }
    if (result.isErr()) {
      this.currentState = 'uninitialized';
      this.published = null;
      this.log.error(`Page cache initialization failed: ${describeError(result.error)}`);
      return err(result.error);
    }

    this.published = result.value;
    this.currentState = 'ready';
    return ok(result.value);
  }

  private async extractAll(): Promise<Result<CacheSnapshot, PageCacheError>> {
    const { cache, packages, config } = this.options;

    const recreated = await cache.recreate();
    if (recreated.isErr()) {
      return err(recreated.error);
    }
    const root = recreated.value;

    const bindings = config.getPackageBindings();
    this.log.info(`Extracting pages from ${bindings.length} package(s) into ${root}`);

    const entries = new Map<string, string>();
    const seen = new Set<string>();

    for (const binding of bindings) {
      const namespace = validateNamespaceRoot(binding.namespaceRoot);
      if (namespace.isErr()) {
        return err(namespace.error);
      }

      const loaded = await packages.load(binding.packageId);
      if (loaded.isErr()) {
        return err(loaded.error);
      }
      const pkg = loaded.value;

      for (const resourceId of listPageResources(pkg)) {
        const mapped = mapResourceToFileSystem(binding.namespaceRoot, resourceId, root);
        if (mapped.isErr()) {
          return err(mapped.error);
        }

        const virtualPath = toVirtualPath(root, mapped.value);
        const key = this.caseInsensitive ? virtualPath.toLowerCase() : virtualPath;
        if (seen.has(key)) {
          this.log.debug(`Skipping ${resourceId} from ${pkg.id}: ${virtualPath} already extracted`);
          continue;
        }

        const extracted = await extractResourceToFile(pkg, resourceId, mapped.value);
        if (extracted.isErr()) {
          return err(extracted.error);
        }
        seen.add(key);
        entries.set(virtualPath, mapped.value);
        this.log.debug(`Extracted ${resourceId} (${extracted.value.bytes} bytes) to ${virtualPath}`);
      }
    }

    this.log.info(`Page cache ready: ${entries.size} page(s)`);
    return ok({ root, entries });
  }
}

function toVirtualPath(root: string, absolutePath: string): string {
  return path.relative(root, absolutePath).split(path.sep).join('/');
}

