import path from 'path';
import type { Env } from '@/types/env';
import type { PackageBinding } from '@/types/package';
import { createLogger } from '@/utils/logger';

const log = createLogger('config');

/**
 * Source of the page-cache configuration. Missing values read as an empty
 * binding list and a disabled filesystem fallback.
 */
export interface ConfigurationSource {
  getPackageBindings(): readonly PackageBinding[];
  allowFilesystemPages(): boolean;
}

export interface PageCacheSettings {
  bindings: PackageBinding[];
  allowFilesystemPages: boolean;
  appRoot: string;
  packagesPath: string;
  cacheParent?: string;
}

/**
 * Parse `packageId=Namespace.Root` pairs separated by commas.
 *
 * Order follows the first appearance of each package id; a repeated id takes
 * the later namespace root. Malformed pairs are skipped.
 */
export function parsePackageBindings(raw: string | undefined): PackageBinding[] {
  const bindings = new Map<string, string>();
  if (!raw) {
    return [];
  }

  for (const pair of raw.split(',')) {
    const trimmed = pair.trim();
    if (!trimmed) continue;

    const separator = trimmed.indexOf('=');
    const packageId = separator > 0 ? trimmed.slice(0, separator).trim() : '';
    const namespaceRoot = separator > 0 ? trimmed.slice(separator + 1).trim() : '';
    if (!packageId || !namespaceRoot) {
      log.warn(`Ignoring malformed package binding: "${trimmed}"`);
      continue;
    }
    bindings.set(packageId, namespaceRoot);
  }

  return Array.from(bindings, ([packageId, namespaceRoot]) => ({ packageId, namespaceRoot }));
}

/**
 * `true`/`false` in any case; anything else, including absence, is `false`.
 */
export function parseBooleanSetting(raw: string | undefined): boolean {
  return raw?.trim().toLowerCase() === 'true';
}

export function loadSettings(env: Env, cwd: string = process.cwd()): PageCacheSettings {
  const appRoot = path.resolve(cwd, env.APP_ROOT || '.');
  return {
    bindings: parsePackageBindings(env.PAGE_PACKAGES),
    allowFilesystemPages: parseBooleanSetting(env.ALLOW_FILESYSTEM_PAGES),
    appRoot,
    packagesPath: path.resolve(appRoot, env.PACKAGES_PATH || 'packages'),
    cacheParent: env.PAGE_CACHE_DIR ? path.resolve(cwd, env.PAGE_CACHE_DIR) : undefined,
  };
}

/**
 * Configuration source over fixed settings.
 */
export function createStaticConfiguration(
  settings: Pick<PageCacheSettings, 'bindings' | 'allowFilesystemPages'>
): ConfigurationSource {
  const bindings = settings.bindings.map((binding) => ({ ...binding }));
  return {
    getPackageBindings: () => bindings,
    allowFilesystemPages: () => settings.allowFilesystemPages,
  };
}

/**
 * Configuration source that re-reads the environment on every call.
 */
export function createEnvConfiguration(env: Env): ConfigurationSource {
  return {
    getPackageBindings: () => parsePackageBindings(env.PAGE_PACKAGES),
    allowFilesystemPages: () => parseBooleanSetting(env.ALLOW_FILESYSTEM_PAGES),
  };
}
