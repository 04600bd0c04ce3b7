import path from 'path';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { PageCacheErr, type PageCacheError } from '@/types/errors';

/**
 * Check a dotted name: non-empty, no leading or trailing period, no empty
 * segment.
 */
function validateDottedName(
  argument: string,
  label: string,
  value: string | null | undefined
): Result<string, PageCacheError> {
  if (value === null || value === undefined || value === '') {
    return err(PageCacheErr.invalidArgument(argument, `${label} may not be empty.`));
  }
  if (value.startsWith('.') || value.endsWith('.')) {
    return err(PageCacheErr.invalidArgument(argument, `${label} [${value}] may not start or end with a period.`));
  }
  if (value.includes('..')) {
    return err(PageCacheErr.invalidArgument(argument, `${label} [${value}] may not contain two or more periods together.`));
  }
  return ok(value);
}

/**
 * Whether file paths on `platform` compare without regard to case by default,
 * as on NTFS and APFS.
 */
export function foldsPathCase(platform: NodeJS.Platform = process.platform): boolean {
  return platform === 'win32' || platform === 'darwin';
}

export function validateNamespaceRoot(namespaceRoot: string | null | undefined): Result<string, PageCacheError> {
  return validateDottedName('namespaceRoot', 'Namespace root', namespaceRoot);
}

/**
 * Map a dotted resource identifier to a file under `destinationRoot`.
 *
 * The namespace root and its trailing period are stripped. The last period of
 * what remains starts the extension; every earlier period becomes a directory
 * separator:
 *
 *   mapResourceToFileSystem('Shop.Admin', 'Shop.Admin.Orders.List.aspx', '/tmp/x')
 *   // => ok('/tmp/x/Orders/List.aspx')
 *
 * Multi-part extensions are not recognized: `Page.en-US.resx` becomes
 * `Page/en-US.resx`. An empty `destinationRoot` means the working directory.
 */
export function mapResourceToFileSystem(
  namespaceRoot: string | null | undefined,
  resourceId: string | null | undefined,
  destinationRoot?: string | null
): Result<string, PageCacheError> {
  const namespaceCheck = validateNamespaceRoot(namespaceRoot);
  if (namespaceCheck.isErr()) {
    return err(namespaceCheck.error);
  }
  const resourceCheck = validateDottedName('resourceId', 'Resource identifier', resourceId);
  if (resourceCheck.isErr()) {
    return err(resourceCheck.error);
  }

  const namespace = namespaceCheck.value;
  const resource = resourceCheck.value;

  if (resource.includes('/') || resource.includes('\\')) {
    return err(
      PageCacheErr.invalidArgument('resourceId', `Resource identifier [${resource}] may not contain path separators.`)
    );
  }

  const prefix = `${namespace}.`;
  if (!resource.startsWith(prefix)) {
    return err(PageCacheErr.prefixMismatch(namespace, resource));
  }

  const targetFolder = destinationRoot ? path.resolve(destinationRoot) : process.cwd();

  const remainder = resource.slice(prefix.length);
  const extSeparator = remainder.lastIndexOf('.');
  const relativePath =
    extSeparator < 0
      ? remainder
      : remainder.slice(0, extSeparator).split('.').join(path.sep) + remainder.slice(extSeparator);

  return ok(path.resolve(targetFolder, relativePath));
}
