import type { ResourcePackage } from '@/types/package';

export const PAGE_EXTENSION = '.aspx';

/**
 * A page resource has at least one character of name before the page
 * extension, compared case-insensitively.
 */
export function isPageResource(resourceId: string | null | undefined): boolean {
  if (typeof resourceId !== 'string' || resourceId.length <= PAGE_EXTENSION.length) {
    return false;
  }
  return resourceId.slice(-PAGE_EXTENSION.length).toLowerCase() === PAGE_EXTENSION;
}

/**
 * Page resources of a package, in the order the package lists them.
 */
export function listPageResources(pkg: ResourcePackage): string[] {
  return pkg.listResources().filter(isPageResource);
}
