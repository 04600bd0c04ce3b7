/**
 * Request path handling for page requests
 */

export const DEFAULT_DOCUMENT = 'index.aspx';

/**
 * Normalize a request pathname to an application-relative file path.
 * Directory requests resolve to the default document.
 */
export function normalizePath(pathname: string): string {
  let path = pathname.startsWith('/') ? pathname.slice(1) : pathname;

  if (!path) {
    path = DEFAULT_DOCUMENT;
  }

  if (path.endsWith('/')) {
    path += DEFAULT_DOCUMENT;
  }

  return path;
}

/**
 * Strip traversal segments and collapse slashes
 */
export function sanitizePath(path: string): string {
  return path
    .replace(/\.\./g, '')
    .replace(/^\/+/, '')
    .replace(/\/+/g, '/');
}

/**
 * Check if path is safe to map onto the application root
 */
export function isPathSafe(path: string): boolean {
  // Sanitization changing the path means traversal or slash tricks
  if (sanitizePath(path) !== path) {
    return false;
  }

  if (path.includes('\0') || path.includes('\\')) {
    return false;
  }

  return true;
}

/**
 * Cache-Control header by file type
 */
export function getCacheControl(path: string): string {
  const ext = path.substring(path.lastIndexOf('.')).toLowerCase();

  // Pages are rendered per request
  if (['.aspx', '.html', '.htm'].includes(ext)) {
    return 'no-cache';
  }

  if (['.jpg', '.jpeg', '.png', '.gif', '.webp', '.svg', '.ico', '.woff', '.woff2', '.ttf'].includes(ext)) {
    return 'public, max-age=86400';
  }

  return 'public, max-age=3600';
}
