/**
 * Errors produced by the page cache.
 *
 * Validation and I/O failures travel as values (neverthrow `Result`s), never
 * as thrown exceptions. `cause` keeps the underlying error for diagnostics.
 */
export type PageCacheError =
  | { readonly _tag: 'InvalidArgument'; readonly argument: string; readonly message: string }
  | {
      readonly _tag: 'PrefixMismatch';
      readonly namespaceRoot: string;
      readonly resourceId: string;
      readonly message: string;
    }
  | {
      readonly _tag: 'ExtractionFailure';
      readonly packageId: string;
      readonly resourceId: string;
      readonly destinationPath: string;
      readonly message: string;
      readonly cause?: unknown;
    }
  | { readonly _tag: 'PackageLoadFailure'; readonly packageId: string; readonly message: string; readonly cause?: unknown }
  | { readonly _tag: 'DirectoryLifecycleFailure'; readonly path: string; readonly message: string; readonly cause?: unknown };

export const PageCacheErr = {
  invalidArgument: (argument: string, message: string): PageCacheError => ({
    _tag: 'InvalidArgument',
    argument,
    message,
  }),
  prefixMismatch: (namespaceRoot: string, resourceId: string): PageCacheError => ({
    _tag: 'PrefixMismatch',
    namespaceRoot,
    resourceId,
    message: `Resource [${resourceId}] does not start with namespace root [${namespaceRoot}.]`,
  }),
  extractionFailure: (
    packageId: string,
    resourceId: string,
    destinationPath: string,
    message: string,
    cause?: unknown
  ): PageCacheError => ({
    _tag: 'ExtractionFailure',
    packageId,
    resourceId,
    destinationPath,
    message,
    cause,
  }),
  packageLoadFailure: (packageId: string, message: string, cause?: unknown): PageCacheError => ({
    _tag: 'PackageLoadFailure',
    packageId,
    message,
    cause,
  }),
  directoryLifecycleFailure: (path: string, message: string, cause?: unknown): PageCacheError => ({
    _tag: 'DirectoryLifecycleFailure',
    path,
    message,
    cause,
  }),
} as const;

/**
 * One-line description for logs, including the cause's message when present.
 */
export function describeError(error: PageCacheError): string {
  const base = `${error._tag}: ${error.message}`;
  if ('cause' in error && error.cause !== undefined) {
    const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
    return `${base} (${cause})`;
  }
  return base;
}
