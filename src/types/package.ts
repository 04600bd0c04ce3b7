import type { Result } from 'neverthrow';
import type { PageCacheError } from './errors';

/**
 * A loaded bundle of named, byte-addressable resources.
 */
export interface ResourcePackage {
  readonly id: string;
  /** Every resource identifier the package declares, in package order. */
  listResources(): readonly string[];
  /** Byte stream of one resource, or `null` when the package has no such resource. */
  openResource(resourceId: string): Promise<AsyncIterable<Uint8Array> | null>;
}

export interface PackageLoader {
  load(packageId: string): Promise<Result<ResourcePackage, PageCacheError>>;
}

/**
 * Configured pairing of a package with the namespace root stripped from its
 * resource identifiers.
 */
export interface PackageBinding {
  packageId: string;
  namespaceRoot: string;
}
