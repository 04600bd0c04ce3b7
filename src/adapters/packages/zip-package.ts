import { promises as fs } from 'fs';
import path from 'path';
import { unzip } from 'unzipit';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { PageCacheErr, type PageCacheError } from '@/types/errors';
import type { PackageLoader, ResourcePackage } from '@/types/package';
import { FileRangeReader } from './file-range-reader';

type ZipEntries = Awaited<ReturnType<typeof unzip>>['entries'];
type ZipEntry = ZipEntries[string];

/** Size of the slices a resource is streamed in. */
const STREAM_CHUNK_SIZE = 64 * 1024;

/**
 * A ZIP archive whose entry names are dotted resource identifiers.
 *
 * Resources sit at the top level of the archive. Entries inside folders are
 * not identifiers and are left out of the listing.
 */
export class ZipResourcePackage implements ResourcePackage {
  private readonly names: readonly string[];

  constructor(
    readonly id: string,
    private readonly entries: ZipEntries
  ) {
    // Central directory order
    this.names = Object.keys(entries).filter((name) => !entries[name].isDirectory && !name.includes('/'));
  }

  listResources(): readonly string[] {
    return this.names;
  }

  async openResource(resourceId: string): Promise<AsyncIterable<Uint8Array> | null> {
    if (!Object.prototype.hasOwnProperty.call(this.entries, resourceId)) {
      return null;
    }
    const entry = this.entries[resourceId];
    if (entry.isDirectory) {
      return null;
    }
    return streamEntry(entry);
  }
}

async function* streamEntry(entry: ZipEntry): AsyncGenerator<Uint8Array> {
  const data = new Uint8Array(await entry.arrayBuffer());
  for (let offset = 0; offset < data.length; offset += STREAM_CHUNK_SIZE) {
    yield data.subarray(offset, offset + STREAM_CHUNK_SIZE);
  }
}

/**
 * Loads `<packagesPath>/<packageId>.zip`.
 */
export class ZipPackageLoader implements PackageLoader {
  constructor(private readonly packagesPath: string) {}

  archivePath(packageId: string): string {
    return path.join(path.resolve(this.packagesPath), `${packageId}.zip`);
  }

  async load(packageId: string): Promise<Result<ResourcePackage, PageCacheError>> {
    if (!packageId || packageId.includes('/') || packageId.includes('\\') || packageId === '.' || packageId === '..') {
      return err(PageCacheErr.packageLoadFailure(packageId, `Invalid package identifier [${packageId}].`));
    }

    const archive = this.archivePath(packageId);
    try {
      const stats = await fs.stat(archive);
      if (!stats.isFile()) {
        return err(PageCacheErr.packageLoadFailure(packageId, `Package archive [${archive}] is not a file.`));
      }
    } catch (error) {
      return err(PageCacheErr.packageLoadFailure(packageId, `Package archive [${archive}] not found.`, error));
    }

    try {
      const { entries } = await unzip(new FileRangeReader(archive));
      return ok(new ZipResourcePackage(packageId, entries));
    } catch (error) {
      return err(PageCacheErr.packageLoadFailure(packageId, `Failed to read package archive [${archive}].`, error));
    }
  }
}
