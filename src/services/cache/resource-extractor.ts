import { promises as fs } from 'fs';
import path from 'path';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { PageCacheErr, type PageCacheError } from '@/types/errors';
import type { ResourcePackage } from '@/types/package';

/** Bytes held before each write to the destination file. */
export const EXTRACTION_BUFFER_SIZE = 1024;

export interface ExtractedFile {
  path: string;
  bytes: number;
}

/**
 * Copy one resource out of a package into a new file.
 *
 * The destination must not exist yet. On failure a partially written file
 * stays where it is; callers abandon the whole cache root instead.
 */
export async function extractResourceToFile(
  pkg: ResourcePackage,
  resourceId: string | null | undefined,
  destinationPath: string | null | undefined
): Promise<Result<ExtractedFile, PageCacheError>> {
  if (!resourceId) {
    return err(PageCacheErr.invalidArgument('resourceId', 'Path to packaged resource may not be empty.'));
  }
  if (!destinationPath) {
    return err(PageCacheErr.invalidArgument('destinationPath', 'Destination path of packaged resource may not be empty.'));
  }

  try {
    await fs.mkdir(path.dirname(destinationPath), { recursive: true });
  } catch (error) {
    return err(
      PageCacheErr.extractionFailure(
        pkg.id,
        resourceId,
        destinationPath,
        `Unable to create destination directory for path [${destinationPath}].`,
        error
      )
    );
  }

  const failure = (cause: unknown) =>
    PageCacheErr.extractionFailure(
      pkg.id,
      resourceId,
      destinationPath,
      `Unable to write resource [${resourceId}] from package [${pkg.id}] to destination [${destinationPath}].`,
      cause
    );

  try {
    const source = await pkg.openResource(resourceId);
    if (!source) {
      return err(failure(`Resource [${resourceId}] not found in package [${pkg.id}].`));
    }
    const bytes = await copyToNewFile(source, destinationPath);
    return ok({ path: destinationPath, bytes });
  } catch (error) {
    return err(failure(error));
  }
}

/**
 * Stream `source` into a file created with exclusive-create semantics,
 * flushing through a fixed buffer. Returns the number of bytes written.
 */
async function copyToNewFile(source: AsyncIterable<Uint8Array>, destinationPath: string): Promise<number> {
  const handle = await fs.open(destinationPath, 'wx');
  try {
    const buffer = Buffer.alloc(EXTRACTION_BUFFER_SIZE);
    let filled = 0;
    let written = 0;

    // Leaving the loop early (a failed write) closes the source iterator
    for await (const chunk of source) {
      let offset = 0;
      while (offset < chunk.length) {
        const count = Math.min(EXTRACTION_BUFFER_SIZE - filled, chunk.length - offset);
        buffer.set(chunk.subarray(offset, offset + count), filled);
        filled += count;
        offset += count;

        if (filled === EXTRACTION_BUFFER_SIZE) {
          await handle.write(buffer, 0, filled);
          written += filled;
          filled = 0;
        }
      }
    }

    if (filled > 0) {
      await handle.write(buffer, 0, filled);
      written += filled;
    }

    await handle.sync();
    return written;
  } finally {
    await handle.close();
  }
}
