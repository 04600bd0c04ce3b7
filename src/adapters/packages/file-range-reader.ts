import { promises as fs } from 'fs';

/**
 * unzipit reader over a local file. Reads only the byte ranges unzipit asks
 * for, so opening a package reads its central directory and nothing else.
 */
export class FileRangeReader {
  private length: number | undefined;

  constructor(private filePath: string) {}

  /**
   * Get the total size of the ZIP file
   */
  async getLength(): Promise<number> {
    if (this.length === undefined) {
      const stats = await fs.stat(this.filePath);
      if (!stats.isFile()) {
        throw new Error(`ZIP file not found: ${this.filePath}`);
      }
      this.length = stats.size;
    }
    return this.length;
  }

  async read(offset: number, length: number): Promise<Uint8Array> {
    const handle = await fs.open(this.filePath, 'r');
    try {
      const buffer = new Uint8Array(length);
      let filled = 0;
      while (filled < length) {
        const { bytesRead } = await handle.read(buffer, filled, length - filled, offset + filled);
        if (bytesRead === 0) {
          throw new Error(`Failed to read range [${offset}, ${offset + length}] from ${this.filePath}`);
        }
        filled += bytesRead;
      }
      return buffer;
    } finally {
      await handle.close();
    }
  }
}
