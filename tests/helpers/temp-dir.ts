import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

export async function makeTempDir(prefix = 'page-cache-test-'): Promise<string> {
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

export async function removeDir(dir: string | undefined): Promise<void> {
  if (dir) {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
