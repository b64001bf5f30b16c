import { mkdir, rename, writeFile, rm } from 'fs/promises';
import { dirname } from 'path';
import { randomUUID } from 'crypto';

/**
 * Write JSON through a temp file in the same directory, then rename it
 * over the target.
 */
export async function atomicWriteJson(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmpPath = `${path}.${process.pid}.${randomUUID()}.tmp`;

  try {
    await writeFile(tmpPath, JSON.stringify(data, null, 2) + '\n', 'utf8');
    await rename(tmpPath, path);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}
