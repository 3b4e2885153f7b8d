import { randomUUID } from 'crypto';
import * as fs from 'fs/promises';

function toPrettyJson(value: unknown): string {
  return JSON.stringify(value, null, 4);
}

/**
 * Writes `value` as pretty JSON via a temp file and a rename, so readers
 * never see a half-written document. The temp file is removed if the rename
 * fails.
 */
export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  await fs.writeFile(tmpPath, toPrettyJson(value), { encoding: 'utf8' });
  try {
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const data = await fs.readFile(filePath, 'utf8');
  return JSON.parse(data);
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
