import * as fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import * as path from 'path';
import type { z } from 'zod';
import { PersistenceError, ReportFormatError } from '../agents/errors';
import { fileExists } from '../utils/jsonFiles';
import { silentLogger, type Logger } from '../utils/logger';
import { formatValidationErrors, toError } from '../utils/validation';
import { formatRunTimestamp } from './runPaths';

/**
 * Append-only JSON Lines file. Every `append` is flushed to disk before it
 * resolves, so an interrupted run loses at most the record in flight.
 */
export class DurableLog<T> {
  constructor(readonly filePath: string) {}

  /**
   * Starts a fresh log. A log left by an interrupted run is renamed to
   * `<name>.interrupted-<timestamp>.jsonl` first, so its records stay
   * recoverable; the new name is returned.
   */
  async start(now: Date = new Date()): Promise<{ preservedAs: string | null }> {
    try {
      let preservedAs: string | null = null;
      if (await fileExists(this.filePath)) {
        preservedAs = await this.freeArchivePath(formatRunTimestamp(now));
        await fs.rename(this.filePath, preservedAs);
      }
      const handle = await fs.open(this.filePath, 'wx');
      await handle.close();
      return { preservedAs };
    } catch (error) {
      throw new PersistenceError(this.filePath, 'create log', toError(error));
    }
  }

  private async freeArchivePath(timestamp: string): Promise<string> {
    const ext = path.extname(this.filePath);
    const stem = this.filePath.slice(0, this.filePath.length - ext.length);
    let candidate = `${stem}.interrupted-${timestamp}${ext}`;
    for (let n = 2; await fileExists(candidate); n++) {
      candidate = `${stem}.interrupted-${timestamp}-${n}${ext}`;
    }
    return candidate;
  }

  async append(record: T): Promise<void> {
    let handle: FileHandle | undefined;
    try {
      handle = await fs.open(this.filePath, 'a');
      await handle.appendFile(`${JSON.stringify(record)}\n`, 'utf8');
      await handle.sync();
      const opened = handle;
      handle = undefined;
      await opened.close();
    } catch (error) {
      if (handle) {
        // close failure is secondary; report the append error
        await handle.close().catch(() => undefined);
      }
      throw new PersistenceError(this.filePath, 'append to log', toError(error));
    }
  }

  async remove(): Promise<void> {
    try {
      await fs.rm(this.filePath, { force: true });
    } catch (error) {
      throw new PersistenceError(this.filePath, 'remove log', toError(error));
    }
  }

  /**
   * Reads a log back for manual recovery. A last line that is not valid JSON
   * is what a crash during `append` leaves behind; it is dropped with a
   * warning. Any other bad line is an error.
   */
  static async read<T>(
    filePath: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    logger: Logger = silentLogger
  ): Promise<T[]> {
    const text = await fs.readFile(filePath, 'utf8');
    const lines = text.split('\n');

    let lastIndex = -1;
    lines.forEach((line, i) => {
      if (line.trim()) lastIndex = i;
    });

    const records: T[] = [];
    for (const [i, line] of lines.entries()) {
      if (!line.trim()) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        if (i === lastIndex) {
          logger.warn(`Dropping truncated last line ${i + 1} of ${filePath}`);
          continue;
        }
        throw new ReportFormatError(filePath, `line ${i + 1} is not valid JSON`);
      }

      const result = schema.safeParse(parsed);
      if (!result.success) {
        throw new ReportFormatError(
          filePath,
          `line ${i + 1}\n${formatValidationErrors(result.error)}`
        );
      }
      records.push(result.data);
    }

    return records;
  }
}
