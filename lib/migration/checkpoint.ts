/**
 * Durable record of imported and failed source publications
 *
 * Additions are staged in memory and only reach disk on commit(), which
 * replaces the file atomically (temp file, fsync, rename). The previous
 * file is kept as `<file>.bak` and used if the main file is unreadable.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import type { FileHandle } from 'fs/promises';
import { z } from 'zod';
import { logger, errorMessage } from './logging';
import { CheckpointError, CheckpointPersistenceError } from './errors';

const CheckpointFileSchema = z.object({
  version: z.literal(1),
  imported: z.array(z.number().int()),
  failed: z.array(z.number().int()),
});

type CheckpointFile = z.infer<typeof CheckpointFileSchema>;

const MAX_WRITE_ATTEMPTS = 3;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readCheckpointFile(filePath: string): Promise<CheckpointFile | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
  return CheckpointFileSchema.parse(JSON.parse(content));
}

export class Checkpoint {
  private ids = new Set<number>();
  private failed = new Set<number>();
  private uncommitted: number[] = [];

  private constructor(readonly filePath: string) {}

  get backupPath(): string {
    return `${this.filePath}.bak`;
  }

  /**
   * Load from `filePath`, or start empty when it does not exist
   *
   * @throws {CheckpointError} If the file and its backup are both unreadable
   */
  static async load(filePath: string): Promise<Checkpoint> {
    const checkpoint = new Checkpoint(path.resolve(filePath));
    let data: CheckpointFile | null;

    try {
      data = await readCheckpointFile(checkpoint.filePath);
    } catch (error) {
      logger.warn('Checkpoint file unreadable, trying backup', {
        filePath: checkpoint.filePath,
        error: errorMessage(error),
      });
      try {
        data = await readCheckpointFile(checkpoint.backupPath);
      } catch {
        throw new CheckpointError(
          `Checkpoint ${checkpoint.filePath} is unreadable: ${errorMessage(error)}`,
          checkpoint.filePath
        );
      }
      if (!data) {
        throw new CheckpointError(
          `Checkpoint ${checkpoint.filePath} is unreadable and has no backup: ${errorMessage(error)}`,
          checkpoint.filePath
        );
      }
      logger.warn('Recovered checkpoint from backup', { backupPath: checkpoint.backupPath });
    }

    if (data) {
      checkpoint.ids = new Set(data.imported);
      checkpoint.failed = new Set(data.failed);
    }

    logger.info('Checkpoint loaded', {
      filePath: checkpoint.filePath,
      imported: checkpoint.ids.size,
      failed: checkpoint.failed.size,
    });
    return checkpoint;
  }

  contains(id: number): boolean {
    return this.ids.has(id);
  }

  containsFailed(id: number): boolean {
    return this.failed.has(id);
  }

  /**
   * Stage `id` for the next commit; a new attempt supersedes a prior failure
   */
  add(id: number): void {
    this.uncommitted.push(id);
    this.failed.delete(id);
  }

  addFailed(id: number): void {
    this.failed.add(id);
  }

  get pending(): readonly number[] {
    return this.uncommitted;
  }

  get importedCount(): number {
    return this.ids.size;
  }

  failedIds(): number[] {
    return [...this.failed].sort((a, b) => a - b);
  }

  /**
   * Move staged ids that did not fail into the imported set and persist
   *
   * @throws {CheckpointPersistenceError} If the file cannot be written
   */
  async commit(): Promise<void> {
    const ids = new Set(this.ids);
    for (const id of this.uncommitted) {
      if (!this.failed.has(id)) {
        ids.add(id);
      }
    }
    const failed = new Set([...this.failed].filter(id => !ids.has(id)));

    await this.persist({
      version: 1,
      imported: [...ids].sort((a, b) => a - b),
      failed: [...failed].sort((a, b) => a - b),
    });

    this.ids = ids;
    this.failed = failed;
    this.uncommitted = [];
  }

  /**
   * Drop staged ids without persisting
   */
  rollback(): void {
    this.uncommitted = [];
  }

  private async createBackup(): Promise<void> {
    try {
      const content = await fs.readFile(this.filePath, 'utf8');
      CheckpointFileSchema.parse(JSON.parse(content));
      await fs.writeFile(this.backupPath, content, 'utf8');
    } catch (error) {
      if (!isNotFound(error)) {
        logger.warn('Skipped checkpoint backup', { filePath: this.filePath, error: errorMessage(error) });
      }
    }
  }

  private async persist(data: CheckpointFile): Promise<void> {
    const directory = path.dirname(this.filePath);
    const content = JSON.stringify(data, null, 2);
    const tempPath = `${this.filePath}.${randomUUID()}.tmp`;
    let lastError: unknown;

    await this.createBackup();

    for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
      try {
        await fs.mkdir(directory, { recursive: true });
        await fs.writeFile(tempPath, content, 'utf8');

        const fileHandle = await fs.open(tempPath, 'r+');
        try {
          await fileHandle.sync();
        } finally {
          await fileHandle.close();
        }

        await fs.rename(tempPath, this.filePath);
        await syncDirectory(directory);

        logger.debug('Checkpoint committed', {
          filePath: this.filePath,
          imported: data.imported.length,
          failed: data.failed.length,
        });
        return;
      } catch (error) {
        lastError = error;
        await fs.rm(tempPath, { force: true }).catch(cleanupError => {
          logger.debug('Could not remove temporary checkpoint', { tempPath, error: errorMessage(cleanupError) });
        });

        if (attempt < MAX_WRITE_ATTEMPTS) {
          logger.warn('Failed to write checkpoint, retrying', {
            filePath: this.filePath,
            attempt,
            error: errorMessage(error),
          });
          await new Promise(resolve => setTimeout(resolve, 100 * Math.pow(2, attempt - 1)));
        }
      }
    }

    logger.error('Failed to write checkpoint', {
      filePath: this.filePath,
      attempts: MAX_WRITE_ATTEMPTS,
      error: errorMessage(lastError),
    });
    throw new CheckpointPersistenceError(
      `Could not write checkpoint ${this.filePath}: ${errorMessage(lastError)}`,
      this.filePath,
      lastError
    );
  }
}

/**
 * Persist the rename; not every platform can fsync a directory
 */
async function syncDirectory(directory: string): Promise<void> {
  let handle: FileHandle | undefined;
  try {
    handle = await fs.open(directory, 'r');
    await handle.sync();
  } catch (error) {
    logger.debug('Directory fsync unavailable', { directory, error: errorMessage(error) });
  } finally {
    await handle?.close();
  }
}
