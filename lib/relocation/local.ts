/**
 * Filesystem relocator: copies (or moves) an attachment between two local trees
 */

import { promises as fs } from 'fs';
import path from 'path';
import { errorMessage, logger } from '../migration/logging';
import { AttachmentRelocator } from './types';

export interface LocalRelocatorOptions {
  sourceRoot: string;
  targetRoot: string;
  /** copy keeps the Papers2 file in place (default) */
  mode?: 'copy' | 'move';
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

export class LocalRelocator implements AttachmentRelocator {
  readonly name = 'local';
  private readonly sourceRoot: string;
  private readonly targetRoot: string;
  private readonly mode: 'copy' | 'move';

  constructor(options: LocalRelocatorOptions) {
    this.sourceRoot = path.resolve(options.sourceRoot);
    this.targetRoot = path.resolve(options.targetRoot);
    this.mode = options.mode ?? 'copy';
  }

  resolveSource(relativePath: string): string {
    return path.join(this.sourceRoot, ...relativePath.split('/'));
  }

  resolveTarget(relativePath: string): string {
    return path.join(this.targetRoot, ...relativePath.split('/'));
  }

  async move(fromPath: string, toPath: string): Promise<boolean> {
    const source = this.resolveSource(fromPath);
    const target = this.resolveTarget(toPath);

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });

      if (this.mode === 'copy') {
        await fs.copyFile(source, target);
      } else {
        await this.rename(source, target);
      }

      logger.debug('Relocated attachment', { source, target, mode: this.mode });
      return true;
    } catch (error) {
      logger.error('Attachment relocation failed', { source, target, error: errorMessage(error) });
      return false;
    }
  }

  private async rename(source: string, target: string): Promise<void> {
    try {
      await fs.rename(source, target);
    } catch (error) {
      if (errorCode(error) !== 'EXDEV') {
        throw error;
      }
      // Different filesystems
      await fs.copyFile(source, target);
      await fs.unlink(source);
    }
  }
}
