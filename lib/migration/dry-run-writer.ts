import { createWriteStream } from 'fs';
import { Writable } from 'stream';
import { ZoteroItemData } from '../zotero/types';
import { DryRunOutputError } from './errors';
import { errorMessage } from './logging';

export const STDOUT_TARGET = 'stdout';

/**
 * Text sink for dry runs: one labelled block per payload that a live run would send
 */
export class DryRunWriter {
  private readonly output: Writable;
  private readonly ownsOutput: boolean;
  private failure: DryRunOutputError | null = null;

  constructor(target: string | Writable = STDOUT_TARGET) {
    if (typeof target !== 'string') {
      this.output = target;
      this.ownsOutput = false;
    } else if (target === STDOUT_TARGET) {
      this.output = process.stdout;
      this.ownsOutput = false;
    } else {
      this.output = createWriteStream(target, { encoding: 'utf8' });
      this.ownsOutput = true;
      // The file opens asynchronously; a failure surfaces on the next write or on close
      this.output.on('error', error => {
        if (!this.failure) {
          this.failure = new DryRunOutputError(
            `Cannot write dry-run output ${target}: ${errorMessage(error)}`,
            target,
            error
          );
        }
      });
    }
  }

  /**
   * @throws {DryRunOutputError} If the output file could not be opened or written
   */
  write(item: ZoteroItemData, notes?: string[], attachments?: unknown[]): void {
    if (this.failure) {
      throw this.failure;
    }
    this.block('ITEM', item);
    if (notes !== undefined) {
      this.block('NOTES', notes);
    }
    if (attachments !== undefined) {
      this.block('ATTACHMENTS', attachments);
    }
  }

  private block(label: string, payload: unknown): void {
    this.output.write(`${label}:\n${JSON.stringify(payload, null, 4)}\n`);
  }

  /**
   * Close the file target; stdout and caller-owned streams stay open
   */
  async close(): Promise<void> {
    if (!this.ownsOutput) {
      return;
    }
    if (this.failure) {
      throw this.failure;
    }
    await new Promise<void>((resolve, reject) => {
      this.output.once('error', error => reject(this.failure ?? error));
      this.output.end(() => resolve());
    });
  }
}
