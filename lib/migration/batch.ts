import { Attachment } from '../papers/types';
import { ZoteroItemData } from '../zotero/types';

/**
 * One buffered publication: the item to create and its dependent children
 */
export interface BatchEntry {
  sourceId: number;
  title: string | null;
  item: ZoteroItemData;
  notes: string[];
  attachments: Attachment[];
}

/**
 * Bounded, ordered buffer of entries awaiting submission.
 * Position in `entries` is the position in the submitted item list.
 */
export class Batch {
  private buffer: BatchEntry[] = [];

  constructor(readonly maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`Batch size must be a positive integer, got ${maxSize}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isFull(): boolean {
    return this.buffer.length >= this.maxSize;
  }

  get isEmpty(): boolean {
    return this.buffer.length === 0;
  }

  get entries(): readonly BatchEntry[] {
    return this.buffer;
  }

  add(entry: BatchEntry): void {
    this.buffer.push(entry);
  }

  /**
   * Entry submitted at `position`, if any
   */
  at(position: number): BatchEntry | undefined {
    return this.buffer[position];
  }

  items(): ZoteroItemData[] {
    return this.buffer.map(entry => entry.item);
  }

  clear(): void {
    this.buffer = [];
  }
}
