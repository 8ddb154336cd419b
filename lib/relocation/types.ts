/**
 * Moves one attachment file from the Papers2 tree into the linked-attachment tree.
 *
 * Paths are `/`-separated and relative to the relocator's source and target
 * roots. Failures resolve to false and are logged; they never reject.
 */
export interface AttachmentRelocator {
  readonly name: string;
  move(fromPath: string, toPath: string): Promise<boolean>;
}

export type RelocatorBackend = 'local' | 'gdrive';
