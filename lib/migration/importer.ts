/**
 * Papers2 → Zotero importer
 *
 * Converts publications to Zotero items, buffers them in batches and submits
 * each full batch. Per-position results drive the checkpoint: failed
 * positions mark their publication failed, successful ones get their notes
 * and attachments created. The checkpoint is committed once per batch.
 */

import { promises as fs } from 'fs';
import { LabelName } from '../papers/schema';
import { Attachment, Publication, PublicationSource } from '../papers/types';
import { AttachmentRelocator } from '../relocation/types';
import { CreateItemsResult, ZoteroItemData, ZoteroLibraryClient, ZoteroTag } from '../zotero/types';
import { mapAttachmentPath, SUPPLEMENT_TAG } from './attachment-paths';
import { Batch, BatchEntry } from './batch';
import { Checkpoint } from './checkpoint';
import { DryRunWriter } from './dry-run-writer';
import { ExtractionContext, KEYWORD_KINDS, KeywordKind, applyExtractors, formatTimestamp } from './extractors';
import { errorMessage, logger, logRecordEvent } from './logging';
import { ITEM_TYPES } from './type-mapping';

export type AttachmentPolicy = 'all' | 'unread' | 'none';

export const CITED_TAG = '&cited';
export const RATING_SYMBOL = '⭐';
export const COLLECTION_TAG_PREFIX = 'C:';

export interface ImporterOptions {
  client: ZoteroLibraryClient;
  source: PublicationSource;
  checkpoint?: Checkpoint | null;
  batchSize?: number;
  attachments?: AttachmentPolicy;
  /** When set together with a relocator, attachments are linked and moved instead of uploaded */
  linkedAttachmentBase?: string | null;
  relocator?: AttachmentRelocator | null;
  keywordTypes?: Iterable<KeywordKind>;
  labelMap?: ReadonlyMap<LabelName, string | null>;
  /** Include reviews written by others as notes */
  allReviews?: boolean;
  dryRun?: DryRunWriter | null;
  retryFailed?: boolean;
}

export interface ImportStats {
  enqueued: number;
  skipped: number;
  batches: number;
  created: number;
  unchanged: number;
  failed: number;
  dependentFailures: number;
}

function tagList(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Creation time of a file as an ISO timestamp; modification time where the
 * platform has no birth time, empty when the file is missing
 */
async function fileCreationDate(filePath: string): Promise<string> {
  try {
    const stats = await fs.stat(filePath);
    const millis = stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.mtimeMs;
    return formatTimestamp(Math.floor(millis / 1000));
  } catch {
    return '';
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export class ZoteroImporter {
  private readonly client: ZoteroLibraryClient;
  private readonly source: PublicationSource;
  private readonly checkpoint: Checkpoint | null;
  private readonly attachments: AttachmentPolicy;
  private readonly linkedAttachmentBase: string | null;
  private readonly relocator: AttachmentRelocator | null;
  private readonly allReviews: boolean;
  private readonly dryRun: DryRunWriter | null;
  private readonly retryFailed: boolean;
  private readonly batch: Batch;
  private context: ExtractionContext;
  private closed = false;

  readonly stats: ImportStats = {
    enqueued: 0,
    skipped: 0,
    batches: 0,
    created: 0,
    unchanged: 0,
    failed: 0,
    dependentFailures: 0,
  };

  constructor(options: ImporterOptions) {
    this.client = options.client;
    this.source = options.source;
    this.checkpoint = options.checkpoint ?? null;
    this.attachments = options.attachments ?? 'all';
    this.linkedAttachmentBase = options.linkedAttachmentBase ?? null;
    this.relocator = options.relocator ?? null;
    this.allReviews = options.allReviews ?? false;
    this.dryRun = options.dryRun ?? null;
    this.retryFailed = options.retryFailed ?? false;
    this.batch = new Batch(options.batchSize ?? 50);
    this.context = {
      source: this.source,
      collections: new Map(),
      keywordTypes: new Set(options.keywordTypes ?? KEYWORD_KINDS),
      labelMap: options.labelMap ?? new Map(),
    };
  }

  get extractionContext(): ExtractionContext {
    return this.context;
  }

  /**
   * Resolve the collections publications are filed into.
   * `null` selects every source collection, `[]` none. Missing Zotero
   * collections are created; dry runs use `<name>` placeholders.
   */
  async loadCollections(selection: string[] | null): Promise<void> {
    const names = selection ?? [...new Set(this.source.getCollections().map(collection => collection.name))];
    const collections = new Map<string, string>();

    if (names.length > 0 && this.dryRun) {
      for (const name of names) {
        collections.set(name, `<${name}>`);
      }
    } else if (names.length > 0) {
      const existing = new Set((await this.client.collections()).map(collection => collection.data.name));
      const missing = names.filter(name => !existing.has(name));

      if (missing.length > 0) {
        const result = await this.client.createCollections(missing);
        for (const [position, failure] of Object.entries(result.failed)) {
          logger.error('Collection creation failed', {
            collection: missing[Number(position)],
            code: failure.code,
            message: failure.message,
          });
        }
        logger.info('Created collections', { count: Object.keys(result.success).length });
      }

      const wanted = new Set(names);
      for (const collection of await this.client.collections()) {
        if (wanted.has(collection.data.name)) {
          collections.set(collection.data.name, collection.data.key);
        }
      }
    }

    this.context = { ...this.context, collections };
    logger.info('Collections loaded', { selected: names.length, mapped: collections.size });
  }

  /**
   * Convert and enqueue one publication; submits the batch when it fills up.
   *
   * @returns true if the publication was enqueued, false if skipped
   */
  async addPublication(pub: Publication): Promise<boolean> {
    if (this.closed) {
      throw new Error('Importer is closed');
    }

    if (this.checkpoint?.contains(pub.ROWID)) {
      logRecordEvent('INFO', 'Skipping already imported publication', pub.ROWID, { title: pub.title });
      this.stats.skipped++;
      return false;
    }

    if (this.checkpoint?.containsFailed(pub.ROWID)) {
      if (!this.retryFailed) {
        logRecordEvent('INFO', 'Skipping previously failed publication', pub.ROWID, { title: pub.title });
        this.stats.skipped++;
        return false;
      }
      logRecordEvent('WARN', 'Retrying previously failed publication', pub.ROWID, { title: pub.title });
    }

    const entry = await this.buildEntry(pub);

    this.batch.add(entry);
    this.checkpoint?.add(pub.ROWID);
    this.stats.enqueued++;

    if (this.batch.isFull) {
      await this.commitBatch();
    }

    return true;
  }

  private async buildEntry(pub: Publication): Promise<BatchEntry> {
    const itemType = ITEM_TYPES[this.source.getPubType(pub)];
    const template = await this.client.itemTemplate(itemType);
    const item = applyExtractors(template, pub, this.context);

    const extraTags: ZoteroTag[] = this.source
      .getCollections(pub)
      .map(collection => ({ tag: `${COLLECTION_TAG_PREFIX}${collection.name}` }));
    if (pub.citekey !== null) {
      extraTags.push({ tag: CITED_TAG });
    }
    if (pub.rating > 0) {
      extraTags.push({ tag: RATING_SYMBOL.repeat(pub.rating) });
    }
    item.tags = [...tagList(item.tags), ...extraTags];

    const notes: string[] = [];
    if (pub.notes !== null && pub.notes.length > 0) {
      notes.push(pub.notes);
    }
    for (const review of this.source.getReviews(pub, !this.allReviews)) {
      notes.push(`${review.content ?? ''} Rating: ${review.rating ?? 0}`);
    }

    const wantsAttachments = this.attachments === 'all'
      || (this.attachments === 'unread' && pub.times_read === 0);
    const attachments = wantsAttachments ? this.source.getAttachments(pub) : [];

    return { sourceId: pub.ROWID, title: pub.title, item, notes, attachments };
  }

  /**
   * Submit the remaining partial batch and release the dry-run sink
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.commitBatch(true);
    } finally {
      await this.dryRun?.close();
    }
  }

  /**
   * Drop buffered work without submitting it
   */
  async abort(): Promise<void> {
    this.closed = true;
    this.batch.clear();
    this.checkpoint?.rollback();
    await this.dryRun?.close().catch(error => {
      logger.warn('Could not close dry-run output', { error: errorMessage(error) });
    });
  }

  private async commitBatch(force = false): Promise<void> {
    if (!(this.batch.isFull || (force && !this.batch.isEmpty))) {
      return;
    }

    try {
      if (this.dryRun) {
        for (const entry of this.batch.entries) {
          this.dryRun.write(entry.item, entry.notes, entry.attachments);
        }
        this.checkpoint?.rollback();
      } else {
        await this.submitBatch();
      }
      this.stats.batches++;
    } catch (error) {
      logger.error('Unhandled error submitting batch to Zotero', {
        error: errorMessage(error),
        sourceIds: this.batch.entries.map(entry => entry.sourceId),
      });
      this.checkpoint?.rollback();
      throw error;
    } finally {
      this.batch.clear();
    }
  }

  private async submitBatch(): Promise<void> {
    const result = await this.client.createItems(this.batch.items());

    for (const [position, failure] of Object.entries(result.failed)) {
      const entry = this.batch.at(Number(position));
      if (!entry) {
        logger.error('Item failure reported for unknown batch position', { position, ...failure });
        continue;
      }
      this.checkpoint?.addFailed(entry.sourceId);
      this.stats.failed++;
      logRecordEvent('ERROR', 'Item creation failed', entry.sourceId, {
        title: entry.title,
        code: failure.code,
        message: failure.message,
      });
    }

    const succeeded = new Map<number, string>();
    for (const [position, key] of Object.entries({ ...result.success, ...result.unchanged })) {
      succeeded.set(Number(position), key);
    }

    for (const [position, entry] of this.batch.entries.entries()) {
      const key = succeeded.get(position);
      if (key === undefined) {
        if (result.failed[String(position)] === undefined) {
          this.checkpoint?.addFailed(entry.sourceId);
          this.stats.failed++;
          logRecordEvent('ERROR', 'No result returned for item', entry.sourceId, { title: entry.title });
        }
        continue;
      }

      logRecordEvent('DEBUG', 'Adding notes and attachments', entry.sourceId, { itemKey: key });
      await this.createNotes(entry, key);
      await this.createAttachments(entry, key);
    }

    this.stats.created += Object.keys(result.success).length;
    this.stats.unchanged += Object.keys(result.unchanged).length;

    await this.checkpoint?.commit();

    logger.warn('Batch committed', {
      created: Object.keys(result.success).length,
      unchanged: Object.keys(result.unchanged).length,
      failed: Object.keys(result.failed).length,
      attempted: this.batch.size,
      totalImported: this.checkpoint?.importedCount,
      failedIds: this.checkpoint?.failedIds(),
    });
  }

  private markDependentFailure(entry: BatchEntry, message: string, context?: Record<string, unknown>): void {
    this.checkpoint?.addFailed(entry.sourceId);
    this.stats.dependentFailures++;
    logRecordEvent('ERROR', message, entry.sourceId, { title: entry.title, ...context });
  }

  private reportFailures(entry: BatchEntry, result: CreateItemsResult, message: string): void {
    for (const [position, failure] of Object.entries(result.failed)) {
      this.markDependentFailure(entry, message, {
        position: Number(position),
        code: failure.code,
        message: failure.message,
      });
    }
  }

  private async createNotes(entry: BatchEntry, parentKey: string): Promise<void> {
    if (entry.notes.length === 0) {
      return;
    }
    try {
      const notes: ZoteroItemData[] = [];
      for (const text of entry.notes) {
        const note = await this.client.itemTemplate('note');
        note.note = text;
        notes.push(note);
      }
      const result = await this.client.createItems(notes, parentKey);
      this.reportFailures(entry, result, 'Failed to create note');
    } catch (error) {
      this.markDependentFailure(entry, 'Failed to create notes', { error: errorMessage(error) });
    }
  }

  private async createAttachments(entry: BatchEntry, parentKey: string): Promise<void> {
    if (this.attachments === 'none') {
      return;
    }
    if (entry.attachments.length === 0) {
      logRecordEvent('DEBUG', 'No attachments', entry.sourceId);
      return;
    }

    if (this.linkedAttachmentBase === null || this.relocator === null) {
      const paths = entry.attachments.map(attachment => attachment.path);
      try {
        const result = await this.client.attachmentSimple(paths, parentKey);
        if (Object.keys(result.unchanged).length > 0) {
          logRecordEvent('WARN', 'One or more attachments already exist', entry.sourceId, { paths });
        }
        this.reportFailures(entry, result, 'Attachment upload failed');
      } catch (error) {
        this.markDependentFailure(entry, 'Attachment upload failed', { paths, error: errorMessage(error) });
      }
      return;
    }

    for (const attachment of entry.attachments) {
      await this.linkAttachment(entry, parentKey, attachment, this.relocator);
    }
  }

  /**
   * Create a linked-file attachment, then move the file to where the link points
   */
  private async linkAttachment(
    entry: BatchEntry,
    parentKey: string,
    attachment: Attachment,
    relocator: AttachmentRelocator
  ): Promise<void> {
    try {
      const target = mapAttachmentPath(this.source.folder, attachment.path, attachment.pubType);

      const link = await this.client.itemTemplate('attachment', 'linked_file');
      link.path = `attachments:${target.targetRelative}`;
      link.contentType = attachment.mimeType ?? '';
      link.title = target.filename;
      link.tags = target.isSupplement ? [{ tag: SUPPLEMENT_TAG }] : [];
      link.accessDate = await fileCreationDate(attachment.path);

      const result = await this.client.createItems([link], parentKey);
      if (Object.keys(result.success).length !== 1) {
        this.markDependentFailure(entry, 'Attachment link not created', {
          path: target.sourceRelative,
          failed: result.failed,
        });
        return;
      }

      if (!(await fileExists(attachment.path))) {
        this.markDependentFailure(entry, 'Attachment file does not exist, not moved', { path: attachment.path });
        return;
      }

      if (await relocator.move(target.sourceRelative, target.targetRelative)) {
        logRecordEvent('INFO', 'Moved attachment', entry.sourceId, {
          from: target.sourceRelative,
          to: target.targetRelative,
        });
      } else {
        this.markDependentFailure(entry, 'Attachment move failed', {
          from: target.sourceRelative,
          to: target.targetRelative,
        });
      }
    } catch (error) {
      this.markDependentFailure(entry, 'Attachment link could not be made', {
        path: attachment.path,
        error: errorMessage(error),
      });
    }
  }
}
