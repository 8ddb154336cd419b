/**
 * Importer tests against an in-memory source and Zotero client
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { PassThrough, Writable } from 'stream';
import { Checkpoint } from '../../lib/migration/checkpoint';
import { DryRunWriter } from '../../lib/migration/dry-run-writer';
import { ImporterOptions, ZoteroImporter } from '../../lib/migration/importer';
import { AttachmentRelocator } from '../../lib/relocation/types';
import { CreateItemsResult } from '../../lib/zotero/types';
import { FakeSource, FakeSourceData, FakeZoteroClient, allSucceed, makePublication } from '../helpers/fakes';

class RecordingRelocator implements AttachmentRelocator {
  readonly name = 'recording';
  readonly moves: [string, string][] = [];

  constructor(private readonly result = true) {}

  async move(fromPath: string, toPath: string): Promise<boolean> {
    this.moves.push([fromPath, toPath]);
    return this.result;
  }
}

function publications(count: number): ReturnType<typeof makePublication>[] {
  return Array.from({ length: count }, (_, index) =>
    makePublication({ ROWID: index + 1, title: `Publication ${index + 1}` })
  );
}

describe('ZoteroImporter', () => {
  let dir: string;
  let checkpoint: Checkpoint;
  let client: FakeZoteroClient;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'importer-'));
    checkpoint = await Checkpoint.load(path.join(dir, 'checkpoint.json'));
    client = new FakeZoteroClient();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function importer(data: FakeSourceData, options: Partial<ImporterOptions> = {}): ZoteroImporter {
    return new ZoteroImporter({
      client,
      source: new FakeSource(data),
      checkpoint,
      batchSize: 2,
      ...options,
    });
  }

  async function importAll(target: ZoteroImporter, data: FakeSourceData): Promise<boolean[]> {
    const results: boolean[] = [];
    for (const pub of data.publications ?? []) {
      results.push(await target.addPublication(pub));
    }
    await target.close();
    return results;
  }

  describe('batching', () => {
    it('should submit full batches and the remainder on close', async () => {
      const data = { publications: publications(3) };
      const subject = importer(data);

      await importAll(subject, data);

      expect(client.itemCalls.map(call => call.items.length)).toEqual([2, 1]);
      expect(client.itemCalls[0].items.map(item => item.title)).toEqual(['Publication 1', 'Publication 2']);
      expect(subject.stats).toMatchObject({ enqueued: 3, batches: 2, created: 3, failed: 0 });
      expect([1, 2, 3].every(id => checkpoint.contains(id))).toBe(true);
    });

    it('should submit nothing when closing an empty batch', async () => {
      const subject = importer({});

      await subject.close();

      expect(client.createCalls).toEqual([]);
      expect(subject.stats.batches).toBe(0);
    });

    it('should map the publication type to the item type', async () => {
      const data = { publications: [makePublication({ ROWID: 1, subtype: 0 })] };

      await importAll(importer(data), data);

      expect(client.itemCalls[0].items[0].itemType).toBe('book');
    });
  });

  describe('resume', () => {
    it('should skip publications already imported', async () => {
      checkpoint.add(1);
      await checkpoint.commit();
      const data = { publications: publications(2) };
      const subject = importer(data);

      const results = await importAll(subject, data);

      expect(results).toEqual([false, true]);
      expect(client.itemCalls[0].items.map(item => item.title)).toEqual(['Publication 2']);
      expect(subject.stats.skipped).toBe(1);
    });

    it('should skip previously failed publications unless retrying', async () => {
      checkpoint.addFailed(1);
      await checkpoint.commit();
      const data = { publications: publications(1) };

      expect(await importAll(importer(data), data)).toEqual([false]);
      expect(client.createCalls).toEqual([]);
    });

    it('should retry previously failed publications when asked', async () => {
      checkpoint.addFailed(1);
      await checkpoint.commit();
      const data = { publications: publications(1) };

      expect(await importAll(importer(data, { retryFailed: true }), data)).toEqual([true]);
      expect(checkpoint.contains(1)).toBe(true);
      expect(checkpoint.containsFailed(1)).toBe(false);
    });
  });

  describe('per-position results', () => {
    it('should mark only the failed position as failed', async () => {
      const data: FakeSourceData = {
        publications: publications(3).map(pub => ({ ...pub, notes: `note ${pub.ROWID}` })),
      };
      const keys = allSucceed();
      client.onCreate = (items, parentKey): CreateItemsResult => {
        if (parentKey !== undefined) {
          return keys(items, parentKey);
        }
        return {
          success: { '0': 'KEYA', '2': 'KEYC' },
          unchanged: {},
          failed: { '1': { code: 400, message: 'Invalid field' } },
        };
      };
      const subject = importer(data, { batchSize: 3 });

      await importAll(subject, data);

      expect(checkpoint.contains(1)).toBe(true);
      expect(checkpoint.contains(2)).toBe(false);
      expect(checkpoint.containsFailed(2)).toBe(true);
      expect(checkpoint.contains(3)).toBe(true);
      expect(client.childCalls.map(call => call.parentKey)).toEqual(['KEYA', 'KEYC']);
      expect(client.childCalls[1].items[0].note).toBe('note 3');
      expect(subject.stats).toMatchObject({ created: 2, failed: 1 });
    });

    it('should treat unchanged items as imported', async () => {
      const data = { publications: [makePublication({ ROWID: 1, notes: 'kept' })] };
      client.onCreate = (_items, parentKey): CreateItemsResult =>
        parentKey === undefined
          ? { success: {}, unchanged: { '0': 'OLDKEY' }, failed: {} }
          : { success: { '0': 'NOTE1' }, unchanged: {}, failed: {} };
      const subject = importer(data);

      await importAll(subject, data);

      expect(checkpoint.contains(1)).toBe(true);
      expect(client.childCalls[0].parentKey).toBe('OLDKEY');
      expect(subject.stats.unchanged).toBe(1);
    });

    it('should mark a position with no result as failed', async () => {
      const data = { publications: publications(2) };
      client.onCreate = () => ({ success: { '0': 'KEYA' }, unchanged: {}, failed: {} });
      const subject = importer(data);

      await importAll(subject, data);

      expect(checkpoint.contains(1)).toBe(true);
      expect(checkpoint.containsFailed(2)).toBe(true);
      expect(subject.stats.failed).toBe(1);
    });
  });

  describe('failures', () => {
    it('should roll back the batch when submission throws', async () => {
      const data = { publications: publications(2) };
      client.onCreate = () => {
        throw new Error('connection reset');
      };
      const subject = importer(data);

      await subject.addPublication(data.publications[0]);
      await expect(subject.addPublication(data.publications[1])).rejects.toThrow('connection reset');

      expect(checkpoint.pending).toEqual([]);
      expect(checkpoint.importedCount).toBe(0);
      await expect(fs.access(checkpoint.filePath)).rejects.toThrow();
    });

    it('should mark the publication failed when its notes cannot be created', async () => {
      const data = { publications: [makePublication({ ROWID: 1, notes: 'a note' })] };
      const keys = allSucceed();
      client.onCreate = (items, parentKey) => {
        if (parentKey !== undefined) {
          throw new Error('note rejected');
        }
        return keys(items, parentKey);
      };
      const subject = importer(data);

      await importAll(subject, data);

      expect(checkpoint.contains(1)).toBe(false);
      expect(checkpoint.containsFailed(1)).toBe(true);
      expect(subject.stats).toMatchObject({ created: 1, dependentFailures: 1 });
    });

    it('should keep going after one publication cannot be converted', async () => {
      const data = { publications: [makePublication({ ROWID: 1, subtype: 9999 }), makePublication({ ROWID: 2 })] };
      const subject = importer(data);

      await expect(subject.addPublication(data.publications[0])).rejects.toThrow('Unsupported publication type code 9999');
      await subject.addPublication(data.publications[1]);
      await subject.close();

      expect(checkpoint.contains(1)).toBe(false);
      expect(checkpoint.contains(2)).toBe(true);
    });

    it('should refuse publications after close', async () => {
      const subject = importer({});
      await subject.close();

      await expect(subject.addPublication(makePublication())).rejects.toThrow('Importer is closed');
    });
  });

  describe('item content', () => {
    it('should add collection, cited and rating tags', async () => {
      const data: FakeSourceData = {
        publications: [makePublication({ ROWID: 1, citekey: 'abe2008', rating: 3 })],
        collections: [{ ROWID: 1, name: 'Reading', type: 0 }],
        memberships: { 1: ['Reading'] },
      };

      await importAll(importer(data), data);

      expect(client.itemCalls[0].items[0].tags).toEqual([{ tag: 'C:Reading' }, { tag: '&cited' }, { tag: '⭐⭐⭐' }]);
    });

    it('should turn the notes column and own reviews into notes', async () => {
      const data: FakeSourceData = {
        publications: [makePublication({ ROWID: 1, notes: 'Read twice' })],
        reviews: {
          1: [
            { content: 'Solid method', rating: 4, is_mine: true },
            { content: 'Someone else', rating: 1, is_mine: false },
          ],
        },
      };

      await importAll(importer(data), data);

      expect(client.childCalls[0].items.map(item => item.note)).toEqual(['Read twice', 'Solid method Rating: 4']);
    });

    it('should include other reviewers when all reviews are requested', async () => {
      const data: FakeSourceData = {
        publications: [makePublication({ ROWID: 1 })],
        reviews: { 1: [{ content: 'Someone else', rating: null, is_mine: false }] },
      };

      await importAll(importer(data, { allReviews: true }), data);

      expect(client.childCalls[0].items.map(item => item.note)).toEqual(['Someone else Rating: 0']);
    });
  });

  describe('collections', () => {
    const data: FakeSourceData = {
      collections: [
        { ROWID: 1, name: 'Reading', type: 0 },
        { ROWID: 2, name: 'Thesis', type: 0 },
      ],
    };

    it('should create missing collections and map every selected one', async () => {
      client.remoteCollections.push({ key: 'EXIST1', data: { key: 'EXIST1', name: 'Reading' } });
      const subject = importer(data);

      await subject.loadCollections(null);

      expect(client.remoteCollections.map(collection => collection.data.name)).toEqual(['Reading', 'Thesis']);
      expect([...subject.extractionContext.collections]).toEqual([
        ['Reading', 'EXIST1'],
        ['Thesis', 'COLL2'],
      ]);
    });

    it('should map nothing for an empty selection', async () => {
      const subject = importer(data);

      await subject.loadCollections([]);

      expect(subject.extractionContext.collections.size).toBe(0);
      expect(client.remoteCollections).toEqual([]);
    });

    it('should use placeholders in a dry run', async () => {
      const subject = importer(data, { dryRun: new DryRunWriter(new PassThrough()) });

      await subject.loadCollections(['Thesis']);

      expect([...subject.extractionContext.collections]).toEqual([['Thesis', '<Thesis>']]);
      expect(client.remoteCollections).toEqual([]);
    });
  });

  describe('dry run', () => {
    it('should print each payload instead of submitting and record nothing', async () => {
      const chunks: string[] = [];
      const output = new Writable({
        write(chunk, _encoding, callback) {
          chunks.push(String(chunk));
          callback();
        },
      });
      const data = { publications: [makePublication({ ROWID: 1, title: 'Dry' })] };
      const subject = importer(data, { dryRun: new DryRunWriter(output) });

      await importAll(subject, data);

      const text = chunks.join('');
      expect(text.startsWith('ITEM:\n{\n    "itemType": "journalArticle",\n')).toBe(true);
      expect(text).toContain('    "title": "Dry",\n');
      expect(text.endsWith('NOTES:\n[]\nATTACHMENTS:\n[]\n')).toBe(true);
      expect(client.createCalls).toEqual([]);
      expect(checkpoint.contains(1)).toBe(false);
      expect(checkpoint.pending).toEqual([]);
    });
  });

  describe('attachments', () => {
    const attachment = { path: '/library/Papers2/Articles/Abe/paper.pdf', mimeType: 'application/pdf' };

    it('should upload attachments when not linking', async () => {
      const data: FakeSourceData = { publications: [makePublication({ ROWID: 1 })], attachments: { 1: [attachment] } };

      await importAll(importer(data), data);

      expect(client.uploadCalls).toEqual([{ paths: [attachment.path], parentKey: 'ITEM1' }]);
      expect(checkpoint.contains(1)).toBe(true);
    });

    it('should mark the publication failed when an upload throws', async () => {
      const data: FakeSourceData = { publications: [makePublication({ ROWID: 1 })], attachments: { 1: [attachment] } };
      client.onUpload = () => {
        throw new Error('upload refused');
      };

      await importAll(importer(data), data);

      expect(checkpoint.containsFailed(1)).toBe(true);
    });

    it('should skip attachments of read publications in unread mode', async () => {
      const data: FakeSourceData = {
        publications: [makePublication({ ROWID: 1, times_read: 2 }), makePublication({ ROWID: 2 })],
        attachments: { 1: [attachment], 2: [attachment] },
      };

      await importAll(importer(data, { attachments: 'unread' }), data);

      expect(client.uploadCalls.map(call => call.parentKey)).toEqual(['ITEM2']);
    });

    it('should skip attachments entirely in none mode', async () => {
      const data: FakeSourceData = { publications: [makePublication({ ROWID: 1 })], attachments: { 1: [attachment] } };

      await importAll(importer(data, { attachments: 'none' }), data);

      expect(client.uploadCalls).toEqual([]);
    });

    describe('linked', () => {
      let papersFolder: string;
      let filePath: string;

      beforeEach(async () => {
        papersFolder = path.join(dir, 'Papers2');
        filePath = path.join(papersFolder, 'Articles', 'Abe', 'paper.pdf');
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, 'pdf');
      });

      function linkedImporter(data: FakeSourceData, relocator: AttachmentRelocator): ZoteroImporter {
        return new ZoteroImporter({
          client,
          source: new FakeSource(data, papersFolder),
          checkpoint,
          linkedAttachmentBase: path.join(dir, 'links'),
          relocator,
        });
      }

      it('should create a linked file item and move the file where it points', async () => {
        const relocator = new RecordingRelocator();
        const data: FakeSourceData = {
          publications: [makePublication({ ROWID: 1 })],
          attachments: { 1: [{ path: filePath, mimeType: 'application/pdf' }] },
        };

        await importAll(linkedImporter(data, relocator), data);

        const link = client.childCalls[0];
        expect(link.parentKey).toBe('ITEM1');
        expect(link.items[0]).toMatchObject({
          itemType: 'attachment',
          linkMode: 'linked_file',
          path: 'attachments:Journal Article/A/paper.pdf',
          contentType: 'application/pdf',
          title: 'paper.pdf',
          tags: [],
        });
        expect(link.items[0].accessDate).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/);
        expect(relocator.moves).toEqual([['Articles/Abe/paper.pdf', 'Journal Article/A/paper.pdf']]);
        expect(client.uploadCalls).toEqual([]);
        expect(checkpoint.contains(1)).toBe(true);
      });

      it('should mark the publication failed when the move fails', async () => {
        const data: FakeSourceData = {
          publications: [makePublication({ ROWID: 1 })],
          attachments: { 1: [{ path: filePath, mimeType: 'application/pdf' }] },
        };

        await importAll(linkedImporter(data, new RecordingRelocator(false)), data);

        expect(checkpoint.containsFailed(1)).toBe(true);
      });

      it('should not move a file that does not exist', async () => {
        const relocator = new RecordingRelocator();
        const missing = path.join(papersFolder, 'Articles', 'Abe', 'missing.pdf');
        const data: FakeSourceData = {
          publications: [makePublication({ ROWID: 1 })],
          attachments: { 1: [{ path: missing, mimeType: 'application/pdf' }] },
        };

        await importAll(linkedImporter(data, relocator), data);

        expect(client.childCalls[0].items[0].accessDate).toBe('');
        expect(relocator.moves).toEqual([]);
        expect(checkpoint.containsFailed(1)).toBe(true);
      });

      it('should tag supplemental files', async () => {
        const supplement = path.join(papersFolder, 'Articles', 'Abe', 'Abe 2008', 'Supplemental', 'table.csv');
        await fs.mkdir(path.dirname(supplement), { recursive: true });
        await fs.writeFile(supplement, 'a,b');
        const relocator = new RecordingRelocator();
        const data: FakeSourceData = {
          publications: [makePublication({ ROWID: 1 })],
          attachments: { 1: [{ path: supplement, mimeType: 'text/csv' }] },
        };

        await importAll(linkedImporter(data, relocator), data);

        expect(client.childCalls[0].items[0]).toMatchObject({
          path: 'attachments:Journal Article/A/Abe 2008/Supplement-table.csv',
          title: 'Supplement-table.csv',
          tags: [{ tag: '&SUPP' }],
        });
        expect(relocator.moves).toEqual([
          ['Articles/Abe/Abe 2008/Supplemental/table.csv', 'Journal Article/A/Abe 2008/Supplement-table.csv'],
        ]);
      });
    });
  });
});
