/**
 * Checkpoint persistence tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { Checkpoint } from '../../lib/migration/checkpoint';
import { CheckpointError, CheckpointPersistenceError } from '../../lib/migration/errors';

async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, 'utf8'));
}

describe('Checkpoint', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'checkpoint-'));
    file = path.join(dir, 'run.checkpoint.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should start empty when the file does not exist', async () => {
      const checkpoint = await Checkpoint.load(file);

      expect(checkpoint.importedCount).toBe(0);
      expect(checkpoint.failedIds()).toEqual([]);
      expect(checkpoint.contains(1)).toBe(false);
    });

    it('should read imported and failed ids', async () => {
      await fs.writeFile(file, JSON.stringify({ version: 1, imported: [3, 1], failed: [7] }));

      const checkpoint = await Checkpoint.load(file);

      expect(checkpoint.contains(1)).toBe(true);
      expect(checkpoint.contains(3)).toBe(true);
      expect(checkpoint.containsFailed(7)).toBe(true);
      expect(checkpoint.importedCount).toBe(2);
    });

    it('should recover from the backup when the main file is corrupt', async () => {
      await fs.writeFile(file, '{"version": 1, "imported": [');
      await fs.writeFile(`${file}.bak`, JSON.stringify({ version: 1, imported: [5], failed: [] }));

      const checkpoint = await Checkpoint.load(file);

      expect(checkpoint.contains(5)).toBe(true);
    });

    it('should throw CheckpointError when the file is corrupt and there is no backup', async () => {
      await fs.writeFile(file, 'not json');

      await expect(Checkpoint.load(file)).rejects.toBeInstanceOf(CheckpointError);
    });

    it('should throw CheckpointError for a file in the wrong format', async () => {
      await fs.writeFile(file, JSON.stringify({ version: 2, ids: [1] }));

      await expect(Checkpoint.load(file)).rejects.toBeInstanceOf(CheckpointError);
    });
  });

  describe('commit', () => {
    it('should not count staged ids until committed', async () => {
      const checkpoint = await Checkpoint.load(file);

      checkpoint.add(1);
      checkpoint.add(2);

      expect(checkpoint.contains(1)).toBe(false);
      expect(checkpoint.pending).toEqual([1, 2]);
      await expect(fs.access(file)).rejects.toThrow();
    });

    it('should persist staged ids that did not fail', async () => {
      const checkpoint = await Checkpoint.load(file);
      checkpoint.add(1);
      checkpoint.add(2);
      checkpoint.add(3);
      checkpoint.addFailed(2);

      await checkpoint.commit();

      expect(checkpoint.contains(1)).toBe(true);
      expect(checkpoint.contains(2)).toBe(false);
      expect(checkpoint.containsFailed(2)).toBe(true);
      expect(checkpoint.pending).toEqual([]);
      expect(await readJson(file)).toEqual({ version: 1, imported: [1, 3], failed: [2] });
    });

    it('should survive a reload', async () => {
      const first = await Checkpoint.load(file);
      first.add(10);
      first.add(11);
      first.addFailed(11);
      await first.commit();

      const second = await Checkpoint.load(file);

      expect(second.contains(10)).toBe(true);
      expect(second.containsFailed(11)).toBe(true);
      expect(second.contains(11)).toBe(false);
    });

    it('should clear a previous failure when the id is imported on retry', async () => {
      await fs.writeFile(file, JSON.stringify({ version: 1, imported: [], failed: [4] }));
      const checkpoint = await Checkpoint.load(file);

      checkpoint.add(4);
      expect(checkpoint.containsFailed(4)).toBe(false);
      await checkpoint.commit();

      expect(checkpoint.contains(4)).toBe(true);
      expect(checkpoint.failedIds()).toEqual([]);
    });

    it('should keep an already imported id imported when it fails later', async () => {
      await fs.writeFile(file, JSON.stringify({ version: 1, imported: [8], failed: [] }));
      const checkpoint = await Checkpoint.load(file);

      checkpoint.addFailed(8);
      await checkpoint.commit();

      expect(checkpoint.contains(8)).toBe(true);
      expect(checkpoint.containsFailed(8)).toBe(false);
    });

    it('should keep the previous file as a backup', async () => {
      const checkpoint = await Checkpoint.load(file);
      checkpoint.add(1);
      await checkpoint.commit();
      checkpoint.add(2);
      await checkpoint.commit();

      expect(await readJson(checkpoint.backupPath)).toEqual({ version: 1, imported: [1], failed: [] });
      expect(await readJson(file)).toEqual({ version: 1, imported: [1, 2], failed: [] });
    });

    it('should leave no temporary files behind', async () => {
      const checkpoint = await Checkpoint.load(file);
      checkpoint.add(1);
      await checkpoint.commit();

      const entries = await fs.readdir(dir);
      expect(entries.filter(name => name.endsWith('.tmp'))).toEqual([]);
    });

    it('should throw CheckpointPersistenceError and keep state when the file cannot be written', async () => {
      const checkpoint = await Checkpoint.load(file);
      // A directory in place of the file makes the final rename fail
      await fs.mkdir(path.join(file, 'occupied'), { recursive: true });
      checkpoint.add(1);

      await expect(checkpoint.commit()).rejects.toBeInstanceOf(CheckpointPersistenceError);
      expect(checkpoint.contains(1)).toBe(false);
      expect(checkpoint.pending).toEqual([1]);
    });
  });

  describe('rollback', () => {
    it('should drop staged ids', async () => {
      const checkpoint = await Checkpoint.load(file);
      checkpoint.add(1);
      checkpoint.add(2);

      checkpoint.rollback();
      await checkpoint.commit();

      expect(checkpoint.contains(1)).toBe(false);
      expect(checkpoint.importedCount).toBe(0);
    });
  });
});
