import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  MigrationConfigError,
  buildLabelMap,
  collectionSelection,
  loadConfigFile,
  parseLabelPairs,
  parseList,
  redactConfig,
  resolveMigrationConfig,
  resolvePubTypes,
} from '../../lib/migration/config';
import { UnsupportedSourceDataError } from '../../lib/papers/errors';

describe('migration config', () => {
  describe('parsers', () => {
    it('should split comma separated lists', () => {
      expect(parseList('Book, Journal Article,,')).toEqual(['Book', 'Journal Article']);
      expect(parseList(['a'])).toEqual(['a']);
    });

    it('should parse colour to tag pairs', () => {
      expect(parseLabelPairs('Red=urgent, Blue=read,Gray=')).toEqual({ Red: 'urgent', Blue: 'read', Gray: '' });
    });

    it('should reject a pair without a tag', () => {
      expect(() => parseLabelPairs('Red')).toThrow('expected <color>=<tag>');
    });
  });

  describe('resolveMigrationConfig', () => {
    it('should apply defaults', () => {
      const config = resolveMigrationConfig({});

      expect(config).toMatchObject({
        papers2Folder: '~/Papers2',
        batchSize: 50,
        checkpointFile: 'papers2zotero.checkpoint.json',
        errorsFile: 'papers2zotero_errors.log',
        dryrun: null,
        attachments: 'all',
        keywordTypes: ['user', 'auto', 'label'],
        labelTagsPrefix: 'Label',
        cloudSourceRoot: '/Papers2',
        cloudTargetRoot: '/Zotero',
        logLevel: 'WARN',
      });
    });

    it('should let later layers win and skip undefined values', () => {
      const config = resolveMigrationConfig(
        { batchSize: 10, author: 'Abe' },
        { batchSize: '25', author: undefined, rowIds: '3,1' }
      );

      expect(config.batchSize).toBe(25);
      expect(config.author).toBe('Abe');
      expect(config.rowIds).toEqual([3, 1]);
    });

    it('should normalize log levels', () => {
      expect(resolveMigrationConfig({ logLevel: 'debug', httpLogLevel: 'warning' })).toMatchObject({
        logLevel: 'DEBUG',
        httpLogLevel: 'WARN',
      });
    });

    it('should list every invalid parameter', () => {
      let error: unknown;
      try {
        resolveMigrationConfig({ batchSize: 0, attachments: 'some' });
      } catch (caught) {
        error = caught;
      }

      expect(error).toBeInstanceOf(MigrationConfigError);
      expect(String(error)).toContain('batchSize');
      expect(String(error)).toContain('attachments');
    });

    it('should report a malformed label map as a config error', () => {
      expect(() => resolveMigrationConfig({ labelMap: 'Red' })).toThrow(MigrationConfigError);
    });
  });

  describe('buildLabelMap', () => {
    it('should prefix colours, never tag None and apply overrides', () => {
      const labels = buildLabelMap('Label', { red: 'urgent', Gray: '' });

      expect(labels.get('None')).toBeNull();
      expect(labels.get('Red')).toBe('urgent');
      expect(labels.get('Gray')).toBeNull();
      expect(labels.get('Blue')).toBe('LabelBlue');
      expect(labels.size).toBe(8);
    });

    it('should not let an override tag None', () => {
      expect(buildLabelMap('L', { None: 'x' }).get('None')).toBeNull();
    });

    it('should reject unknown colours', () => {
      expect(() => buildLabelMap('L', { Magenta: 'x' })).toThrow(UnsupportedSourceDataError);
    });
  });

  describe('selection helpers', () => {
    it('should select all, none or the named collections', () => {
      expect(collectionSelection(resolveMigrationConfig({}))).toBeNull();
      expect(collectionSelection(resolveMigrationConfig({ noCollections: true }))).toEqual([]);
      expect(collectionSelection(resolveMigrationConfig({ includeCollections: 'A,B' }))).toEqual(['A', 'B']);
    });

    it('should resolve type names and keys', () => {
      expect(resolvePubTypes(['Journal Article', 'book_section'])).toEqual(['JOURNAL_ARTICLE', 'BOOK_SECTION']);
      expect(resolvePubTypes(undefined)).toBeUndefined();
    });

    it('should hide the API key', () => {
      const config = resolveMigrationConfig({ apiKey: 'test-secret' });

      expect(redactConfig(config).apiKey).toBe('[REDACTED]');
    });
  });

  describe('loadConfigFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should read a JSON object of parameters', async () => {
      const file = path.join(dir, 'run.json');
      await fs.writeFile(file, JSON.stringify({ batchSize: 5, types: ['Book'] }));

      const layer = await loadConfigFile(file);

      expect(resolveMigrationConfig(layer)).toMatchObject({ batchSize: 5, types: ['Book'] });
    });

    it('should reject a file that is not a JSON object', async () => {
      const file = path.join(dir, 'run.json');
      await fs.writeFile(file, '[1, 2]');

      await expect(loadConfigFile(file)).rejects.toBeInstanceOf(MigrationConfigError);
    });
  });
});
