/**
 * Migration run loop and wiring
 */

import { Papers2Database, resolveFolder } from '../papers/database';
import { PublicationFilter, PublicationStore } from '../papers/types';
import { createDriveRelocator } from '../relocation/gdrive/drive-relocator';
import { LocalRelocator } from '../relocation/local';
import { AttachmentRelocator } from '../relocation/types';
import { ZoteroWebClient } from '../zotero/client';
import { loadZoteroConfig } from '../zotero/config';
import { ZoteroConfigError } from '../zotero/errors';
import { setZoteroLogLevel } from '../zotero/logging';
import { OfflineTemplateClient } from '../zotero/offline';
import { ZoteroLibraryClient } from '../zotero/types';
import { Checkpoint } from './checkpoint';
import {
  MigrationConfig,
  buildLabelMap,
  collectionSelection,
  keywordKinds,
  redactConfig,
  resolvePubTypes,
} from './config';
import { DryRunWriter } from './dry-run-writer';
import { isFatalRunError } from './errors';
import { ImportStats, ZoteroImporter } from './importer';
import { configureLogging } from './log-config';
import { closeErrorLog, errorMessage, logger, logRecordEvent, openErrorLog } from './logging';

export interface RunSummary {
  considered: number;
  enqueued: number;
  skipped: number;
  errored: number;
  halted: boolean;
  haltReason?: string;
  stats: ImportStats;
}

export interface RunLoopOptions {
  filter?: PublicationFilter;
  maxPubs?: number;
}

/**
 * Feed publications to the importer one at a time. A failing publication is
 * logged and skipped; errors that would repeat for every later batch halt the run.
 */
export async function runMigration(
  store: PublicationStore,
  importer: ZoteroImporter,
  options: RunLoopOptions = {}
): Promise<RunSummary> {
  const filter = options.filter ?? {};
  let maxPubs = options.maxPubs;
  if (filter.rowIds !== undefined) {
    maxPubs = Math.min(maxPubs ?? filter.rowIds.length, filter.rowIds.length);
  }

  const summary: RunSummary = {
    considered: 0,
    enqueued: 0,
    skipped: 0,
    errored: 0,
    halted: false,
    stats: importer.stats,
  };

  const halt = (error: unknown) => {
    summary.halted = true;
    summary.haltReason = errorMessage(error);
    logger.error('Halting migration', { error: summary.haltReason });
  };

  for (const pub of store.getPublications(filter)) {
    if (maxPubs !== undefined && summary.enqueued >= maxPubs) {
      logger.warn('Ending after max-pubs records', { maxPubs });
      break;
    }

    summary.considered++;
    try {
      if (await importer.addPublication(pub)) {
        logRecordEvent('DEBUG', 'Added to batch', pub.ROWID, { title: pub.title });
        summary.enqueued++;
      } else {
        summary.skipped++;
      }
    } catch (error) {
      summary.errored++;
      logRecordEvent('ERROR', 'Error converting publication to Zotero', pub.ROWID, {
        title: pub.title,
        error: errorMessage(error),
      });
      if (isFatalRunError(error)) {
        halt(error);
        break;
      }
    }
  }

  if (summary.halted) {
    await importer.abort();
  } else {
    try {
      await importer.close();
    } catch (error) {
      summary.errored++;
      logger.error('Error submitting final batch', { error: errorMessage(error) });
      if (isFatalRunError(error)) {
        halt(error);
      }
    }
  }

  logger.info('Migration finished', {
    considered: summary.considered,
    enqueued: summary.enqueued,
    skipped: summary.skipped,
    errored: summary.errored,
    halted: summary.halted,
  });
  return summary;
}

export interface MigrationDependencies {
  openStore?: (config: MigrationConfig) => PublicationStore;
  createClient?: (config: MigrationConfig) => ZoteroLibraryClient;
  createRelocator?: (config: MigrationConfig, store: PublicationStore) => Promise<AttachmentRelocator | null>;
}

function defaultClient(config: MigrationConfig): ZoteroLibraryClient {
  const overrides = {
    apiKey: config.apiKey,
    libraryId: config.libraryId,
    libraryType: config.libraryType,
    apiBase: config.apiBase,
  };
  if (config.dryrun === null) {
    return new ZoteroWebClient(loadZoteroConfig(overrides));
  }
  try {
    return new ZoteroWebClient(loadZoteroConfig(overrides));
  } catch (error) {
    if (!(error instanceof ZoteroConfigError)) {
      throw error;
    }
    logger.info('No Zotero credentials, dry run uses offline item templates');
    return new OfflineTemplateClient();
  }
}

/**
 * Relocator for linked attachments; none in dry runs or without a link base
 */
export async function defaultRelocator(
  config: MigrationConfig,
  store: PublicationStore
): Promise<AttachmentRelocator | null> {
  if (config.attachmentLinkBase === undefined || config.dryrun !== null) {
    return null;
  }
  if (config.attachmentCloud === 'gdrive') {
    return createDriveRelocator({
      clientSecretsFile: config.cloudAuthSettings,
      tokenFile: config.cloudTokenFile,
      sourceRoot: config.cloudSourceRoot,
      targetRoot: config.cloudTargetRoot,
    });
  }
  return new LocalRelocator({
    sourceRoot: store.folder,
    targetRoot: resolveFolder(config.attachmentLinkBase),
    mode: config.moveAttachments ? 'move' : 'copy',
  });
}

/**
 * Run a whole migration from resolved parameters
 */
export async function executeMigration(
  config: MigrationConfig,
  dependencies: MigrationDependencies = {}
): Promise<RunSummary> {
  configureLogging({ level: config.logLevel });
  setZoteroLogLevel(config.httpLogLevel);

  const isDryRun = config.dryrun !== null;
  if (!isDryRun) {
    await openErrorLog(config.errorsFile);
    logger.warn('Beginning papers2zotero', { config: redactConfig(config) });
  }

  const store = dependencies.openStore
    ? dependencies.openStore(config)
    : new Papers2Database(config.papers2Folder, { sqlLogLevel: config.sqlLogLevel });

  try {
    const checkpoint = isDryRun ? null : await Checkpoint.load(config.checkpointFile);
    if (checkpoint) {
      logger.warn('Checkpoint state', {
        imported: checkpoint.importedCount,
        failedIds: checkpoint.failedIds(),
      });
    }

    const client = (dependencies.createClient ?? defaultClient)(config);
    const relocator = await (dependencies.createRelocator ?? defaultRelocator)(config, store);

    const importer = new ZoteroImporter({
      client,
      source: store,
      checkpoint,
      batchSize: config.batchSize,
      attachments: config.attachments,
      linkedAttachmentBase: config.attachmentLinkBase ?? null,
      relocator,
      keywordTypes: keywordKinds(config),
      labelMap: buildLabelMap(config.labelTagsPrefix, config.labelMap),
      allReviews: config.allReviews,
      dryRun: config.dryrun !== null ? new DryRunWriter(config.dryrun) : null,
      retryFailed: config.retry,
    });

    try {
      await importer.loadCollections(collectionSelection(config));
    } catch (error) {
      await importer.abort();
      throw error;
    }

    return await runMigration(store, importer, {
      maxPubs: config.maxPubs,
      filter: {
        rowIds: config.rowIds,
        author: config.author,
        types: resolvePubTypes(config.types),
        includeDeleted: config.includeDeleted,
        includeDuplicates: !config.excludeDuplicates,
        includeManuscripts: config.includeManuscripts,
      },
    });
  } finally {
    store.close();
    await closeErrorLog();
  }
}
