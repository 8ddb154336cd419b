/**
 * Papers2 library reader
 *
 * Opens `Library.papers2/Database.papersdb` read-only and exposes the
 * publication stream plus the lookups the field extractors need.
 */

import path from 'path';
import os from 'os';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { emitLog } from '../migration/logging';
import { LogLevel } from '../migration/log-config';
import {
  IdSourceCode,
  KeywordTypeCode,
  LabelName,
  PubTypeKey,
  allPubTypeCodes,
  labelFromCode,
  pubTypeCode,
  pubTypeFromCode,
} from './schema';
import {
  Attachment,
  AttachmentRowSchema,
  Author,
  AuthorSchema,
  Collection,
  CollectionSchema,
  Keyword,
  KeywordSchema,
  Publication,
  PublicationFilter,
  PublicationSchema,
  PublicationStore,
  Review,
  ReviewSchema,
  SyncEvent,
  SyncEventSchema,
} from './types';

export const DATABASE_RELATIVE_PATH = path.join('Library.papers2', 'Database.papersdb');

/** Collection types holding user collections (plain and smart) */
const USER_COLLECTION_TYPES = [0, 5];

export interface Papers2DatabaseOptions {
  /** Pre-opened connection, used instead of the library file */
  database?: Database.Database;
  /** Threshold for SQL statement logging */
  sqlLogLevel?: LogLevel;
}

/**
 * Expand a leading `~` and resolve to an absolute path
 */
export function resolveFolder(folder: string): string {
  const expanded = folder === '~' || folder.startsWith(`~${path.sep}`) || folder.startsWith('~/')
    ? path.join(os.homedir(), folder.slice(1))
    : folder;
  return path.resolve(expanded);
}

function parseRows<T extends z.ZodTypeAny>(schema: T, rows: unknown[]): z.output<T>[] {
  return rows.map(row => schema.parse(row));
}

function placeholders(values: readonly unknown[]): string {
  return values.map(() => '?').join(', ');
}

export class Papers2Database implements PublicationStore {
  readonly folder: string;
  private readonly db: Database.Database;
  private readonly bundleCache = new Map<string, Publication | null>();

  constructor(folder = '~/Papers2', options: Papers2DatabaseOptions = {}) {
    this.folder = resolveFolder(folder);
    const sqlLogLevel = options.sqlLogLevel ?? 'WARN';
    const verbose = (message?: unknown) => {
      emitLog('DEBUG', 'SQL', { sql: String(message) }, sqlLogLevel);
    };

    this.db = options.database
      ?? new Database(path.join(this.folder, DATABASE_RELATIVE_PATH), {
        readonly: true,
        fileMustExist: true,
        verbose: sqlLogLevel === 'DEBUG' ? verbose : undefined,
      });
  }

  private buildFilter(filter: PublicationFilter): { where: string; params: unknown[] } {
    const criteria: string[] = [];
    const params: unknown[] = [];

    if (filter.rowIds !== undefined) {
      criteria.push(`ROWID IN (${placeholders(filter.rowIds)})`);
      params.push(...filter.rowIds);
    }

    if (filter.author !== undefined) {
      criteria.push(`full_author_string LIKE ? ESCAPE '\\'`);
      params.push(`%${filter.author.replace(/[\\%_]/g, match => `\\${match}`)}%`);
    }

    const codes = filter.types !== undefined
      ? filter.types.map(pubTypeCode)
      : allPubTypeCodes();
    criteria.push(`subtype IN (${placeholders(codes)})`);
    params.push(...codes);

    if (!filter.includeDeleted) {
      criteria.push('IFNULL(marked_deleted, 0) = 0');
    }
    if (filter.includeDuplicates === false) {
      criteria.push('IFNULL(marked_duplicate, 0) = 0');
    }
    if (!filter.includeManuscripts) {
      criteria.push('IFNULL(manuscript, 0) = 0');
    }

    return { where: criteria.join(' AND '), params };
  }

  getPublications(filter: PublicationFilter = {}): Publication[] {
    const { where, params } = this.buildFilter(filter);
    const rows = this.db
      .prepare(`SELECT ROWID AS ROWID, * FROM Publication WHERE ${where} ORDER BY ROWID`)
      .all(...params);
    return parseRows(PublicationSchema, rows);
  }

  countPublications(filter: PublicationFilter = {}): number {
    const { where, params } = this.buildFilter(filter);
    const row = this.db
      .prepare(`SELECT COUNT(*) AS count FROM Publication WHERE ${where}`)
      .get(...params);
    return z.object({ count: z.number() }).parse(row).count;
  }

  getPublication(id: number): Publication | null {
    const row = this.db
      .prepare('SELECT ROWID AS ROWID, * FROM Publication WHERE ROWID = ?')
      .get(id);
    return row === undefined ? null : PublicationSchema.parse(row);
  }

  /**
   * Parent container (journal, edited volume) linked through `bundle`.
   * A non-numeric or dangling link yields null.
   */
  getBundle(pub: Publication): Publication | null {
    if (pub.bundle === null || !/^-?\d+$/.test(pub.bundle.trim())) {
      return null;
    }
    const cached = this.bundleCache.get(pub.bundle);
    if (cached !== undefined) {
      return cached;
    }
    const bundle = this.getPublication(parseInt(pub.bundle, 10));
    this.bundleCache.set(pub.bundle, bundle);
    return bundle;
  }

  getPubType(pub: Publication): PubTypeKey {
    return pubTypeFromCode(pub.subtype);
  }

  getLabelName(pub: Publication): LabelName {
    return labelFromCode(pub.label);
  }

  getPubAuthors(pub: Publication): Author[] {
    const rows = this.db
      .prepare(
        `SELECT Author.prename AS prename, Author.surname AS surname, Author.initial AS initial,
                Author.fullname AS fullname, Author.affiliation AS affiliation,
                Author.institutional AS institutional, OrderedAuthor.type AS type
           FROM Author
           JOIN OrderedAuthor ON Author.ROWID = OrderedAuthor.author_id
          WHERE OrderedAuthor.object_id = ?
          ORDER BY OrderedAuthor.priority`
      )
      .all(pub.ROWID);
    return parseRows(AuthorSchema, rows);
  }

  getIdentifiers(pub: Publication, source: IdSourceCode): SyncEvent[] {
    const rows = this.db
      .prepare('SELECT source_id, remote_id, updated_at FROM SyncEvent WHERE device_id = ? AND source_id = ?')
      .all(pub.uuid, source);
    return parseRows(SyncEventSchema, rows);
  }

  /**
   * Remote ids that are URLs, newest first
   */
  getUrls(pub: Publication): SyncEvent[] {
    const rows = this.db
      .prepare(
        `SELECT source_id, remote_id, updated_at FROM SyncEvent
          WHERE device_id = ? AND remote_id LIKE 'http%'
          ORDER BY updated_at DESC`
      )
      .all(pub.uuid);
    return parseRows(SyncEventSchema, rows);
  }

  /**
   * Attachments with the primary file first, paths resolved against the library folder
   */
  getAttachments(pub: Publication): Attachment[] {
    const rows = this.db
      .prepare('SELECT path, mime_type, is_primary FROM PDF WHERE object_id = ? ORDER BY is_primary DESC')
      .all(pub.ROWID);
    const pubType = this.getPubType(pub);

    return parseRows(AttachmentRowSchema, rows).flatMap(row =>
      row.path === null
        ? []
        : [{ path: path.join(this.folder, row.path), mimeType: row.mime_type, pubType }]
    );
  }

  getKeywords(pub: Publication, type?: KeywordTypeCode): Keyword[] {
    const typeClause = type === undefined ? '' : ' AND KeywordItem.type = ?';
    const params: unknown[] = type === undefined ? [pub.ROWID] : [pub.ROWID, type];
    const rows = this.db
      .prepare(
        `SELECT Keyword.name AS name FROM Keyword
           JOIN KeywordItem ON Keyword.ROWID = KeywordItem.keyword_id
          WHERE KeywordItem.object_id = ?${typeClause}`
      )
      .all(...params);
    return parseRows(KeywordSchema, rows);
  }

  /**
   * User collections, optionally only those containing `pub`
   */
  getCollections(pub?: Publication): Collection[] {
    const types = placeholders(USER_COLLECTION_TYPES);
    const rows = pub === undefined
      ? this.db
        .prepare(`SELECT ROWID AS ROWID, name, type FROM Collection WHERE type IN (${types})`)
        .all(...USER_COLLECTION_TYPES)
      : this.db
        .prepare(
          `SELECT Collection.ROWID AS ROWID, Collection.name AS name, Collection.type AS type
             FROM Collection
             JOIN CollectionItem ON Collection.ROWID = CollectionItem.collection
            WHERE CollectionItem.object_id = ? AND Collection.type IN (${types})`
        )
        .all(pub.ROWID, ...USER_COLLECTION_TYPES);
    return parseRows(CollectionSchema, rows);
  }

  getReviews(pub: Publication, mineOnly = true): Review[] {
    const rows = this.db
      .prepare(
        `SELECT content, rating, is_mine FROM Review WHERE object_id = ?${mineOnly ? ' AND is_mine = 1' : ''}`
      )
      .all(pub.ROWID);
    return parseRows(ReviewSchema, rows);
  }

  close(): void {
    this.db.close();
  }
}
