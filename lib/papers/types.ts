/**
 * Papers2 row shapes
 *
 * Rows are validated on read. Free-text columns may hold numbers in older
 * libraries, so they are normalized to strings.
 */

import { z } from 'zod';
import { IdSourceCode, KeywordTypeCode, LabelName, PubTypeKey } from './schema';

const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform(value => (value === null || value === undefined ? null : String(value)));

const optionalNumber = z
  .number()
  .nullish()
  .transform(value => value ?? null);

const flag = z
  .union([z.number(), z.boolean()])
  .nullish()
  .transform(value => Boolean(value));

export const PublicationSchema = z.object({
  ROWID: z.number().int(),
  uuid: text,
  title: text,
  subtype: z.number().int(),
  bundle: text,
  bundle_string: text,
  doi: text,
  summary: text,
  imported_date: optionalNumber,
  publication_date: text,
  version: text,
  number: text,
  document_number: text,
  startpage: text,
  endpage: text,
  language: text,
  place: text,
  publisher: text,
  copyright: text,
  volume: text,
  citekey: text,
  notes: text,
  full_author_string: text,
  rating: optionalNumber.transform(value => value ?? 0),
  times_read: optionalNumber.transform(value => value ?? 0),
  label: optionalNumber,
  marked_deleted: flag,
  marked_duplicate: flag,
  manuscript: flag,
});

export type Publication = z.infer<typeof PublicationSchema>;

export const AuthorSchema = z.object({
  prename: text,
  surname: text,
  initial: text,
  fullname: text,
  affiliation: text,
  institutional: optionalNumber.transform(value => value ?? 0),
  type: z.number().int(),
});

export type Author = z.infer<typeof AuthorSchema>;

export const SyncEventSchema = z.object({
  source_id: text,
  remote_id: z.union([z.string(), z.number()]).transform(String),
  updated_at: optionalNumber,
});

export type SyncEvent = z.infer<typeof SyncEventSchema>;

export const AttachmentRowSchema = z.object({
  path: text,
  mime_type: text,
  is_primary: flag,
});

export interface Attachment {
  /** Absolute path under the Papers2 folder */
  path: string;
  mimeType: string | null;
  pubType: PubTypeKey;
}

export const KeywordSchema = z.object({
  name: z.union([z.string(), z.number()]).transform(String),
});

export type Keyword = z.infer<typeof KeywordSchema>;

export const CollectionSchema = z.object({
  ROWID: z.number().int(),
  name: z.string(),
  type: optionalNumber,
});

export type Collection = z.infer<typeof CollectionSchema>;

export const ReviewSchema = z.object({
  content: text,
  rating: optionalNumber,
  is_mine: flag,
});

export type Review = z.infer<typeof ReviewSchema>;

export interface PublicationFilter {
  rowIds?: number[];
  /** Case-insensitive substring of the full author string */
  author?: string;
  types?: PubTypeKey[];
  includeDeleted?: boolean;
  includeDuplicates?: boolean;
  includeManuscripts?: boolean;
}

/**
 * Read access to one source library, as used while mapping a publication
 */
export interface PublicationSource {
  readonly folder: string;
  getBundle(pub: Publication): Publication | null;
  getPubType(pub: Publication): PubTypeKey;
  getLabelName(pub: Publication): LabelName;
  getPubAuthors(pub: Publication): Author[];
  getIdentifiers(pub: Publication, source: IdSourceCode): SyncEvent[];
  getUrls(pub: Publication): SyncEvent[];
  getAttachments(pub: Publication): Attachment[];
  getKeywords(pub: Publication, type?: KeywordTypeCode): Keyword[];
  getCollections(pub?: Publication): Collection[];
  getReviews(pub: Publication, mineOnly?: boolean): Review[];
}

/**
 * Source library including the publication stream the runner drives
 */
export interface PublicationStore extends PublicationSource {
  getPublications(filter?: PublicationFilter): Publication[];
  countPublications(filter?: PublicationFilter): number;
  getPublication(id: number): Publication | null;
  close(): void;
}
