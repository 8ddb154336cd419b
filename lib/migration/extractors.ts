/**
 * Field extractor registry
 *
 * Maps Zotero item field names to extraction rules over a Papers2
 * publication. Rules come in three kinds:
 * - direct: one column of the publication, optionally formatted
 * - multi: a list of related rows, filtered, capped and formatted per value
 * - composite: values derived from the run context (collections, labels, ...)
 *
 * A rule yielding null leaves the template's default in place.
 */

import { UnsupportedSourceDataError } from '../papers/errors';
import { IdSource, IdSourceCode, KeywordType, LabelName } from '../papers/schema';
import { Author, Publication, PublicationSource } from '../papers/types';
import { ZoteroCreator, ZoteroItemData, ZoteroTag } from '../zotero/types';

export type KeywordKind = 'user' | 'auto' | 'label';

export const KEYWORD_KINDS: readonly KeywordKind[] = ['user', 'auto', 'label'];

/**
 * Read-only inputs shared by every extraction in a run
 */
export interface ExtractionContext {
  readonly source: PublicationSource;
  /** Source collection name → Zotero collection key, for the collections selected this run */
  readonly collections: ReadonlyMap<string, string>;
  readonly keywordTypes: ReadonlySet<KeywordKind>;
  /** Label colour → tag text; null means no tag */
  readonly labelMap: ReadonlyMap<LabelName, string | null>;
}

export type FieldScalar = string | ZoteroTag | ZoteroCreator;
export type FieldValue = FieldScalar | FieldScalar[];

export interface DirectRule {
  kind: 'direct';
  value(pub: Publication): string | null;
}

export interface MultiRule {
  kind: 'multi';
  /** null: no cap, always a list. 1: a single scalar. */
  maxValues: number | null;
  /** Values after dropping empties, capping and formatting */
  values(pub: Publication, context: ExtractionContext): FieldScalar[];
}

export interface CompositeRule {
  kind: 'composite';
  derive(pub: Publication, context: ExtractionContext): FieldValue | null;
}

export type ExtractionRule = DirectRule | MultiRule | CompositeRule;

function direct<T extends string | number>(
  read: (pub: Publication) => T | null,
  format?: (value: T) => string | null
): DirectRule {
  return {
    kind: 'direct',
    value(pub) {
      const value = read(pub);
      if (value === null) {
        return null;
      }
      return format ? format(value) : String(value);
    },
  };
}

function multi<T>(
  read: (pub: Publication, context: ExtractionContext) => readonly (T | null | undefined)[],
  format: (value: T) => FieldScalar,
  maxValues: number | null = 1
): MultiRule {
  return {
    kind: 'multi',
    maxValues,
    values(pub, context) {
      const present = read(pub, context).filter(
        (value): value is T => value !== null && value !== undefined && value !== '' && value !== 0
      );
      const capped = maxValues === null ? present : present.slice(0, maxValues);
      return capped.map(format);
    },
  };
}

function composite(
  derive: (pub: Publication, context: ExtractionContext) => FieldValue | null
): CompositeRule {
  return { kind: 'composite', derive };
}

/**
 * Unix seconds → `YYYY-MM-DDTHH:MM:SSZ`
 */
export function formatTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Papers2 date code → `YYYY[-MM[-DD]]`. Characters 2-5 hold the year,
 * 6-7 the month and 8-9 the day; a zero month or day becomes 01.
 */
export function formatPubDate(code: string): string | null {
  const year = code.slice(2, 6);
  if (year.length === 0) {
    return null;
  }
  let date = year;

  const month = code.slice(6, 8);
  if (month.length > 0) {
    date += `-${month === '00' ? '01' : month}`;

    const day = code.slice(8, 10);
    if (day.length > 0) {
      date += `-${day === '00' ? '01' : day}`;
    }
  }
  return date;
}

export function formatPageRange(start: string | null, end: string | null): string | null {
  if (!start || !end) {
    return null;
  }
  return `${start}-${end}`;
}

export function formatCreator(author: Author): ZoteroCreator {
  let creatorType: string;
  if (author.type === 0) {
    creatorType = 'author';
  } else if (author.type === 1) {
    creatorType = 'editor';
  } else {
    throw new UnsupportedSourceDataError(`Unsupported author type ${author.type}`, 'authorRole', author.type);
  }

  if (author.institutional > 0) {
    return { creatorType, name: author.surname ?? '' };
  }
  return { creatorType, firstName: author.prename ?? '', lastName: author.surname ?? '' };
}

function identifiers(sources: IdSourceCode[]) {
  return (pub: Publication, context: ExtractionContext): string[] =>
    sources.flatMap(source => context.source.getIdentifiers(pub, source).map(event => event.remote_id));
}

/**
 * Title of the linked parent publication, or the free-text container name
 */
export function extractBundle(pub: Publication, context: ExtractionContext): string | null {
  const bundle = context.source.getBundle(pub);
  return bundle !== null ? bundle.title : pub.bundle_string;
}

/**
 * Tags from the enabled keyword kinds: user keywords, automatic keywords
 * (Zotero tag type 1) and the colour label through the label map
 */
export function extractKeywords(pub: Publication, context: ExtractionContext): ZoteroTag[] | null {
  const tags: ZoteroTag[] = [];
  const { source, keywordTypes } = context;

  if (keywordTypes.has('user')) {
    tags.push(...source.getKeywords(pub, KeywordType.USER).map(keyword => ({ tag: keyword.name })));
  }
  if (keywordTypes.has('auto')) {
    tags.push(...source.getKeywords(pub, KeywordType.AUTO).map(keyword => ({ tag: keyword.name, type: 1 })));
  }
  if (keywordTypes.has('label')) {
    const label = context.labelMap.get(source.getLabelName(pub)) ?? null;
    if (label) {
      tags.push({ tag: label });
    }
  }

  const present = tags.filter(tag => tag.tag.length > 0);
  return present.length > 0 ? present : null;
}

/**
 * Keys of the selected collections the publication belongs to; null when
 * no collections are selected for the run or the publication is in none
 */
export function extractCollections(pub: Publication, context: ExtractionContext): string[] | null {
  if (context.collections.size === 0) {
    return null;
  }
  const keys = context.source
    .getCollections(pub)
    .flatMap(collection => {
      const key = context.collections.get(collection.name);
      return key === undefined ? [] : [key];
    });
  return keys.length > 0 ? keys : null;
}

export const EXTRACTORS: Readonly<Record<string, ExtractionRule>> = {
  DOI: direct(pub => pub.doi),
  ISBN: multi(identifiers([IdSource.ISBN, IdSource.ISSN]), value => value),
  abstractNote: direct(pub => pub.summary),
  accessDate: direct(pub => pub.imported_date, formatTimestamp),
  collections: composite(extractCollections),
  creators: multi((pub, context) => context.source.getPubAuthors(pub), formatCreator, null),
  date: direct(pub => pub.publication_date, formatPubDate),
  edition: direct(pub => pub.version),
  extra: multi(identifiers([IdSource.PUBMED, IdSource.PMC]), value => `PMID: ${value}`),
  issue: direct(pub => pub.number),
  journalAbbreviation: direct(pub => pub.bundle_string),
  language: direct(pub => pub.language),
  number: direct(pub => pub.document_number),
  pages: composite(pub => formatPageRange(pub.startpage, pub.endpage)),
  numPages: direct(pub => pub.startpage),
  place: direct(pub => pub.place),
  publicationTitle: composite(extractBundle),
  publisher: direct(pub => pub.publisher),
  rights: direct(pub => pub.copyright),
  tags: composite(extractKeywords),
  title: direct(pub => pub.title),
  university: composite(extractBundle),
  url: multi((pub, context) => context.source.getUrls(pub).map(event => event.remote_id), value => value),
  volume: direct(pub => pub.volume),
};

/**
 * Evaluate one rule. Multi rules collapse to a scalar when capped at one value.
 */
export function evaluateRule(
  rule: ExtractionRule,
  pub: Publication,
  context: ExtractionContext
): FieldValue | null {
  switch (rule.kind) {
    case 'direct':
      return rule.value(pub);
    case 'multi': {
      const values = rule.values(pub, context);
      if (values.length === 0) {
        return null;
      }
      return rule.maxValues === 1 ? values[0] : values;
    }
    case 'composite':
      return rule.derive(pub, context);
  }
}

/**
 * Fill every template field that has a rule; null results keep the template value
 */
export function applyExtractors(
  template: ZoteroItemData,
  pub: Publication,
  context: ExtractionContext,
  rules: Readonly<Record<string, ExtractionRule>> = EXTRACTORS
): ZoteroItemData {
  const item: ZoteroItemData = { ...template };
  for (const field of Object.keys(template)) {
    const rule = rules[field];
    if (!rule) {
      continue;
    }
    const value = evaluateRule(rule, pub, context);
    if (value !== null) {
      item[field] = value;
    }
  }
  return item;
}
