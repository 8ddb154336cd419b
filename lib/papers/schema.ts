/**
 * Papers2 code tables
 *
 * Each table is closed: codes outside it raise UnsupportedSourceDataError
 * instead of passing through.
 */

import { UnsupportedSourceDataError } from './errors';

export const PUB_TYPES = [
  { key: 'BOOK', name: 'Book', code: 0 },
  { key: 'BOOK_SECTION', name: 'Book Section', code: -1000 },
  { key: 'THESIS', name: 'Thesis', code: 10 },
  { key: 'E_BOOK', name: 'eBook', code: 20 },
  { key: 'PAMPHLET', name: 'Pamphlet', code: 30 },
  { key: 'WEBSITE', name: 'Website', code: 300 },
  { key: 'POSTER', name: 'Poster', code: 313 },
  { key: 'PRESENTATION', name: 'Presentation', code: 314 },
  { key: 'ABSTRACT', name: 'Abstract', code: 315 },
  { key: 'LECTURE', name: 'Lecture', code: 319 },
  { key: 'PHOTO', name: 'Photo', code: 325 },
  { key: 'SOFTWARE', name: 'Software', code: 341 },
  { key: 'DATA_FILE', name: 'Data File', code: 345 },
  { key: 'JOURNAL_ARTICLE', name: 'Journal Article', code: 400 },
  { key: 'MAGAZINE_ARTICLE', name: 'Magazine Article', code: 401 },
  { key: 'NEWSPAPER_ARTICLE', name: 'Newspaper Article', code: 402 },
  { key: 'WEBSITE_ARTICLE', name: 'Website Article', code: 403 },
  { key: 'MANUSCRIPT', name: 'Manuscript', code: 410 },
  { key: 'PREPRINT', name: 'Preprint', code: 415 },
  { key: 'CONFERENCE_PAPER', name: 'Conference Paper', code: 420 },
  { key: 'PATENT', name: 'Patent', code: 500 },
  { key: 'REPORT', name: 'Report', code: 700 },
  { key: 'TECHREPORT', name: 'Technical Report', code: 701 },
  { key: 'SCIENTIFIC_REPORT', name: 'Scientific Report', code: 702 },
  { key: 'GRANT', name: 'Grant', code: 703 },
  { key: 'ASSIGNMENT', name: 'Assignment', code: 704 },
  { key: 'REFERENCE', name: 'Reference', code: 713 },
  { key: 'PROTOCOL', name: 'Protocol', code: 717 },
] as const;

export type PubTypeKey = (typeof PUB_TYPES)[number]['key'];

const pubTypeByCode = new Map<number, PubTypeKey>(
  PUB_TYPES.map((type): [number, PubTypeKey] => [type.code, type.key])
);

const pubTypeByName = new Map<string, PubTypeKey>(
  PUB_TYPES.flatMap((type): [string, PubTypeKey][] => [
    [type.name.toLowerCase(), type.key],
    [type.key.toLowerCase(), type.key],
  ])
);

export function pubTypeFromCode(code: number): PubTypeKey {
  const key = pubTypeByCode.get(code);
  if (!key) {
    throw new UnsupportedSourceDataError(`Unsupported publication type code ${code}`, 'pubType', code);
  }
  return key;
}

/**
 * Resolve a display name ("Journal Article") or key ("JOURNAL_ARTICLE")
 */
export function pubTypeFromName(name: string): PubTypeKey {
  const key = pubTypeByName.get(name.trim().toLowerCase());
  if (!key) {
    throw new UnsupportedSourceDataError(`Unknown publication type "${name}"`, 'pubType', name);
  }
  return key;
}

export function pubTypeCode(key: PubTypeKey): number {
  return PUB_TYPES.find(type => type.key === key)?.code ?? 0;
}

export function allPubTypeCodes(): number[] {
  return PUB_TYPES.map(type => type.code);
}

export const IdSource = {
  PUBMED: 'gov.nih.nlm.ncbi.pubmed',
  PMC: 'gov.nih.nlm.ncbi.pmc',
  ISBN: 'org.iso.isbn',
  ISSN: 'org.iso.issn',
  USER: 'com.mekentosj.papers2.user',
} as const;

export type IdSourceCode = (typeof IdSource)[keyof typeof IdSource];

export const KeywordType = {
  AUTO: 0,
  USER: 99,
} as const;

export type KeywordTypeCode = (typeof KeywordType)[keyof typeof KeywordType];

export const LABEL_NAMES = ['None', 'Red', 'Orange', 'Yellow', 'Green', 'Blue', 'Purple', 'Gray'] as const;

export type LabelName = (typeof LABEL_NAMES)[number];

/**
 * Label colour for a numeric label code; a missing label is "None"
 */
export function labelFromCode(code: number | null): LabelName {
  if (code === null) {
    return 'None';
  }
  const name = LABEL_NAMES[code];
  if (name === undefined) {
    throw new UnsupportedSourceDataError(`Unsupported label code ${code}`, 'label', code);
  }
  return name;
}

export function labelFromName(name: string): LabelName {
  const match = LABEL_NAMES.find(label => label.toLowerCase() === name.trim().toLowerCase());
  if (!match) {
    throw new UnsupportedSourceDataError(`Unknown label colour "${name}"`, 'label', name);
  }
  return match;
}
