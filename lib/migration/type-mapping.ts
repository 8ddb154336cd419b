import { PubTypeKey } from '../papers/schema';

/**
 * Zotero item type for each Papers2 publication type
 */
export const ITEM_TYPES: Record<PubTypeKey, string> = {
  BOOK: 'book',
  BOOK_SECTION: 'bookSection',
  THESIS: 'thesis',
  E_BOOK: 'book',
  PAMPHLET: 'document',
  WEBSITE: 'webpage',
  POSTER: 'presentation',
  PRESENTATION: 'presentation',
  ABSTRACT: 'presentation',
  LECTURE: 'presentation',
  PHOTO: 'artwork',
  SOFTWARE: 'computerProgram',
  DATA_FILE: 'dataset',
  JOURNAL_ARTICLE: 'journalArticle',
  MAGAZINE_ARTICLE: 'magazineArticle',
  NEWSPAPER_ARTICLE: 'newspaperArticle',
  WEBSITE_ARTICLE: 'webpage',
  MANUSCRIPT: 'manuscript',
  PREPRINT: 'preprint',
  CONFERENCE_PAPER: 'conferencePaper',
  PATENT: 'patent',
  REPORT: 'report',
  TECHREPORT: 'report',
  SCIENTIFIC_REPORT: 'report',
  GRANT: 'report',
  ASSIGNMENT: 'report',
  REFERENCE: 'report',
  PROTOCOL: 'report',
};

/**
 * Top-level folder of the linked-attachment tree for each publication type
 * (one folder per item type name)
 */
export const FOLDER_MAP: Record<PubTypeKey, string> = {
  BOOK: 'Book',
  BOOK_SECTION: 'Book Section',
  THESIS: 'Thesis',
  E_BOOK: 'Book',
  PAMPHLET: 'Document',
  WEBSITE: 'Web Page',
  POSTER: 'Presentation',
  PRESENTATION: 'Presentation',
  ABSTRACT: 'Presentation',
  LECTURE: 'Presentation',
  PHOTO: 'Artwork',
  SOFTWARE: 'Software',
  DATA_FILE: 'Dataset',
  JOURNAL_ARTICLE: 'Journal Article',
  MAGAZINE_ARTICLE: 'Magazine Article',
  NEWSPAPER_ARTICLE: 'Newspaper Article',
  WEBSITE_ARTICLE: 'Web Page',
  MANUSCRIPT: 'Journal Article',
  PREPRINT: 'Preprint',
  CONFERENCE_PAPER: 'Conference Paper',
  PATENT: 'Patent',
  REPORT: 'Report',
  TECHREPORT: 'Report',
  SCIENTIFIC_REPORT: 'Report',
  GRANT: 'Report',
  ASSIGNMENT: 'Report',
  REFERENCE: 'Report',
  PROTOCOL: 'Report',
};
