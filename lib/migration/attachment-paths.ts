import path from 'path';
import { PubTypeKey } from '../papers/schema';
import { FOLDER_MAP } from './type-mapping';

export const SUPPLEMENT_FOLDER = 'Supplemental';
export const SUPPLEMENT_PREFIX = 'Supplement-';
export const SUPPLEMENT_TAG = '&SUPP';

export interface LinkedAttachmentPath {
  /** Path relative to the Papers2 folder, `/`-separated */
  sourceRelative: string;
  /** Path relative to the linked-attachment base, `/`-separated */
  targetRelative: string;
  filename: string;
  isSupplement: boolean;
}

/**
 * Map a Papers2 file into the linked-attachment tree.
 *
 * `Files/A/Author Name/Title.pdf` under a journal article becomes
 * `Journal Article/A/Author Name/Title.pdf`; the initial folder keeps only its
 * first character, and a `Supplemental` folder is dropped in favour of a
 * `Supplement-` file name prefix.
 */
export function mapAttachmentPath(
  papersFolder: string,
  filePath: string,
  pubType: PubTypeKey
): LinkedAttachmentPath {
  const sourceRelative = path.relative(papersFolder, filePath).split(path.sep).join('/');
  const segments = sourceRelative.split('/');

  if (segments.length < 3 || segments[0] === '..') {
    throw new Error(`Attachment ${filePath} is not in the Papers2 folder layout`);
  }

  segments[1] = segments[1].charAt(0);

  const isSupplement = segments.length === 5 && segments[3] === SUPPLEMENT_FOLDER;
  if (isSupplement) {
    segments.splice(3, 1);
    segments[segments.length - 1] = SUPPLEMENT_PREFIX + segments[segments.length - 1];
  }

  const filename = segments[segments.length - 1];
  const targetRelative = [FOLDER_MAP[pubType], ...segments.slice(1)].join('/');

  return { sourceRelative, targetRelative, filename, isSupplement };
}
