/**
 * Template-only library client for dry runs without credentials.
 *
 * Templates carry the fields the importer fills; the real per-type
 * field sets come from the API when credentials are available.
 */

import { ZoteroConfigError } from './errors';
import {
  CreateItemsResult,
  ZoteroCollection,
  ZoteroItemData,
  ZoteroLibraryClient,
} from './types';

const ITEM_FIELDS = [
  'title', 'abstractNote', 'publicationTitle', 'university', 'volume', 'issue', 'pages',
  'numPages', 'date', 'edition', 'place', 'publisher', 'number', 'language', 'DOI', 'ISBN',
  'journalAbbreviation', 'url', 'accessDate', 'rights', 'extra',
];

export class OfflineTemplateClient implements ZoteroLibraryClient {
  async itemTemplate(itemType: string, linkMode?: string): Promise<ZoteroItemData> {
    if (itemType === 'note') {
      return { itemType, note: '', tags: [], collections: [], relations: {} };
    }
    if (itemType === 'attachment') {
      return {
        itemType,
        linkMode: linkMode ?? 'linked_file',
        title: '',
        accessDate: '',
        url: '',
        note: '',
        tags: [],
        relations: {},
        contentType: '',
        charset: '',
        path: '',
      };
    }
    return {
      itemType,
      creators: [],
      ...Object.fromEntries(ITEM_FIELDS.map(field => [field, ''])),
      tags: [],
      collections: [],
      relations: {},
    };
  }

  createItems(): Promise<CreateItemsResult> {
    return this.unavailable();
  }

  collections(): Promise<ZoteroCollection[]> {
    return this.unavailable();
  }

  createCollections(): Promise<CreateItemsResult> {
    return this.unavailable();
  }

  attachmentSimple(): Promise<CreateItemsResult> {
    return this.unavailable();
  }

  private async unavailable(): Promise<never> {
    throw new ZoteroConfigError('No Zotero credentials configured; only dry runs are possible');
  }
}
