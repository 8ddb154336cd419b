/**
 * Zotero library client backed by the Web API v3
 */

import { ZoteroConfig } from './config';
import { ZoteroHttpClient } from './http/client';
import { RetryConfig } from './http/retry';
import { createItems, getItemTemplate } from './resources/items';
import { createCollections, listCollections } from './resources/collections';
import { uploadAttachments } from './resources/files';
import {
  CreateItemsResult,
  ZoteroCollection,
  ZoteroItemData,
  ZoteroLibraryClient,
} from './types';

export class ZoteroWebClient implements ZoteroLibraryClient {
  private readonly http: ZoteroHttpClient;
  private readonly templates = new Map<string, ZoteroItemData>();

  constructor(config: ZoteroConfig, retryConfig?: RetryConfig) {
    this.http = new ZoteroHttpClient(config, retryConfig);
  }

  /**
   * Template for an item type; fetched once, a fresh copy per call
   */
  async itemTemplate(itemType: string, linkMode?: string): Promise<ZoteroItemData> {
    const cacheKey = linkMode ? `${itemType}:${linkMode}` : itemType;
    let template = this.templates.get(cacheKey);
    if (!template) {
      template = await getItemTemplate(this.http, itemType, linkMode);
      this.templates.set(cacheKey, template);
    }
    return structuredClone(template);
  }

  createItems(items: ZoteroItemData[], parentKey?: string): Promise<CreateItemsResult> {
    return createItems(this.http, items, parentKey);
  }

  collections(): Promise<ZoteroCollection[]> {
    return listCollections(this.http);
  }

  createCollections(names: string[]): Promise<CreateItemsResult> {
    return createCollections(this.http, names);
  }

  attachmentSimple(paths: string[], parentKey: string): Promise<CreateItemsResult> {
    return uploadAttachments(
      this.http,
      () => this.itemTemplate('attachment', 'imported_file'),
      paths,
      parentKey
    );
  }
}
