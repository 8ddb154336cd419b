import { z } from 'zod';
import { ZoteroHttpClient } from '../http/client';
import { zoteroLog } from '../logging';
import { CreateItemsResult, ZoteroCollection, ZoteroCollectionSchema, emptyWriteResult } from '../types';
import { WRITE_CHUNK_SIZE, mergeWriteResults, parseWriteResult, postNewObjects } from './items';

const PAGE_SIZE = 100;

const CollectionPageSchema = z.array(ZoteroCollectionSchema);

/**
 * List every collection in the library, following pagination
 */
export async function listCollections(client: ZoteroHttpClient): Promise<ZoteroCollection[]> {
  const collections: ZoteroCollection[] = [];
  let start = 0;

  for (;;) {
    const response = await client.get('/collections', {
      query: { limit: PAGE_SIZE, start },
    });
    const page = CollectionPageSchema.parse(response.data);
    collections.push(...page);

    const total = parseInt(response.headers['total-results'] ?? '', 10);
    start += page.length;

    const exhausted = isNaN(total) ? page.length < PAGE_SIZE : start >= total;
    if (exhausted || page.length === 0) {
      break;
    }
  }

  zoteroLog('DEBUG', 'Listed collections', { count: collections.length });
  return collections;
}

/**
 * Create top-level collections by name
 */
export async function createCollections(
  client: ZoteroHttpClient,
  names: string[]
): Promise<CreateItemsResult> {
  const result = emptyWriteResult();

  for (let offset = 0; offset < names.length; offset += WRITE_CHUNK_SIZE) {
    const chunk = names.slice(offset, offset + WRITE_CHUNK_SIZE).map(name => ({ name }));
    const response = await postNewObjects(client, '/collections', chunk);
    mergeWriteResults(result, parseWriteResult(response.data, offset));
  }

  return result;
}
