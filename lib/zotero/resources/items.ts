import { randomUUID } from 'crypto';
import { z } from 'zod';
import { ZoteroApiError } from '../errors';
import { ZoteroHttpClient, ZoteroResponse } from '../http/client';
import { zoteroLog } from '../logging';
import { CreateItemsResult, CreateItemsResultSchema, ZoteroItemData, emptyWriteResult } from '../types';

/**
 * Maximum number of objects the write endpoints accept per request
 */
export const WRITE_CHUNK_SIZE = 50;

export const WRITE_TOKEN_HEADER = 'Zotero-Write-Token';

const ItemTemplateSchema = z.record(z.unknown());

/**
 * Fetch the empty item template for an item type
 */
export async function getItemTemplate(
  client: ZoteroHttpClient,
  itemType: string,
  linkMode?: string
): Promise<ZoteroItemData> {
  const query: Record<string, string> = { itemType };
  if (linkMode) {
    query.linkMode = linkMode;
  }

  const response = await client.get('/items/new', { query, unprefixed: true });
  return ItemTemplateSchema.parse(response.data);
}

/**
 * Parse a write response, re-basing its positions by `offset`
 */
export function parseWriteResult(data: unknown, offset = 0): CreateItemsResult {
  const parsed = CreateItemsResultSchema.parse(data);
  if (offset === 0) {
    return parsed;
  }

  const rebase = <V>(record: Record<string, V>): Record<string, V> =>
    Object.fromEntries(
      Object.entries(record).map(([index, value]) => [String(Number(index) + offset), value])
    );

  return {
    success: rebase(parsed.success),
    unchanged: rebase(parsed.unchanged),
    failed: rebase(parsed.failed),
  };
}

export function mergeWriteResults(target: CreateItemsResult, source: CreateItemsResult): void {
  Object.assign(target.success, source.success);
  Object.assign(target.unchanged, source.unchanged);
  Object.assign(target.failed, source.failed);
}

export function newWriteToken(): string {
  return randomUUID().replace(/-/g, '');
}

/**
 * POST one chunk of new objects under a single write token.
 *
 * Retries of the request resend the same token, so Zotero answers a repeat of
 * a write it already committed with 412 instead of creating the objects twice.
 *
 * @throws {ZoteroApiError} 412 when an earlier attempt of this chunk was committed
 */
export async function postNewObjects(
  client: ZoteroHttpClient,
  endpoint: string,
  objects: unknown[]
): Promise<ZoteroResponse> {
  const writeToken = newWriteToken();
  try {
    return await client.post(endpoint, objects, { headers: { [WRITE_TOKEN_HEADER]: writeToken } });
  } catch (error) {
    if (error instanceof ZoteroApiError && error.statusCode === 412) {
      throw new ZoteroApiError(
        `Write to ${endpoint} was already committed by an earlier attempt whose response was lost`,
        412,
        error.responseBody,
        error.headers
      );
    }
    throw error;
  }
}

/**
 * Create items, in chunks, optionally as children of `parentKey`.
 * Result positions index into `items`.
 */
export async function createItems(
  client: ZoteroHttpClient,
  items: ZoteroItemData[],
  parentKey?: string
): Promise<CreateItemsResult> {
  const result = emptyWriteResult();

  for (let offset = 0; offset < items.length; offset += WRITE_CHUNK_SIZE) {
    const chunk = items
      .slice(offset, offset + WRITE_CHUNK_SIZE)
      .map(item => (parentKey ? { ...item, parentItem: parentKey } : item));

    const response = await postNewObjects(client, '/items', chunk);
    const chunkResult = parseWriteResult(response.data, offset);
    mergeWriteResults(result, chunkResult);

    zoteroLog('DEBUG', 'Created items', {
      offset,
      count: chunk.length,
      succeeded: Object.keys(chunkResult.success).length,
      failed: Object.keys(chunkResult.failed).length,
      parentKey,
    });
  }

  return result;
}
