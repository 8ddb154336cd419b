/**
 * Zotero Web API v3 data shapes used by the importer
 */

import { z } from 'zod';

/**
 * Item JSON as returned by /items/new templates and accepted by POST /items.
 * Field sets differ per item type, so values stay open.
 */
export type ZoteroItemData = Record<string, unknown>;

export interface ZoteroTag {
  tag: string;
  type?: number;
}

export type ZoteroCreator =
  | { creatorType: string; firstName: string; lastName: string }
  | { creatorType: string; name: string };

export const CreateItemsFailureSchema = z.object({
  key: z.string().optional(),
  code: z.number(),
  message: z.string(),
});

export type CreateItemsFailure = z.infer<typeof CreateItemsFailureSchema>;

/**
 * Per-position write result; keys are stringified indices into the submitted list
 */
export const CreateItemsResultSchema = z.object({
  success: z.record(z.string()).default({}),
  unchanged: z.record(z.string()).default({}),
  failed: z.record(CreateItemsFailureSchema).default({}),
});

export type CreateItemsResult = z.infer<typeof CreateItemsResultSchema>;

export const ZoteroCollectionSchema = z.object({
  key: z.string(),
  version: z.number().optional(),
  data: z.object({
    key: z.string(),
    name: z.string(),
    parentCollection: z.union([z.string(), z.literal(false)]).optional(),
  }).passthrough(),
});

export type ZoteroCollection = z.infer<typeof ZoteroCollectionSchema>;

export function emptyWriteResult(): CreateItemsResult {
  return { success: {}, unchanged: {}, failed: {} };
}

/**
 * Remote library operations the migration engine depends on
 */
export interface ZoteroLibraryClient {
  itemTemplate(itemType: string, linkMode?: string): Promise<ZoteroItemData>;
  createItems(items: ZoteroItemData[], parentKey?: string): Promise<CreateItemsResult>;
  collections(): Promise<ZoteroCollection[]>;
  createCollections(names: string[]): Promise<CreateItemsResult>;
  attachmentSimple(paths: string[], parentKey: string): Promise<CreateItemsResult>;
}
