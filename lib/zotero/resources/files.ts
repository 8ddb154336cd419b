import path from 'path';
import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import { z } from 'zod';
import { ZoteroHttpClient } from '../http/client';
import { ZoteroApiError } from '../errors';
import { zoteroLog } from '../logging';
import { CreateItemsResult, ZoteroItemData, emptyWriteResult } from '../types';
import { createItems } from './items';

/**
 * Upload authorization response: either the file is already stored, or where to send it
 */
const UploadAuthorizationSchema = z.union([
  z.object({ exists: z.literal(1) }),
  z.object({
    url: z.string().url(),
    contentType: z.string(),
    prefix: z.string(),
    suffix: z.string(),
    uploadKey: z.string(),
  }),
]);

const CONTENT_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.epub': 'application/epub+zip',
  '.html': 'text/html',
  '.htm': 'text/html',
  '.txt': 'text/plain',
  '.rtf': 'application/rtf',
  '.doc': 'application/msword',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.zip': 'application/zip',
};

export function guessContentType(filePath: string): string {
  return CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * Create an imported-file attachment under `parentKey` for each path and upload its content.
 * Positions in the result index into `paths`; a file the server already holds is reported
 * as unchanged. Authorization failures propagate; other per-file errors become failures.
 */
export async function uploadAttachments(
  client: ZoteroHttpClient,
  template: () => Promise<ZoteroItemData>,
  paths: string[],
  parentKey: string
): Promise<CreateItemsResult> {
  const result = emptyWriteResult();

  for (const [index, filePath] of paths.entries()) {
    const position = String(index);
    let itemKey: string | undefined;

    try {
      const filename = path.basename(filePath);
      const item = await template();
      item.title = filename;
      item.filename = filename;
      item.contentType = guessContentType(filePath);

      const created = await createItems(client, [item], parentKey);
      const failure = created.failed['0'];
      itemKey = created.success['0'];
      if (failure || !itemKey) {
        result.failed[position] = failure ?? { code: 0, message: 'Attachment item was not created' };
        continue;
      }

      const content = await fs.readFile(filePath);
      const stats = await fs.stat(filePath);
      const md5 = createHash('md5').update(content).digest('hex');

      const authorization = await client.post(`/items/${itemKey}/file`, undefined, {
        form: {
          md5,
          filename,
          filesize: String(content.length),
          mtime: String(Math.round(stats.mtimeMs)),
        },
        headers: { 'If-None-Match': '*' },
      });
      const upload = UploadAuthorizationSchema.parse(authorization.data);

      if ('exists' in upload) {
        result.unchanged[position] = itemKey;
        continue;
      }

      await client.request(upload.url, {
        method: 'POST',
        external: true,
        headers: { 'Content-Type': upload.contentType },
        raw: Buffer.concat([Buffer.from(upload.prefix), content, Buffer.from(upload.suffix)]),
      });

      await client.post(`/items/${itemKey}/file`, undefined, {
        form: { upload: upload.uploadKey },
        headers: { 'If-None-Match': '*' },
      });

      result.success[position] = itemKey;
      zoteroLog('DEBUG', 'Uploaded attachment', { itemKey, filename, size: content.length });
    } catch (error) {
      if (error instanceof ZoteroApiError && error.isUnauthorized()) {
        throw error;
      }
      result.failed[position] = {
        key: itemKey,
        code: error instanceof ZoteroApiError ? error.statusCode ?? 0 : 0,
        message: error instanceof Error ? error.message : String(error),
      };
    }
  }

  return result;
}
