/**
 * Google Drive relocator: re-parents and renames the attachment file in place,
 * without downloading or uploading its content
 */

import * as path from 'path';
import { Auth, drive_v3, google } from 'googleapis';
import { errorMessage, logger } from '../../migration/logging';
import { AttachmentRelocator } from '../types';
import { authorizeDrive, InteractiveAuthorizer } from './auth';
import { DrivePathError } from './errors';

export const DRIVE_ROOT_ID = 'root';
export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

export interface DriveChild {
  id: string;
  name: string;
}

export interface DriveMoveRequest {
  addParents: string;
  removeParents: string;
  name: string;
}

/**
 * The few Drive files calls the relocator needs
 */
export interface DriveFilesApi {
  findChildren(parentId: string, name: string): Promise<DriveChild[]>;
  getParents(fileId: string): Promise<string[]>;
  createFolder(parentId: string, name: string): Promise<string>;
  update(fileId: string, request: DriveMoveRequest): Promise<void>;
}

/**
 * Quote a value for a Drive search query
 */
export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export function googleFilesApi(drive: drive_v3.Drive): DriveFilesApi {
  return {
    async findChildren(parentId, name) {
      const response = await drive.files.list({
        q: `'${escapeQueryValue(parentId)}' in parents and name = '${escapeQueryValue(name)}' and trashed = false`,
        fields: 'files(id, name)',
        spaces: 'drive',
        pageSize: 10,
      });
      const children: DriveChild[] = [];
      for (const file of response.data.files ?? []) {
        if (file.id && file.name) {
          children.push({ id: file.id, name: file.name });
        }
      }
      return children;
    },

    async getParents(fileId) {
      const response = await drive.files.get({ fileId, fields: 'parents' });
      return response.data.parents ?? [];
    },

    async createFolder(parentId, name) {
      const response = await drive.files.create({
        requestBody: { name, mimeType: FOLDER_MIME_TYPE, parents: [parentId] },
        fields: 'id',
      });
      if (!response.data.id) {
        throw new Error(`Drive did not return an id for folder "${name}"`);
      }
      return response.data.id;
    },

    async update(fileId, request) {
      await drive.files.update({
        fileId,
        addParents: request.addParents,
        removeParents: request.removeParents,
        requestBody: { name: request.name },
        fields: 'id, parents',
      });
    },
  };
}

/**
 * Split a Drive path (`/Papers2/Articles/x.pdf`) into folder names
 */
export function splitDrivePath(drivePath: string): string[] {
  return drivePath.split('/').filter(part => part.length > 0);
}

export interface GoogleDriveRelocatorOptions {
  files: DriveFilesApi;
  sourceRoot: string;
  targetRoot: string;
}

export class GoogleDriveRelocator implements AttachmentRelocator {
  readonly name = 'gdrive';
  private readonly files: DriveFilesApi;
  private readonly sourceRoot: string;
  private readonly targetRoot: string;
  private readonly idCache = new Map<string, string>();

  constructor(options: GoogleDriveRelocatorOptions) {
    this.files = options.files;
    this.sourceRoot = options.sourceRoot;
    this.targetRoot = options.targetRoot;
  }

  async move(fromPath: string, toPath: string): Promise<boolean> {
    const source = path.posix.join('/', this.sourceRoot, fromPath);
    const target = path.posix.join('/', this.targetRoot, toPath);

    try {
      const fileId = await this.resolve(source, false);
      const folderId = await this.resolve(path.posix.dirname(target), true);
      const previousParents = await this.files.getParents(fileId);

      await this.files.update(fileId, {
        addParents: folderId,
        removeParents: previousParents.join(','),
        name: path.posix.basename(target),
      });

      this.idCache.delete(source);
      this.idCache.set(target, fileId);
      logger.debug('Moved Drive file', { fileId, source, target, folderId });
      return true;
    } catch (error) {
      logger.error('Drive move failed', { source, target, error: errorMessage(error) });
      return false;
    }
  }

  /**
   * Walk the path from My Drive's root, optionally creating missing folders
   */
  async resolve(drivePath: string, create: boolean): Promise<string> {
    let currentId = DRIVE_ROOT_ID;
    let currentPath = '';

    for (const part of splitDrivePath(drivePath)) {
      currentPath = `${currentPath}/${part}`;
      const cached = this.idCache.get(currentPath);
      if (cached) {
        currentId = cached;
        continue;
      }

      const children = await this.files.findChildren(currentId, part);
      if (children.length > 1) {
        logger.warn('Ambiguous Drive path, using first match', { path: currentPath, matches: children.length });
      }

      if (children.length > 0) {
        currentId = children[0].id;
      } else if (create) {
        currentId = await this.files.createFolder(currentId, part);
        logger.info('Created Drive folder', { path: currentPath });
      } else {
        throw new DrivePathError(`Drive path not found: ${currentPath}`, currentPath);
      }
      this.idCache.set(currentPath, currentId);
    }

    return currentId;
  }
}

export interface CreateDriveRelocatorOptions {
  clientSecretsFile: string;
  tokenFile: string;
  sourceRoot: string;
  targetRoot: string;
  authorize?: InteractiveAuthorizer;
}

/**
 * Authorize against Drive and build the relocator
 *
 * @throws {DriveAuthError} When no Drive session can be established
 */
export async function createDriveRelocator(options: CreateDriveRelocatorOptions): Promise<GoogleDriveRelocator> {
  const auth: Auth.OAuth2Client = await authorizeDrive({
    clientSecretsFile: options.clientSecretsFile,
    tokenFile: options.tokenFile,
    authorize: options.authorize,
  });
  return new GoogleDriveRelocator({
    files: googleFilesApi(google.drive({ version: 'v3', auth })),
    sourceRoot: options.sourceRoot,
    targetRoot: options.targetRoot,
  });
}
