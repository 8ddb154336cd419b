import * as fs from 'fs/promises';
import * as path from 'path';
import { Auth } from 'googleapis';
import { z } from 'zod';
import { errorMessage, logger } from '../../migration/logging';

const StoredCredentialsSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  token_type: z.string().nullish(),
  id_token: z.string().nullish(),
  scope: z.string().optional(),
});

/**
 * Persistence for the Drive OAuth credentials
 */
export interface TokenStore {
  getToken(): Promise<Auth.Credentials | null>;
  setToken(credentials: Auth.Credentials): Promise<void>;
  clearToken(): Promise<void>;
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

/**
 * JSON file token store. An unreadable file counts as no token.
 */
export class FileTokenStore implements TokenStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(process.cwd(), filePath);
  }

  getFilePath(): string {
    return this.filePath;
  }

  async getToken(): Promise<Auth.Credentials | null> {
    let data: string;
    try {
      data = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        logger.warn('Failed to read Drive token cache', { file: this.filePath, error: errorMessage(error) });
      }
      return null;
    }

    try {
      return StoredCredentialsSchema.parse(JSON.parse(data));
    } catch (error) {
      logger.warn('Ignoring malformed Drive token cache', { file: this.filePath, error: errorMessage(error) });
      return null;
    }
  }

  async setToken(credentials: Auth.Credentials): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    // Write atomically by writing to temp file then renaming
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(credentials, null, 2), { encoding: 'utf-8', mode: 0o600 });
    await fs.rename(tempPath, this.filePath);

    logger.debug('Drive token cache updated', {
      expiresAt: credentials.expiry_date ? new Date(credentials.expiry_date).toISOString() : null,
    });
  }

  async clearToken(): Promise<void> {
    try {
      await fs.unlink(this.filePath);
      logger.info('Drive token cache cleared');
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw error;
      }
    }
  }
}

/**
 * In-memory token store for tests
 */
export class MemoryTokenStore implements TokenStore {
  constructor(private token: Auth.Credentials | null = null) {}

  async getToken(): Promise<Auth.Credentials | null> {
    return this.token;
  }

  async setToken(credentials: Auth.Credentials): Promise<void> {
    this.token = credentials;
  }

  async clearToken(): Promise<void> {
    this.token = null;
  }
}
