/**
 * Google Drive OAuth session for the Drive relocator
 *
 * Session setup is an explicit state machine:
 *   cached → refresh → authorized
 *   cached → interactive → authorized   (no cached token)
 *   refresh → interactive               (refresh failed; cache discarded)
 */

import * as fs from 'fs/promises';
import * as http from 'http';
import { Auth } from 'googleapis';
import { z } from 'zod';
import { errorMessage, logger } from '../../migration/logging';
import { DriveAuthError } from './errors';
import { FileTokenStore, TokenStore } from './token-store';

export const DRIVE_SCOPES = ['https://www.googleapis.com/auth/drive'];

const ClientEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).default([]),
});

const ClientSecretsSchema = z
  .object({
    installed: ClientEntrySchema.optional(),
    web: ClientEntrySchema.optional(),
  })
  .refine(secrets => secrets.installed !== undefined || secrets.web !== undefined, {
    message: 'Expected an "installed" or "web" client entry',
  });

export type ClientSecrets = z.infer<typeof ClientEntrySchema>;

export type DriveAuthState = 'cached' | 'refresh' | 'interactive' | 'authorized';

/**
 * Obtains fresh credentials from the user
 */
export type InteractiveAuthorizer = (client: Auth.OAuth2Client) => Promise<Auth.Credentials>;

/**
 * Read a Google OAuth client secrets file (as downloaded from the Cloud console)
 *
 * @throws {DriveAuthError} File missing or not a client secrets document
 */
export async function loadClientSecrets(filePath: string): Promise<ClientSecrets> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new DriveAuthError(`Cannot read Drive client secrets ${filePath}: ${errorMessage(error)}`, error);
  }

  let parsed: z.infer<typeof ClientSecretsSchema>;
  try {
    parsed = ClientSecretsSchema.parse(JSON.parse(content));
  } catch (error) {
    throw new DriveAuthError(`Invalid Drive client secrets ${filePath}: ${errorMessage(error)}`, error);
  }

  const entry = parsed.installed ?? parsed.web;
  if (!entry) {
    throw new DriveAuthError(`Invalid Drive client secrets ${filePath}: no client entry`);
  }
  return entry;
}

export function createOAuthClient(secrets: ClientSecrets): Auth.OAuth2Client {
  return new Auth.OAuth2Client(secrets.client_id, secrets.client_secret, secrets.redirect_uris[0]);
}

async function hasUsableToken(client: Auth.OAuth2Client): Promise<boolean> {
  try {
    const { token } = await client.getAccessToken();
    return Boolean(token);
  } catch (error) {
    logger.warn('Drive token refresh failed', { error: errorMessage(error) });
    return false;
  }
}

export interface DriveSessionOptions {
  client: Auth.OAuth2Client;
  tokenStore: TokenStore;
  authorize?: InteractiveAuthorizer;
}

/**
 * Bring the client to an authorized state and persist its credentials
 *
 * @throws {DriveAuthError} When neither the cached token nor interactive authorization works
 */
export async function establishDriveSession(options: DriveSessionOptions): Promise<Auth.OAuth2Client> {
  const { client, tokenStore } = options;
  const authorize = options.authorize ?? loopbackAuthorizer();

  let state: DriveAuthState = 'cached';
  while (state !== 'authorized') {
    logger.debug('Drive auth state', { state });
    switch (state) {
      case 'cached': {
        const cached = await tokenStore.getToken();
        if (cached) {
          client.setCredentials(cached);
          state = 'refresh';
        } else {
          state = 'interactive';
        }
        break;
      }
      case 'refresh': {
        if (await hasUsableToken(client)) {
          state = 'authorized';
        } else {
          await tokenStore.clearToken();
          client.setCredentials({});
          state = 'interactive';
        }
        break;
      }
      case 'interactive': {
        let credentials: Auth.Credentials;
        try {
          credentials = await authorize(client);
        } catch (error) {
          throw new DriveAuthError(`Drive authorization failed: ${errorMessage(error)}`, error);
        }
        client.setCredentials(credentials);
        if (!(await hasUsableToken(client))) {
          throw new DriveAuthError('Drive authorization did not yield a usable session');
        }
        state = 'authorized';
        break;
      }
    }
  }

  await tokenStore.setToken(client.credentials);

  // Refreshes during the run replace the cached token too
  client.on('tokens', tokens => {
    tokenStore.setToken({ ...client.credentials, ...tokens }).catch(error => {
      logger.warn('Failed to persist refreshed Drive token', { error: errorMessage(error) });
    });
  });

  return client;
}

export interface LoopbackAuthorizerOptions {
  timeoutMs?: number;
  prompt?: (authUrl: string) => void;
}

/**
 * Authorize in the browser, receiving the code on a one-shot 127.0.0.1 listener
 */
export function loopbackAuthorizer(options: LoopbackAuthorizerOptions = {}): InteractiveAuthorizer {
  const timeoutMs = options.timeoutMs ?? 5 * 60 * 1000;
  const prompt =
    options.prompt ??
    ((authUrl: string) => {
      console.log(`Authorize Google Drive access by visiting:\n\n  ${authUrl}\n`);
    });

  return async client => {
    const server = http.createServer();
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(0, '127.0.0.1', () => resolve());
    });

    try {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        throw new DriveAuthError('Loopback listener has no port');
      }
      const redirectUri = `http://127.0.0.1:${address.port}`;

      prompt(
        client.generateAuthUrl({
          access_type: 'offline',
          prompt: 'consent',
          scope: DRIVE_SCOPES,
          redirect_uri: redirectUri,
        })
      );

      const code = await waitForCode(server, redirectUri, timeoutMs);
      const { tokens } = await client.getToken({ code, redirect_uri: redirectUri });
      return tokens;
    } finally {
      server.closeAllConnections();
      server.close();
    }
  };
}

function waitForCode(server: http.Server, redirectUri: string, timeoutMs: number): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new DriveAuthError('Timed out waiting for Drive authorization'));
    }, timeoutMs);

    server.on('request', (req, res) => {
      const url = new URL(req.url ?? '/', redirectUri);
      const code = url.searchParams.get('code');
      const denied = url.searchParams.get('error');

      if (!code && !denied) {
        res.writeHead(404).end();
        return;
      }

      clearTimeout(timer);
      res.writeHead(200, { 'Content-Type': 'text/plain' });
      if (code) {
        res.end('Authorization complete. You can close this window.');
        resolve(code);
      } else {
        res.end('Authorization denied.');
        reject(new DriveAuthError(`Drive authorization denied: ${denied}`));
      }
    });
  });
}

export interface AuthorizeDriveOptions {
  clientSecretsFile: string;
  tokenFile: string;
  authorize?: InteractiveAuthorizer;
}

export async function authorizeDrive(options: AuthorizeDriveOptions): Promise<Auth.OAuth2Client> {
  const secrets = await loadClientSecrets(options.clientSecretsFile);
  return establishDriveSession({
    client: createOAuthClient(secrets),
    tokenStore: new FileTokenStore(options.tokenFile),
    authorize: options.authorize,
  });
}
