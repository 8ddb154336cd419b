import { z } from 'zod';
import { ZoteroConfigError } from './errors';

/**
 * Zotero API Configuration Schema
 * Validates the credentials and library identity for the target library
 */
const ZoteroConfigSchema = z.object({
  apiKey: z.string().min(1, 'ZOTERO_API_KEY is required'),
  libraryId: z.string().regex(/^\d+$/, 'ZOTERO_LIBRARY_ID must be a numeric library id'),
  libraryType: z.enum(['user', 'group']).default('user'),
  apiBase: z.string().url('ZOTERO_API_BASE must be a valid URL').default('https://api.zotero.org'),
});

export type ZoteroConfig = z.infer<typeof ZoteroConfigSchema>;

export interface ZoteroConfigOverrides {
  apiKey?: string;
  libraryId?: string;
  libraryType?: string;
  apiBase?: string;
}

/**
 * Load and validate Zotero configuration; explicit overrides (CLI flags) win over environment
 *
 * @throws {ZoteroConfigError} If required values are missing or invalid
 */
export function loadZoteroConfig(overrides: ZoteroConfigOverrides = {}): ZoteroConfig {
  const result = ZoteroConfigSchema.safeParse({
    apiKey: overrides.apiKey ?? process.env.ZOTERO_API_KEY,
    libraryId: overrides.libraryId ?? process.env.ZOTERO_LIBRARY_ID,
    libraryType: overrides.libraryType ?? process.env.ZOTERO_LIBRARY_TYPE ?? 'user',
    apiBase: overrides.apiBase ?? process.env.ZOTERO_API_BASE ?? 'https://api.zotero.org',
  });

  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ZoteroConfigError(
      `Zotero configuration validation failed:\n${issues}\n\n` +
      'Set ZOTERO_API_KEY and ZOTERO_LIBRARY_ID in .env or pass --api-key and --library-id'
    );
  }

  return result.data;
}

/**
 * Path prefix of the library on the Web API (/users/<id> or /groups/<id>)
 */
export function libraryPrefix(config: ZoteroConfig): string {
  return `/${config.libraryType === 'group' ? 'groups' : 'users'}/${config.libraryId}`;
}
