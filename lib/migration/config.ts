import { promises as fs } from 'fs';
import { z } from 'zod';
import { LABEL_NAMES, LabelName, labelFromName, pubTypeFromName, PubTypeKey } from '../papers/schema';
import { KEYWORD_KINDS, KeywordKind } from './extractors';
import { LOG_LEVELS, parseLogLevel } from './log-config';

export const DEFAULT_CHECKPOINT_FILE = 'papers2zotero.checkpoint.json';
export const DEFAULT_ERRORS_FILE = 'papers2zotero_errors.log';

/**
 * Split a comma-delimited string; arrays (from a config file) pass through
 */
export function parseList(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  return value
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0);
}

/**
 * `Red=urgent,Blue=read` → { Red: 'urgent', Blue: 'read' }
 */
export function parseLabelPairs(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const pairs: Record<string, string> = {};
  for (const part of value.split(',')) {
    if (part.trim().length === 0) {
      continue;
    }
    const separator = part.indexOf('=');
    if (separator < 0) {
      throw new Error(`Invalid label mapping "${part}", expected <color>=<tag>`);
    }
    pairs[part.slice(0, separator).trim()] = part.slice(separator + 1).trim();
  }
  return pairs;
}

const logLevel = z
  .string()
  .transform((value, ctx) => {
    try {
      return parseLogLevel(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected one of ${LOG_LEVELS.join(', ')}` });
      return z.NEVER;
    }
  });

const positiveInt = z.coerce.number().int().positive();

export const MigrationConfigSchema = z.object({
  papers2Folder: z.string().default('~/Papers2'),

  apiKey: z.string().optional(),
  libraryId: z.coerce.string().optional(),
  libraryType: z.enum(['user', 'group']).optional(),
  apiBase: z.string().url().optional(),

  includeCollections: z.preprocess(parseList, z.array(z.string())).optional(),
  noCollections: z.boolean().default(false),
  keywordTypes: z.preprocess(parseList, z.array(z.enum(['user', 'auto', 'label']))).default([...KEYWORD_KINDS]),
  labelMap: z.preprocess(parseLabelPairs, z.record(z.string())).default({}),
  labelTagsPrefix: z.string().default('Label'),

  rowIds: z.preprocess(parseList, z.array(z.coerce.number().int())).optional(),
  author: z.string().optional(),
  types: z.preprocess(parseList, z.array(z.string())).optional(),
  includeDeleted: z.boolean().default(false),
  excludeDuplicates: z.boolean().default(false),
  includeManuscripts: z.boolean().default(false),
  allReviews: z.boolean().default(false),

  batchSize: positiveInt.default(50),
  checkpointFile: z.string().default(DEFAULT_CHECKPOINT_FILE),
  errorsFile: z.string().default(DEFAULT_ERRORS_FILE),
  retry: z.boolean().default(false),
  /** null: live run; 'stdout' or a file path: dry run */
  dryrun: z.string().nullable().default(null),
  maxPubs: positiveInt.optional(),

  attachments: z.enum(['all', 'unread', 'none']).default('all'),
  attachmentLinkBase: z.string().optional(),
  attachmentCloud: z.enum(['gdrive']).optional(),
  cloudAuthSettings: z.string().default('client_secrets.json'),
  cloudTokenFile: z.string().default('gdrive-token.json'),
  cloudSourceRoot: z.string().default('/Papers2'),
  cloudTargetRoot: z.string().default('/Zotero'),
  moveAttachments: z.boolean().default(false),

  logLevel: logLevel.default('WARN'),
  httpLogLevel: logLevel.default('WARN'),
  sqlLogLevel: logLevel.default('WARN'),
});

export type MigrationConfigInput = z.input<typeof MigrationConfigSchema>;
export type MigrationConfig = z.output<typeof MigrationConfigSchema>;

export class MigrationConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MigrationConfigError';
    Object.setPrototypeOf(this, MigrationConfigError.prototype);
  }
}

/**
 * Validate run parameters; later layers override earlier ones
 *
 * @throws {MigrationConfigError} Listing every invalid parameter
 */
export function resolveMigrationConfig(...layers: Record<string, unknown>[]): MigrationConfig {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }

  let result: ReturnType<typeof MigrationConfigSchema.safeParse>;
  try {
    result = MigrationConfigSchema.safeParse(merged);
  } catch (error) {
    throw new MigrationConfigError(error instanceof Error ? error.message : String(error));
  }

  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new MigrationConfigError(`Invalid migration configuration:\n${issues}`);
  }
  return result.data;
}

const ConfigFileSchema = z.record(z.unknown());

/**
 * Read a JSON config file of run parameters (same names as the resolved config)
 */
export async function loadConfigFile(filePath: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new MigrationConfigError(
      `Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  try {
    return ConfigFileSchema.parse(JSON.parse(content));
  } catch (error) {
    throw new MigrationConfigError(
      `Config file ${filePath} is not a JSON object: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Tag text per label colour: None never tags, overrides win, other
 * colours become `<prefix><Color>`. An empty override disables the tag.
 */
export function buildLabelMap(
  prefix: string,
  overrides: Record<string, string> = {}
): Map<LabelName, string | null> {
  const labelMap = new Map<LabelName, string | null>();
  for (const [color, tag] of Object.entries(overrides)) {
    labelMap.set(labelFromName(color), tag.length > 0 ? tag : null);
  }
  labelMap.set('None', null);
  for (const label of LABEL_NAMES) {
    if (!labelMap.has(label)) {
      labelMap.set(label, `${prefix}${label}`);
    }
  }
  return labelMap;
}

/**
 * Collections to file into: null for all source collections, [] for none
 */
export function collectionSelection(config: MigrationConfig): string[] | null {
  if (config.includeCollections !== undefined) {
    return config.includeCollections;
  }
  return config.noCollections ? [] : null;
}

export function resolvePubTypes(names: string[] | undefined): PubTypeKey[] | undefined {
  return names?.map(pubTypeFromName);
}

export function keywordKinds(config: MigrationConfig): Set<KeywordKind> {
  return new Set(config.keywordTypes);
}

/**
 * Effective config for the run banner, without credentials
 */
export function redactConfig(config: MigrationConfig): Record<string, unknown> {
  return { ...config, apiKey: config.apiKey ? '[REDACTED]' : undefined };
}
