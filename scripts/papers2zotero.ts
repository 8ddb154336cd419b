#!/usr/bin/env node
/**
 * papers2zotero: import a Papers2 library into Zotero in resumable batches
 */

import 'dotenv/config';
import { parseArgs } from 'util';
import { MigrationConfigError, loadConfigFile, resolveMigrationConfig } from '../lib/migration/config';
import { errorMessage } from '../lib/migration/logging';
import { RunSummary, executeMigration } from '../lib/migration/runner';

const OPTIONS = {
  config: { type: 'string', short: 'c' },
  'papers2-folder': { type: 'string', short: 'f' },
  'api-key': { type: 'string', short: 'a' },
  'library-id': { type: 'string', short: 'i' },
  'library-type': { type: 'string', short: 't' },
  'include-collections': { type: 'string', short: 'C' },
  'no-collections': { type: 'boolean' },
  'keyword-types': { type: 'string', short: 'k' },
  'label-map': { type: 'string', short: 'l' },
  'label-tags-prefix': { type: 'string', short: 'L' },
  rowids: { type: 'string', short: 'r' },
  author: { type: 'string' },
  types: { type: 'string' },
  'include-deleted': { type: 'boolean' },
  'exclude-duplicates': { type: 'boolean' },
  'include-manuscripts': { type: 'boolean' },
  'all-reviews': { type: 'boolean' },
  'batch-size': { type: 'string' },
  'checkpoint-file': { type: 'string' },
  'errors-file': { type: 'string' },
  retry: { type: 'boolean' },
  dryrun: { type: 'string' },
  'max-pubs': { type: 'string' },
  attachments: { type: 'string' },
  'attachment-link-base': { type: 'string' },
  'attachment-cloud': { type: 'string' },
  'cloud-auth-settings': { type: 'string' },
  'cloud-token-file': { type: 'string' },
  'cloud-source-root': { type: 'string' },
  'cloud-target-root': { type: 'string' },
  'move-attachments': { type: 'boolean' },
  'log-level': { type: 'string' },
  'http-log-level': { type: 'string' },
  'sql-log-level': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

const USAGE = `Usage: papers2zotero [options]

Source
  -f, --papers2-folder <dir>    Papers2 library folder (default ~/Papers2)
  -r, --rowids <ids>            Only these publication ids (comma separated)
  --author <text>               Only publications whose author string contains text
  --types <names>               Only these publication types (comma separated)
  --include-deleted             Include publications marked deleted
  --exclude-duplicates          Skip publications flagged as duplicates
  --include-manuscripts         Include manuscripts

Zotero (defaults from ZOTERO_* environment variables)
  -a, --api-key <key>  -i, --library-id <id>  -t, --library-type user|group

Metadata
  -C, --include-collections <names>  Only file into these collections
  --no-collections              Do not file into collections
  -k, --keyword-types <kinds>   user,auto,label (default all)
  -l, --label-map <pairs>       Red=urgent,Blue=read ('' disables a colour)
  -L, --label-tags-prefix <text>  Prefix for label tags (default Label)
  --all-reviews                 Import every review, not only your own

Run
  --batch-size <n>              Items per batch (default 50)
  --checkpoint-file <file>      Resume file (default papers2zotero.checkpoint.json)
  --errors-file <file>          Error log (default papers2zotero_errors.log)
  --retry                       Retry publications that failed before
  --dryrun [file]               Print items instead of importing (stdout by default)
  --max-pubs <n>                Stop after n publications
  -c, --config <file>           JSON file of run parameters

Attachments
  --attachments all|unread|none
  --attachment-link-base <dir>  Link attachments under this folder instead of uploading
  --move-attachments            Move rather than copy linked files
  --attachment-cloud gdrive     Relocate linked files inside Google Drive
  --cloud-auth-settings <file>  --cloud-token-file <file>
  --cloud-source-root <path>    --cloud-target-root <path>

Logging
  --log-level  --http-log-level  --sql-log-level   DEBUG|INFO|WARN|ERROR
`;

export interface CliArguments {
  help: boolean;
  configFile?: string;
  parameters: Record<string, unknown>;
}

function camelCase(flag: string): string {
  return flag.replace(/-([a-z0-9])/g, (_, letter: string) => letter.toUpperCase());
}

const RENAMED: Record<string, string> = {
  rowids: 'rowIds',
};

/**
 * `--dryrun` takes an optional file; a bare flag means stdout
 */
export function normalizeArgv(argv: string[]): string[] {
  return argv.map((arg, index) => {
    const next = argv[index + 1];
    if (arg === '--dryrun' && (next === undefined || next.startsWith('-'))) {
      return '--dryrun=stdout';
    }
    return arg;
  });
}

export function parseCliArguments(argv: string[]): CliArguments {
  const { values } = parseArgs({ args: normalizeArgv(argv), options: OPTIONS, strict: true });

  const parameters: Record<string, unknown> = {};
  for (const [flag, value] of Object.entries(values)) {
    if (flag === 'config' || flag === 'help' || value === undefined) {
      continue;
    }
    parameters[RENAMED[flag] ?? camelCase(flag)] = value;
  }

  return {
    help: values.help ?? false,
    configFile: values.config,
    parameters,
  };
}

function printSummary(summary: RunSummary): void {
  const { stats } = summary;
  console.log(
    [
      `Considered ${summary.considered}, enqueued ${summary.enqueued}, skipped ${summary.skipped}, errors ${summary.errored}`,
      `Zotero: ${stats.created} created, ${stats.unchanged} unchanged, ${stats.failed} failed in ${stats.batches} batches`,
      summary.halted ? `Halted: ${summary.haltReason}` : 'Completed',
    ].join('\n')
  );
}

export async function main(argv: string[]): Promise<number> {
  let cli: CliArguments;
  try {
    cli = parseCliArguments(argv);
  } catch (error) {
    console.error(`${errorMessage(error)}\n\n${USAGE}`);
    return 1;
  }

  if (cli.help) {
    console.log(USAGE);
    return 0;
  }

  try {
    const fileLayer = cli.configFile ? await loadConfigFile(cli.configFile) : {};
    const config = resolveMigrationConfig(fileLayer, cli.parameters);
    const summary = await executeMigration(config);
    printSummary(summary);
    return summary.halted ? 1 : 0;
  } catch (error) {
    if (error instanceof MigrationConfigError) {
      console.error(error.message);
    } else {
      console.error('✗ Migration failed:', errorMessage(error));
    }
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exit(code);
    })
    .catch(error => {
      console.error('\n✗ Error:', error);
      process.exit(1);
    });
}
