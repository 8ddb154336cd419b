/**
 * Migration run error types
 */

import { ZoteroApiError } from '../zotero/errors';

/**
 * Checkpoint file exists but cannot be read back (corrupt, wrong format)
 */
export class CheckpointError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(message);
    this.name = 'CheckpointError';
    Object.setPrototypeOf(this, CheckpointError.prototype);
  }
}

/**
 * Checkpoint could not be written; the resume point is no longer trustworthy
 */
export class CheckpointPersistenceError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'CheckpointPersistenceError';
    Object.setPrototypeOf(this, CheckpointPersistenceError.prototype);
  }
}

/**
 * The dry-run output file cannot be opened or written
 */
export class DryRunOutputError extends Error {
  constructor(
    message: string,
    public readonly target: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DryRunOutputError';
    Object.setPrototypeOf(this, DryRunOutputError.prototype);
  }
}

/**
 * Whether an error escaping one record should stop the whole run.
 * Checkpoint failures, a broken dry-run output and rejected credentials would
 * repeat for every later batch.
 */
export function isFatalRunError(error: unknown): boolean {
  if (
    error instanceof CheckpointError ||
    error instanceof CheckpointPersistenceError ||
    error instanceof DryRunOutputError
  ) {
    return true;
  }
  if (error instanceof ZoteroApiError) {
    return error.isUnauthorized();
  }
  return false;
}
