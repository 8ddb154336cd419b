/**
 * Google Drive relocator errors
 */

export class DriveAuthError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DriveAuthError';
    Object.setPrototypeOf(this, DriveAuthError.prototype);
  }
}

export class DrivePathError extends Error {
  constructor(
    message: string,
    public readonly drivePath: string
  ) {
    super(message);
    this.name = 'DrivePathError';
    Object.setPrototypeOf(this, DrivePathError.prototype);
  }
}
