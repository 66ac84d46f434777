import { BaseError } from './base.error';

/**
 * Generic file system failure
 */
export class FileSystemError extends BaseError {
  public readonly code = 'FILESYSTEM_ERROR';
  public readonly recoverable = true;
}

/**
 * File or directory does not exist
 */
export class FileNotFoundError extends BaseError {
  public readonly code = 'FILE_NOT_FOUND';
  public readonly recoverable = false;
}

/**
 * Path string rejected before touching the disk
 */
export class InvalidPathError extends BaseError {
  public readonly code = 'INVALID_PATH';
  public readonly recoverable = false;
}
