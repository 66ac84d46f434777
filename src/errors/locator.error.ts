import { BaseError } from './base.error';

/**
 * No home or base directory could be determined
 */
export class LocatorError extends BaseError {
  public readonly code = 'NO_HOME';
  public readonly recoverable = false;
}

/**
 * Configuration directories could not be created
 */
export class LocatorIoError extends BaseError {
  public readonly code = 'LOCATOR_IO';
  public readonly recoverable = true;
  public readonly path: string;

  constructor(message: string, path: string, details?: string) {
    super(message, details);
    this.path = path;
  }
}
