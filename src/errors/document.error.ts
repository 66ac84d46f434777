import { BaseError } from './base.error';

/**
 * Configuration document is not valid TOML
 */
export class DocumentParseError extends BaseError {
  public readonly code = 'DOCUMENT_PARSE_ERROR';
  public readonly recoverable = true;
  public readonly line: number;
  public readonly column: number;
  public readonly path?: string | undefined;

  constructor(message: string, line: number, column: number, path?: string, details?: string) {
    super(message, details);
    this.line = line;
    this.column = column;
    this.path = path;
  }
}

/**
 * Configuration document could not be read or written
 */
export class DocumentIoError extends BaseError {
  public readonly code = 'DOCUMENT_IO_ERROR';
  public readonly recoverable = true;
  public readonly path: string;

  constructor(message: string, path: string, details?: string) {
    super(message, details);
    this.path = path;
  }
}

/**
 * Decoded section does not have the expected shape
 */
export class DocumentValidationError extends BaseError {
  public readonly code = 'DOCUMENT_VALIDATION_ERROR';
  public readonly recoverable = true;
}

/**
 * Repository name already taken
 */
export class DuplicateRepoError extends BaseError {
  public readonly code = 'DUPLICATE_REPO';
  public readonly recoverable = false;
  public readonly repoName: string;

  constructor(repoName: string) {
    super(`Repository '${repoName}' already exists`);
    this.repoName = repoName;
  }
}

/**
 * Entry missing from its section
 */
export class EntryNotFoundError extends BaseError {
  public readonly code = 'ENTRY_NOT_FOUND';
  public readonly recoverable = false;
  public readonly section: 'repos' | 'hooks';
  public readonly key: string;

  constructor(section: 'repos' | 'hooks', key: string) {
    super(
      section === 'repos'
        ? `Repository '${key}' not found`
        : `No hooks configured for command '${key}'`,
    );
    this.section = section;
    this.key = key;
  }
}
