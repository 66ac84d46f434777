import { ConfigDocument } from './config.document';
import { FileSystem } from './filesystem.service';
import { BaseError, describeError } from '../errors/base.error';
import { DocumentIoError } from '../errors/document.error';

/**
 * Reads and persists configuration documents.
 *
 * Absence is the caller's concern: `read` of a missing file fails with
 * `DocumentIoError` like any other unreadable file.
 */
export interface DocumentStore {
  exists(filePath: string): Promise<boolean>;
  /**
   * @throws DocumentParseError on malformed TOML
   * @throws DocumentIoError when the file cannot be read
   */
  read(filePath: string): Promise<ConfigDocument>;
  /**
   * Replace the file atomically. On failure the previous content is kept.
   *
   * @throws DocumentIoError
   */
  write(document: ConfigDocument, filePath: string): Promise<void>;
}

/**
 * TOML documents on a file system
 */
export class TomlDocumentStore implements DocumentStore {
  private readonly fileSystem: FileSystem;

  constructor(fileSystem: FileSystem) {
    this.fileSystem = fileSystem;
  }

  public async exists(filePath: string): Promise<boolean> {
    return await this.fileSystem.isFile(filePath);
  }

  public async read(filePath: string): Promise<ConfigDocument> {
    let text: string;
    try {
      text = await this.fileSystem.readFile(filePath);
    } catch (error) {
      throw new DocumentIoError(
        `Failed to read configuration ${filePath}`,
        filePath,
        detailsOf(error),
      );
    }
    return ConfigDocument.parse(text, filePath);
  }

  public async write(document: ConfigDocument, filePath: string): Promise<void> {
    try {
      await this.fileSystem.writeFileAtomic(filePath, document.toString());
    } catch (error) {
      throw new DocumentIoError(
        `Failed to write configuration ${filePath}`,
        filePath,
        detailsOf(error),
      );
    }
  }
}

/**
 * Documents kept as text in a map, keyed by path
 */
export class MemoryDocumentStore implements DocumentStore {
  private readonly texts = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [filePath, text] of Object.entries(initial)) {
      this.texts.set(filePath, text);
    }
  }

  /**
   * Stored text of `filePath`, undefined when never written
   */
  public textOf(filePath: string): string | undefined {
    return this.texts.get(filePath);
  }

  public async exists(filePath: string): Promise<boolean> {
    return this.texts.has(filePath);
  }

  public async read(filePath: string): Promise<ConfigDocument> {
    const text = this.texts.get(filePath);
    if (text === undefined) {
      throw new DocumentIoError(`Failed to read configuration ${filePath}`, filePath, 'no such document');
    }
    return ConfigDocument.parse(text, filePath);
  }

  public async write(document: ConfigDocument, filePath: string): Promise<void> {
    this.texts.set(filePath, document.toString());
  }
}

function detailsOf(error: unknown): string {
  return error instanceof BaseError ? error.toString() : describeError(error);
}
