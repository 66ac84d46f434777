import * as path from 'path';
import { FileSystem, validatePathString } from './filesystem.service';
import { FileNotFoundError, FileSystemError } from '../errors/filesystem.error';

interface MemoryFile {
  content: string;
  executable: boolean;
}

/**
 * In-memory file system.
 *
 * Lets the locator, the document store and the hook runner run against a
 * virtual directory tree. Writes need an existing parent directory, like a
 * real disk, and a write failure can be armed to exercise error paths.
 */
export class MemoryFileSystem implements FileSystem {
  private readonly files = new Map<string, MemoryFile>();
  private readonly directories = new Set<string>([path.resolve('/')]);
  private writeFailure: Error | undefined;

  constructor(initialFiles: Record<string, string> = {}) {
    for (const [filePath, content] of Object.entries(initialFiles)) {
      this.seed(filePath, content);
    }
  }

  /**
   * Create a file and its parent directories without going through the write path
   */
  public seed(filePath: string, content: string, executable = false): void {
    const resolved = path.resolve(filePath);
    this.addDirectoryTree(path.dirname(resolved));
    this.files.set(resolved, { content, executable });
  }

  /**
   * Make every following write fail with `error` until cleared
   */
  public failWrites(error: Error | undefined): void {
    this.writeFailure = error;
  }

  /**
   * Paths of every stored file, sorted
   */
  public listFiles(): string[] {
    return [...this.files.keys()].sort();
  }

  public async pathExists(filePath: string): Promise<boolean> {
    const resolved = path.resolve(filePath);
    return this.files.has(resolved) || this.directories.has(resolved);
  }

  public async isFile(filePath: string): Promise<boolean> {
    return this.files.has(path.resolve(filePath));
  }

  public async isDirectory(filePath: string): Promise<boolean> {
    return this.directories.has(path.resolve(filePath));
  }

  public async isExecutable(filePath: string): Promise<boolean> {
    return this.files.get(path.resolve(filePath))?.executable ?? false;
  }

  public async readFile(filePath: string): Promise<string> {
    validatePathString(filePath);
    const file = this.files.get(path.resolve(filePath));
    if (!file) {
      throw new FileNotFoundError(`File not found: ${filePath}`);
    }
    return file.content;
  }

  public async writeFile(filePath: string, content: string): Promise<void> {
    this.write(filePath, content);
  }

  public async writeFileAtomic(filePath: string, content: string): Promise<void> {
    // Whole-value replacement: the previous content survives any failure.
    this.write(filePath, content);
  }

  public async createDirectory(dirPath: string): Promise<void> {
    validatePathString(dirPath);
    const resolved = path.resolve(dirPath);
    if (this.files.has(resolved)) {
      throw new FileSystemError(`Failed to create directory: ${dirPath}`, 'a file exists at path');
    }
    this.addDirectoryTree(resolved);
  }

  public async remove(targetPath: string): Promise<void> {
    validatePathString(targetPath);
    const resolved = path.resolve(targetPath);
    const prefix = resolved.endsWith(path.sep) ? resolved : `${resolved}${path.sep}`;

    this.files.delete(resolved);
    this.directories.delete(resolved);
    for (const filePath of [...this.files.keys()]) {
      if (filePath.startsWith(prefix)) {
        this.files.delete(filePath);
      }
    }
    for (const dirPath of [...this.directories]) {
      if (dirPath.startsWith(prefix)) {
        this.directories.delete(dirPath);
      }
    }
  }

  public validatePathString(filePath: string): void {
    validatePathString(filePath);
  }

  private write(filePath: string, content: string): void {
    validatePathString(filePath);
    const resolved = path.resolve(filePath);

    if (this.writeFailure) {
      throw new FileSystemError(`Failed to write file: ${filePath}`, this.writeFailure.message);
    }
    if (!this.directories.has(path.dirname(resolved))) {
      throw new FileSystemError(
        `Failed to write file: ${filePath}`,
        `ENOENT: no such directory '${path.dirname(resolved)}'`,
      );
    }
    if (this.directories.has(resolved)) {
      throw new FileSystemError(`Failed to write file: ${filePath}`, 'EISDIR: path is a directory');
    }

    const executable = this.files.get(resolved)?.executable ?? false;
    this.files.set(resolved, { content, executable });
  }

  private addDirectoryTree(dirPath: string): void {
    let current = dirPath;
    while (!this.directories.has(current)) {
      this.directories.add(current);
      const parent = path.dirname(current);
      if (parent === current) {
        break;
      }
      current = parent;
    }
  }
}
