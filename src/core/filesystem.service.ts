import * as path from 'path';
import * as fs from 'fs-extra';
import { randomBytes } from 'crypto';
import { describeError } from '../errors/base.error';
import { FileNotFoundError, FileSystemError, InvalidPathError } from '../errors/filesystem.error';
import { logger } from '../utils/logger.service';

const MAX_PATH_LENGTH = 4096;

/**
 * File system capability used by the locator, the document store and the hook runner
 */
export interface FileSystem {
  pathExists(filePath: string): Promise<boolean>;
  isFile(filePath: string): Promise<boolean>;
  isDirectory(filePath: string): Promise<boolean>;
  isExecutable(filePath: string): Promise<boolean>;
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, content: string): Promise<void>;
  /** Replace `filePath` through a temporary file in the same directory */
  writeFileAtomic(filePath: string, content: string): Promise<void>;
  /** Recursive and idempotent */
  createDirectory(dirPath: string): Promise<void>;
  remove(targetPath: string): Promise<void>;
  validatePathString(filePath: string): void;
}

/**
 * Check a path string without touching the disk
 */
export function validatePathString(filePath: string): void {
  if (!filePath || filePath.trim().length === 0) {
    throw new InvalidPathError('Path cannot be empty');
  }
  if (filePath.includes('\0')) {
    throw new InvalidPathError('Path cannot contain null bytes');
  }
  if (filePath.length > MAX_PATH_LENGTH) {
    throw new InvalidPathError(`Path too long (max ${MAX_PATH_LENGTH} characters)`);
  }
}

/**
 * Temporary sibling used while replacing `filePath`
 */
export function temporaryPathFor(filePath: string): string {
  const suffix = `${process.pid}.${randomBytes(6).toString('hex')}`;
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${suffix}.tmp`);
}

/**
 * File system capability backed by fs-extra
 */
export class FileSystemService implements FileSystem {
  public async pathExists(filePath: string): Promise<boolean> {
    return await fs.pathExists(filePath);
  }

  public async isFile(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile();
    } catch {
      return false;
    }
  }

  public async isDirectory(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isDirectory();
    } catch {
      return false;
    }
  }

  public async isExecutable(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath, fs.constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  public async readFile(filePath: string): Promise<string> {
    this.validatePathString(filePath);

    if (!(await fs.pathExists(filePath))) {
      throw new FileNotFoundError(`File not found: ${filePath}`);
    }

    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new FileSystemError(`Failed to read file: ${filePath}`, describeError(error));
    }
  }

  public async writeFile(filePath: string, content: string): Promise<void> {
    this.validatePathString(filePath);

    try {
      await fs.writeFile(filePath, content, 'utf8');
    } catch (error) {
      throw new FileSystemError(`Failed to write file: ${filePath}`, describeError(error));
    }
  }

  public async writeFileAtomic(filePath: string, content: string): Promise<void> {
    this.validatePathString(filePath);

    const tempPath = temporaryPathFor(filePath);
    let committed = false;

    try {
      await fs.writeFile(tempPath, content, 'utf8');
      await fs.rename(tempPath, filePath);
      committed = true;
    } catch (error) {
      throw new FileSystemError(`Failed to write file: ${filePath}`, describeError(error));
    } finally {
      if (!committed) {
        await this.discardTemporary(tempPath);
      }
    }
  }

  public async createDirectory(dirPath: string): Promise<void> {
    this.validatePathString(dirPath);

    try {
      await fs.ensureDir(dirPath);
    } catch (error) {
      throw new FileSystemError(`Failed to create directory: ${dirPath}`, describeError(error));
    }
  }

  public async remove(targetPath: string): Promise<void> {
    this.validatePathString(targetPath);

    try {
      await fs.remove(targetPath);
    } catch (error) {
      throw new FileSystemError(`Failed to remove: ${targetPath}`, describeError(error));
    }
  }

  public validatePathString(filePath: string): void {
    validatePathString(filePath);
  }

  private async discardTemporary(tempPath: string): Promise<void> {
    try {
      await fs.remove(tempPath);
    } catch (error) {
      logger.warn(`Could not remove temporary file ${tempPath}: ${describeError(error)}`);
    }
  }
}
