import * as path from 'path';
import { ConfigDocument } from './config.document';
import { DocumentStore } from './document.store';
import { FileSystem } from './filesystem.service';
import { Locator } from './locator.service';
import { CONFIG_SKELETON, RepoEntry } from '../types/config.types';
import { HookAction, HookEntry, ResolvedHookAction } from '../types/hook.types';
import { RepoNameSchema } from '../types/config.schema';
import { BaseError, describeError } from '../errors/base.error';
import { DocumentIoError, DocumentValidationError } from '../errors/document.error';
import { PlatformDetector, PlatformInfo } from '../utils/platform.detector';
import { logger } from '../utils/logger.service';

/**
 * Configuration manager: ties the locator to the document store.
 *
 * Every mutation reads the document, edits it in memory and persists it only
 * when the edit succeeded, so a rejected edit leaves the file untouched.
 */
export class ConfigManager {
  private readonly locator: Locator;
  private readonly store: DocumentStore;
  private readonly fileSystem: FileSystem;

  constructor(locator: Locator, store: DocumentStore, fileSystem: FileSystem) {
    this.locator = locator;
    this.store = store;
    this.fileSystem = fileSystem;
  }

  public getLocator(): Locator {
    return this.locator;
  }

  public getConfigPath(): string {
    return this.locator.configDocumentPath();
  }

  /**
   * Create the directory layout and a commented skeleton document.
   * An existing document is never overwritten.
   *
   * @returns true when the skeleton was written
   */
  public async bootstrap(): Promise<boolean> {
    await this.locator.ensureConfigDirExists();

    const configPath = this.getConfigPath();
    if (await this.store.exists(configPath)) {
      logger.debug(`Configuration already present at ${configPath}`);
      return false;
    }

    await this.store.write(ConfigDocument.parse(CONFIG_SKELETON), configPath);
    logger.debug(`Wrote configuration skeleton to ${configPath}`);
    return true;
  }

  /**
   * Load the document; a missing file reads as an empty document
   */
  public async load(): Promise<ConfigDocument> {
    const configPath = this.getConfigPath();
    if (!(await this.store.exists(configPath))) {
      logger.debug(`No configuration at ${configPath}, using an empty document`);
      return ConfigDocument.empty();
    }
    return await this.store.read(configPath);
  }

  // Repositories

  public async addRepository(name: string, target?: string): Promise<RepoEntry> {
    return await this.addRepositoryEntry(target === undefined ? { name } : { name, target });
  }

  /**
   * @throws DuplicateRepoError when the name is taken
   */
  public async addRepositoryEntry(entry: RepoEntry): Promise<RepoEntry> {
    await this.mutate(document => document.addRepo(entry));
    logger.debug(`Added repository '${entry.name}'`);
    return entry;
  }

  /**
   * @throws EntryNotFoundError
   */
  public async removeRepository(name: string): Promise<void> {
    await this.mutate(document => document.removeRepo(name));
    logger.debug(`Removed repository '${name}'`);
  }

  /**
   * @throws EntryNotFoundError when `from` is missing
   * @throws DuplicateRepoError when `to` is taken
   */
  public async renameRepository(from: string, to: string): Promise<void> {
    await this.mutate(document => document.renameRepo(from, to));
    logger.debug(`Renamed repository '${from}' to '${to}'`);
  }

  public async getRepository(name: string): Promise<RepoEntry | undefined> {
    return (await this.load()).getRepo(name);
  }

  public async listRepositories(): Promise<RepoEntry[]> {
    return (await this.load()).listRepos();
  }

  /**
   * Repositories with a bootstrap section whose constraints admit this machine
   */
  public async bootstrapCandidates(platform: PlatformInfo): Promise<RepoEntry[]> {
    const repos = await this.listRepositories();
    return repos.filter(repo => {
      const bootstrap = repo.bootstrap;
      if (!bootstrap) {
        return false;
      }
      if (bootstrap.os && !PlatformDetector.matchesOsType(bootstrap.os, platform.platform)) {
        return false;
      }
      if (bootstrap.users && (!platform.user || !bootstrap.users.includes(platform.user))) {
        return false;
      }
      if (bootstrap.hosts && !bootstrap.hosts.includes(platform.host)) {
        return false;
      }
      return true;
    });
  }

  // Hooks

  /**
   * Hook actions of `command` with script paths inside the hooks directory.
   * Scripts are not checked for existence here.
   */
  public async hooksFor(command: string): Promise<ResolvedHookAction[]> {
    const entry = (await this.load()).getHook(command);
    if (!entry) {
      return [];
    }
    return entry.actions.map(action => ({
      ...action,
      scriptPath: this.locator.hookScriptPath(action.script),
    }));
  }

  public async setHooks(command: string, actions: HookAction[]): Promise<void> {
    await this.mutate(document => document.setHook({ command, actions }));
  }

  /**
   * @throws EntryNotFoundError when the command has no hooks
   */
  public async removeHooks(command: string): Promise<void> {
    await this.mutate(document => document.removeHook(command));
  }

  public async listHooks(): Promise<HookEntry[]> {
    return (await this.load()).listHooks();
  }

  // Ignore files

  /**
   * Replace the ignore file of a repository, one pattern per line
   */
  public async writeIgnoreFile(name: string, patterns: string[]): Promise<string> {
    this.validateRepoName(name);
    const filePath = this.locator.ignoreFilePath(name);

    try {
      await this.fileSystem.createDirectory(path.dirname(filePath));
      await this.fileSystem.writeFileAtomic(filePath, patterns.map(pattern => `${pattern}\n`).join(''));
    } catch (error) {
      throw new DocumentIoError(
        `Failed to write ignore file ${filePath}`,
        filePath,
        error instanceof BaseError ? error.toString() : describeError(error),
      );
    }

    logger.debug(`Wrote ${patterns.length} pattern(s) to ${filePath}`);
    return filePath;
  }

  /**
   * Patterns of a repository's ignore file, empty when it has none
   */
  public async readIgnoreFile(name: string): Promise<string[]> {
    this.validateRepoName(name);
    const filePath = this.locator.ignoreFilePath(name);
    if (!(await this.fileSystem.isFile(filePath))) {
      return [];
    }

    let content: string;
    try {
      content = await this.fileSystem.readFile(filePath);
    } catch (error) {
      throw new DocumentIoError(
        `Failed to read ignore file ${filePath}`,
        filePath,
        error instanceof BaseError ? error.toString() : describeError(error),
      );
    }
    return content.split(/\r?\n/).filter(line => line.length > 0);
  }

  private async mutate(edit: (document: ConfigDocument) => void): Promise<void> {
    const document = await this.load();
    edit(document);

    const configPath = this.getConfigPath();
    await this.fileSystem.createDirectory(path.dirname(configPath));
    await this.store.write(document, configPath);
  }

  private validateRepoName(name: string): void {
    const result = RepoNameSchema.safeParse(name);
    if (!result.success) {
      throw new DocumentValidationError(
        'Invalid repository name',
        result.error.issues.map(issue => issue.message).join(', '),
      );
    }
  }
}
