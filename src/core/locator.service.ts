import * as path from 'path';
import * as os from 'os';
import { FileSystem } from './filesystem.service';
import { APP_NAME, DEFAULT_PATHS, DirLayout, ENV_VARS } from '../types/config.types';
import { LocatorError, LocatorIoError } from '../errors/locator.error';
import { BaseError, describeError } from '../errors/base.error';
import { logger } from '../utils/logger.service';

/**
 * Resolves where configuration, hook scripts, ignore files and repositories live.
 *
 * Path queries are pure joins against a layout resolved once at construction;
 * only `ensureConfigDirExists` touches the file system.
 */
export interface Locator {
  readonly layout: DirLayout;
  resolveConfigDir(): string;
  configDocumentPath(): string;
  dataDirPath(): string;
  hooksDirPath(): string;
  hookScriptPath(script: string): string;
  ignoreFilePath(repoName: string): string;
  repoStorePath(repoName: string): string;
  ensureConfigDirExists(): Promise<void>;
}

/**
 * Inputs of the XDG layout resolution
 */
export interface LayoutSources {
  /** Explicit configuration root; wins over every environment variable */
  override?: string | undefined;
  env?: NodeJS.ProcessEnv;
  homedir?: () => string | undefined;
  cwd?: () => string;
}

/**
 * Build a layout from a configuration root and a data root
 */
export function layoutFromRoots(configDir: string, dataDir: string): DirLayout {
  return {
    configDir,
    dataDir,
    configFile: path.join(configDir, DEFAULT_PATHS.configFile),
    hooksDir: path.join(configDir, DEFAULT_PATHS.hooksDir),
    ignoresDir: path.join(configDir, DEFAULT_PATHS.ignoresDir),
    reposDir: path.join(dataDir, DEFAULT_PATHS.reposDir),
  };
}

/**
 * Resolve the XDG base directory layout.
 *
 * Order for the configuration root: explicit override, `$TENDRIL_CONFIG_DIR`,
 * `$XDG_CONFIG_HOME/tendril`, `~/.config/tendril`. An override makes the
 * layout self-contained: repositories are stored under it too. Relative XDG
 * values are ignored, as the base directory convention requires.
 */
export function resolveDirLayout(sources: LayoutSources = {}): DirLayout {
  const env = sources.env ?? process.env;
  const cwd = sources.cwd ?? (() => process.cwd());

  const override = nonEmpty(sources.override) ?? nonEmpty(env[ENV_VARS.configDirOverride]);
  if (override) {
    const root = path.resolve(cwd(), override);
    logger.debug(`Configuration root overridden to ${root}`);
    return layoutFromRoots(root, root);
  }

  const lookupHome = once(() => findHome(env, sources.homedir ?? defaultHomedir));
  const configHome =
    absoluteOnly(env[ENV_VARS.xdgConfigHome]) ??
    path.join(requireHome(lookupHome()), DEFAULT_PATHS.xdgConfigFallback);
  const dataHome =
    absoluteOnly(env[ENV_VARS.xdgDataHome]) ??
    path.join(requireHome(lookupHome()), DEFAULT_PATHS.xdgDataFallback);

  return layoutFromRoots(path.join(configHome, APP_NAME), path.join(dataHome, APP_NAME));
}

abstract class BaseLocator implements Locator {
  public readonly layout: DirLayout;
  protected readonly fileSystem: FileSystem;

  protected constructor(layout: DirLayout, fileSystem: FileSystem) {
    this.layout = layout;
    this.fileSystem = fileSystem;

    logger.debug(`Configuration directory located at '${layout.configDir}'`);
    logger.debug(`Hook script directory located at '${layout.hooksDir}'`);
    logger.debug(`Repository directory located at '${layout.reposDir}'`);
  }

  public resolveConfigDir(): string {
    return this.layout.configDir;
  }

  public configDocumentPath(): string {
    return this.layout.configFile;
  }

  public dataDirPath(): string {
    return this.layout.dataDir;
  }

  public hooksDirPath(): string {
    return this.layout.hooksDir;
  }

  public hookScriptPath(script: string): string {
    return path.join(this.layout.hooksDir, script);
  }

  public ignoreFilePath(repoName: string): string {
    return path.join(this.layout.ignoresDir, `${repoName}${DEFAULT_PATHS.ignoreExtension}`);
  }

  public repoStorePath(repoName: string): string {
    return path.join(this.layout.reposDir, `${repoName}${DEFAULT_PATHS.repoExtension}`);
  }

  public async ensureConfigDirExists(): Promise<void> {
    const { configDir, hooksDir, ignoresDir, reposDir } = this.layout;

    for (const dir of [configDir, hooksDir, ignoresDir, reposDir]) {
      try {
        if (!(await this.fileSystem.isDirectory(dir))) {
          await this.fileSystem.createDirectory(dir);
          logger.debug(`Created directory ${dir}`);
        }
      } catch (error) {
        throw new LocatorIoError(
          `Failed to create directory ${dir}`,
          dir,
          error instanceof BaseError ? error.toString() : describeError(error),
        );
      }
    }
  }
}

/**
 * Locator following the XDG Base Directory convention
 */
export class XdgLocator extends BaseLocator {
  private constructor(layout: DirLayout, fileSystem: FileSystem) {
    super(layout, fileSystem);
  }

  /**
   * Resolve the layout from the environment.
   *
   * @throws LocatorError when no home or base directory can be determined
   */
  public static locate(fileSystem: FileSystem, sources: LayoutSources = {}): XdgLocator {
    return new XdgLocator(resolveDirLayout(sources), fileSystem);
  }
}

/**
 * Locator over a caller-provided layout, e.g. a virtual tree in tests
 */
export class FixedLocator extends BaseLocator {
  constructor(layout: DirLayout, fileSystem: FileSystem) {
    super(layout, fileSystem);
  }

  /**
   * Self-contained layout below `root`
   */
  public static under(root: string, fileSystem: FileSystem): FixedLocator {
    const resolved = path.resolve(root);
    return new FixedLocator(layoutFromRoots(resolved, resolved), fileSystem);
  }
}

function defaultHomedir(): string | undefined {
  try {
    return os.homedir();
  } catch {
    return undefined;
  }
}

function findHome(env: NodeJS.ProcessEnv, homedir: () => string | undefined): string | undefined {
  return absoluteOnly(env[ENV_VARS.home]) ?? absoluteOnly(homedir());
}

function requireHome(home: string | undefined): string {
  if (!home) {
    throw new LocatorError(
      'Cannot determine path to home directory',
      `set ${ENV_VARS.home}, ${ENV_VARS.xdgConfigHome} and ${ENV_VARS.xdgDataHome}, or ${ENV_VARS.configDirOverride}`,
    );
  }
  return home;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}

function absoluteOnly(value: string | undefined): string | undefined {
  const candidate = nonEmpty(value);
  return candidate && path.isAbsolute(candidate) ? candidate : undefined;
}

function once<T>(compute: () => T): () => T {
  let cached: { value: T } | undefined;
  return () => {
    if (!cached) {
      cached = { value: compute() };
    }
    return cached.value;
  };
}
