import { z } from 'zod';
import { ConfigManager } from './config.manager';
import { DocumentStore, TomlDocumentStore } from './document.store';
import { FileSystem, FileSystemService } from './filesystem.service';
import { HookCapabilities, HookRunner } from './hook.runner';
import { Locator, XdgLocator } from './locator.service';
import { TerminalPager } from './pager.service';
import { ExecaSpawner } from './process.service';
import { TerminalPrompt } from './prompt.service';
import { DEFAULT_SETTINGS, ENV_VARS, HOOK_MODES, HookMode, TendrilSettings } from '../types/config.types';
import { InvalidSettingError } from '../errors/settings.error';

/**
 * Global flags as commander hands them over
 */
export interface GlobalFlags {
  configDir?: string | undefined;
  runHook?: string | undefined;
  strictHooks?: boolean | undefined;
  abortOnHookFailure?: boolean | undefined;
}

/**
 * Everything a command needs, built once per process
 */
export interface AppContext {
  settings: TendrilSettings;
  fileSystem: FileSystem;
  locator: Locator;
  store: DocumentStore;
  configManager: ConfigManager;
  hookRunner: HookRunner;
  /** Working directory for hooks without their own `workdir` */
  cwd: string;
}

export interface ContextOverrides {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homedir?: () => string | undefined;
  fileSystem?: FileSystem;
  capabilities?: Partial<Omit<HookCapabilities, 'fileSystem'>>;
}

const HookModeSchema = z.enum(['always', 'never', 'prompt']);

/**
 * Merge flags over the environment over defaults
 *
 * @throws InvalidSettingError for an unknown hook mode
 */
export function resolveSettings(flags: GlobalFlags, env: NodeJS.ProcessEnv = process.env): TendrilSettings {
  const fromFlag = flags.runHook !== undefined;
  const rawMode = flags.runHook ?? env[ENV_VARS.runHook];

  return {
    configDir: flags.configDir,
    runHook: rawMode === undefined ? DEFAULT_SETTINGS.runHook : parseHookMode(rawMode, fromFlag),
    strictHooks: flags.strictHooks ?? DEFAULT_SETTINGS.strictHooks,
    abortOnHookFailure: flags.abortOnHookFailure ?? DEFAULT_SETTINGS.abortOnHookFailure,
  };
}

/**
 * Wire the locator, store, manager and hook runner for one process
 *
 * @throws LocatorError when no configuration directory can be determined
 */
export function createAppContext(settings: TendrilSettings, overrides: ContextOverrides = {}): AppContext {
  const env = overrides.env ?? process.env;
  const cwd = overrides.cwd ?? process.cwd();
  const fileSystem = overrides.fileSystem ?? new FileSystemService();

  const locator = XdgLocator.locate(fileSystem, {
    override: settings.configDir,
    env,
    cwd: () => cwd,
    ...(overrides.homedir ? { homedir: overrides.homedir } : {}),
  });
  const store = new TomlDocumentStore(fileSystem);
  const configManager = new ConfigManager(locator, store, fileSystem);

  const capabilities = overrides.capabilities ?? {};
  const hookRunner = new HookRunner(
    configManager,
    {
      fileSystem,
      spawner: capabilities.spawner ?? new ExecaSpawner(),
      pager: capabilities.pager ?? new TerminalPager({ command: env[ENV_VARS.pager] }),
      prompt: capabilities.prompt ?? new TerminalPrompt(),
      env: capabilities.env ?? env,
    },
    {
      mode: settings.runHook,
      strict: settings.strictHooks,
      abortOnFailure: settings.abortOnHookFailure,
    },
  );

  return { settings, fileSystem, locator, store, configManager, hookRunner, cwd };
}

function parseHookMode(value: string, fromFlag: boolean): HookMode {
  const result = HookModeSchema.safeParse(value.trim().toLowerCase());
  if (!result.success) {
    throw new InvalidSettingError(
      fromFlag ? '--run-hook' : ENV_VARS.runHook,
      `'${value}' is not one of ${HOOK_MODES.join(', ')}`,
    );
  }
  return result.data;
}
