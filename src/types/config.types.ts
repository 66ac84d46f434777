/**
 * Application name, used for XDG directory names
 */
export const APP_NAME = 'tendril';

export const FALLBACK_VERSION = '0.4.0';

/**
 * Environment variables consulted while resolving the directory layout
 */
export const ENV_VARS = {
  configDirOverride: 'TENDRIL_CONFIG_DIR',
  runHook: 'TENDRIL_RUN_HOOK',
  xdgConfigHome: 'XDG_CONFIG_HOME',
  xdgDataHome: 'XDG_DATA_HOME',
  home: 'HOME',
  pager: 'PAGER',
} as const;

/**
 * File and directory names below the configuration and data roots
 */
export const DEFAULT_PATHS = {
  configFile: 'config.toml',
  hooksDir: 'hooks',
  ignoresDir: 'ignores',
  reposDir: 'repos',
  ignoreExtension: '.ignore',
  repoExtension: '.git',
  xdgConfigFallback: '.config',
  xdgDataFallback: '.local/share',
} as const;

/**
 * Operating systems a repository can be bootstrapped on
 */
export type OsType = 'any' | 'unix' | 'macos' | 'windows';

/**
 * Conditions and source for bootstrapping a repository
 */
export interface BootstrapSettings {
  /** URL to clone the repository from */
  clone?: string | undefined;
  os?: OsType | undefined;
  /** Only bootstrap for these user accounts */
  users?: string[] | undefined;
  /** Only bootstrap on these host names */
  hosts?: string[] | undefined;
}

/**
 * One tracked repository
 */
export interface RepoEntry {
  name: string;
  /** Work tree override; absent means a self-contained repository */
  target?: string | undefined;
  branch?: string | undefined;
  remote?: string | undefined;
  /** Legacy flag: work tree is the user's home directory */
  workdirHome?: boolean | undefined;
  bootstrap?: BootstrapSettings | undefined;
}

/**
 * Resolved absolute directory layout
 */
export interface DirLayout {
  configDir: string;
  dataDir: string;
  configFile: string;
  hooksDir: string;
  ignoresDir: string;
  reposDir: string;
}

/**
 * Settings a caller can pass when building the subsystem
 */
export interface TendrilSettings {
  /** Explicit configuration root, beats every environment variable */
  configDir?: string | undefined;
  runHook: HookMode;
  strictHooks: boolean;
  abortOnHookFailure: boolean;
}

/**
 * How hook scripts are gated
 */
export type HookMode = 'always' | 'never' | 'prompt';

export const HOOK_MODES: readonly HookMode[] = ['always', 'never', 'prompt'];

export const DEFAULT_SETTINGS: TendrilSettings = {
  runHook: 'prompt',
  strictHooks: false,
  abortOnHookFailure: false,
};

/**
 * Skeleton written by `init` when no configuration document exists yet
 */
export const CONFIG_SKELETON = [
  '# tendril configuration',
  '#',
  '# Tracked repositories:',
  '#',
  '#   [repos.vim]',
  '#   target = "~"',
  '#',
  '# Command hooks run scripts from the hooks/ directory:',
  '#',
  '#   [hooks]',
  '#   bootstrap = [',
  '#     { pre = "check_deps.sh" },',
  '#     { post = "vim_plug.sh", workdir = "~/.vim" },',
  '#   ]',
  '',
].join('\n');

/**
 * Common options shared by every command
 */
export interface CommandOptions {
  verbose?: boolean;
}

/**
 * Outcome of a command
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message?: string;
  exitCode: number;
  data?: T;
  error?: Error;
}
