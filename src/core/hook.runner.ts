import * as path from 'path';
import { ConfigManager } from './config.manager';
import { FileSystem } from './filesystem.service';
import { Pager } from './pager.service';
import { ProcessSpawner } from './process.service';
import { ConfirmPrompt } from './prompt.service';
import { DEFAULT_SETTINGS, HookMode } from '../types/config.types';
import {
  GuardedResult,
  HookActionResult,
  HookPhase,
  HookRunReport,
  ResolvedHookAction,
} from '../types/hook.types';
import { BaseError, describeError } from '../errors/base.error';
import {
  HookAbortError,
  HookExecutionError,
  ScriptNotFoundError,
  UserDeclinedError,
} from '../errors/hook.error';
import { expandPath } from '../utils/path.expander';
import { logger } from '../utils/logger.service';

/**
 * Collaborators the runner drives
 */
export interface HookCapabilities {
  fileSystem: FileSystem;
  spawner: ProcessSpawner;
  pager: Pager;
  prompt: ConfirmPrompt;
  /** Environment used to expand `workdir`; defaults to the process environment */
  env?: NodeJS.ProcessEnv;
}

export interface HookRunnerOptions {
  mode: HookMode;
  /** Throw `ScriptNotFoundError` instead of reporting a missing script */
  strict: boolean;
  /** Throw `HookAbortError` when a pre hook fails, before the command runs */
  abortOnFailure: boolean;
}

export interface PhaseOptions {
  /** Working directory for actions without their own `workdir` */
  cwd: string;
}

export interface GuardOptions extends PhaseOptions {
  skipPost?: boolean;
}

/**
 * Runs the hook scripts configured for a command, before and after it.
 *
 * Actions run one at a time in declared order. A missing script, a declined
 * confirmation, a non-zero exit or a spawn failure is recorded in the report
 * and the sequence goes on.
 */
export class HookRunner {
  private readonly configManager: ConfigManager;
  private readonly capabilities: HookCapabilities;
  private readonly options: HookRunnerOptions;

  constructor(
    configManager: ConfigManager,
    capabilities: HookCapabilities,
    options: Partial<HookRunnerOptions> = {},
  ) {
    this.configManager = configManager;
    this.capabilities = capabilities;
    this.options = {
      mode: options.mode ?? DEFAULT_SETTINGS.runHook,
      strict: options.strict ?? DEFAULT_SETTINGS.strictHooks,
      abortOnFailure: options.abortOnFailure ?? DEFAULT_SETTINGS.abortOnHookFailure,
    };
  }

  public getOptions(): Readonly<HookRunnerOptions> {
    return this.options;
  }

  /**
   * Run every action of one phase of `command`
   *
   * @throws ScriptNotFoundError in strict mode
   */
  public async runPhase(
    command: string,
    phase: HookPhase,
    options: PhaseOptions,
  ): Promise<HookActionResult[]> {
    const actions = (await this.configManager.hooksFor(command)).filter(
      action => action.phase === phase,
    );
    if (actions.length > 0) {
      logger.debug(`Running ${actions.length} ${phase} hook(s) for '${command}'`);
    }

    const results: HookActionResult[] = [];
    for (const action of actions) {
      results.push(await this.runAction(command, action, options.cwd));
    }
    return results;
  }

  /**
   * Run `task` between the pre and post hooks of `command`.
   *
   * Post hooks also run when the task fails; its error is rethrown afterwards.
   *
   * @throws HookAbortError when `abortOnFailure` is set and a pre hook failed
   */
  public async guard<T>(
    command: string,
    task: () => Promise<T>,
    options: GuardOptions,
  ): Promise<GuardedResult<T>> {
    const pre = await this.runPhase(command, 'pre', options);

    const failed = pre.find(isFailure);
    if (failed && this.options.abortOnFailure) {
      throw new HookAbortError(command, 'pre', describeResult(failed));
    }

    let value: T;
    try {
      value = await task();
    } catch (error) {
      if (!options.skipPost) {
        await this.runPostAfterFailure(command, options);
      }
      throw error;
    }

    const post = options.skipPost ? [] : await this.runPhase(command, 'post', options);
    const report: HookRunReport = { command, pre, post };
    return { value, report };
  }

  private async runPostAfterFailure(command: string, options: PhaseOptions): Promise<void> {
    try {
      await this.runPhase(command, 'post', options);
    } catch (error) {
      // The command's own error is the one reported to the caller.
      logger.warn(`Post hooks of '${command}' failed: ${describeError(error)}`);
    }
  }

  private async runAction(
    command: string,
    action: ResolvedHookAction,
    defaultCwd: string,
  ): Promise<HookActionResult> {
    const { fileSystem, spawner } = this.capabilities;

    if (this.options.mode === 'never') {
      logger.debug(`Hook '${action.script}' skipped, hooks are disabled`);
      return { status: 'skipped', action, reason: 'disabled' };
    }

    if (!(await fileSystem.isFile(action.scriptPath))) {
      const error = new ScriptNotFoundError(action.scriptPath);
      if (this.options.strict) {
        throw error;
      }
      logger.warn(error.message);
      return { status: 'not-found', action, error };
    }

    if (this.options.mode === 'prompt') {
      let content: string;
      try {
        content = await fileSystem.readFile(action.scriptPath);
      } catch (error) {
        return { status: 'error', action, error: toExecutionError(action, error) };
      }

      await this.capabilities.pager.show(`Hook script: ${action.scriptPath}`, content);
      const confirmed = await this.capabilities.prompt.confirm(
        `Run ${action.phase} hook '${action.script}' for '${command}'?`,
      );
      if (!confirmed) {
        const error = new UserDeclinedError(action.scriptPath);
        logger.info(error.message);
        return { status: 'skipped', action, reason: 'declined', error };
      }
    }

    const cwd = this.workingDirectory(action, defaultCwd);
    try {
      const executable = await fileSystem.isExecutable(action.scriptPath);
      const exitCode = await spawner.run({ scriptPath: action.scriptPath, executable, cwd });
      if (exitCode !== 0) {
        logger.warn(`Hook '${action.script}' exited with status ${exitCode}`);
      }
      return { status: 'executed', action, exitCode, cwd };
    } catch (error) {
      const executionError = toExecutionError(action, error);
      logger.error(executionError.toString());
      return { status: 'error', action, error: executionError };
    }
  }

  private workingDirectory(action: ResolvedHookAction, defaultCwd: string): string {
    if (!action.workdir) {
      return defaultCwd;
    }
    const expanded = expandPath(action.workdir, { env: this.capabilities.env ?? process.env });
    return path.resolve(defaultCwd, expanded);
  }
}

/**
 * Executed with a non-zero status, or could not be executed
 */
export function isFailure(result: HookActionResult): boolean {
  return (result.status === 'executed' && result.exitCode !== 0) || result.status === 'error';
}

function describeResult(result: HookActionResult): string {
  switch (result.status) {
    case 'executed':
      return `'${result.action.script}' exited with status ${result.exitCode}`;
    case 'error':
      return result.error.toString();
    default:
      return `'${result.action.script}' ${result.status}`;
  }
}

function toExecutionError(action: ResolvedHookAction, error: unknown): HookExecutionError {
  if (error instanceof HookExecutionError) {
    return error;
  }
  return new HookExecutionError(
    action.scriptPath,
    error instanceof BaseError ? error.toString() : describeError(error),
  );
}
