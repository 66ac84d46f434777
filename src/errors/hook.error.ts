import { BaseError } from './base.error';
import type { HookPhase } from '../types/hook.types';

/**
 * Hook script missing from the hooks directory
 */
export class ScriptNotFoundError extends BaseError {
  public readonly code = 'SCRIPT_NOT_FOUND';
  public readonly recoverable = true;
  public readonly scriptPath: string;

  constructor(scriptPath: string) {
    super(`Hook script '${scriptPath}' does not exist`);
    this.scriptPath = scriptPath;
  }
}

/**
 * Hook script could not be spawned or read
 */
export class HookExecutionError extends BaseError {
  public readonly code = 'HOOK_EXECUTION_ERROR';
  public readonly recoverable = true;
  public readonly scriptPath: string;

  constructor(scriptPath: string, details?: string) {
    super(`Failed to run hook script '${scriptPath}'`, details);
    this.scriptPath = scriptPath;
  }
}

/**
 * User refused to run a hook script
 */
export class UserDeclinedError extends BaseError {
  public readonly code = 'USER_DECLINED';
  public readonly recoverable = true;
  public readonly scriptPath: string;

  constructor(scriptPath: string) {
    super(`Hook script '${scriptPath}' was declined`);
    this.scriptPath = scriptPath;
  }
}

/**
 * A failed pre hook stopped the guarded command
 */
export class HookAbortError extends BaseError {
  public readonly code = 'HOOK_ABORT';
  public readonly recoverable = false;
  public readonly command: string;
  public readonly phase: HookPhase;

  constructor(command: string, phase: HookPhase, details?: string) {
    super(`Command '${command}' aborted by failing ${phase} hook`, details);
    this.command = command;
    this.phase = phase;
  }
}
