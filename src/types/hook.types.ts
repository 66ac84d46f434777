import type {
  HookExecutionError,
  ScriptNotFoundError,
  UserDeclinedError,
} from '../errors/hook.error';

/**
 * Before or after the guarded command
 */
export type HookPhase = 'pre' | 'post';

export const HOOK_PHASES: readonly HookPhase[] = ['pre', 'post'];

/**
 * One configured hook script
 */
export interface HookAction {
  phase: HookPhase;
  /** Bare file name inside the hooks directory */
  script: string;
  /** Working directory, tilde and environment expanded before use */
  workdir?: string | undefined;
}

/**
 * Hook configuration of one command, in declared order
 */
export interface HookEntry {
  command: string;
  actions: HookAction[];
}

/**
 * Hook action with its script path resolved against the hooks directory
 */
export interface ResolvedHookAction extends HookAction {
  scriptPath: string;
}

export type HookActionResult =
  | { status: 'executed'; action: ResolvedHookAction; exitCode: number; cwd: string }
  | {
      status: 'skipped';
      action: ResolvedHookAction;
      reason: 'declined' | 'disabled';
      error?: UserDeclinedError;
    }
  | { status: 'not-found'; action: ResolvedHookAction; error: ScriptNotFoundError }
  | { status: 'error'; action: ResolvedHookAction; error: HookExecutionError };

/**
 * Aggregate outcome of the hooks around one command
 */
export interface HookRunReport {
  command: string;
  pre: HookActionResult[];
  post: HookActionResult[];
}

/**
 * Outcome of a guarded command together with its hook report
 */
export interface GuardedResult<T> {
  value: T;
  report: HookRunReport;
}
