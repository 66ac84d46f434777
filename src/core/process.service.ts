import execa from 'execa';
import { describeError } from '../errors/base.error';
import { HookExecutionError } from '../errors/hook.error';
import { logger } from '../utils/logger.service';

export interface SpawnRequest {
  /** Script to run */
  scriptPath: string;
  /** Run the script directly instead of through `sh` */
  executable: boolean;
  cwd: string;
}

/**
 * Runs hook scripts to completion
 */
export interface ProcessSpawner {
  /**
   * @returns exit status of the script
   * @throws HookExecutionError when the process cannot be started
   */
  run(request: SpawnRequest): Promise<number>;
}

/**
 * Process spawner backed by execa, inheriting the terminal
 */
export class ExecaSpawner implements ProcessSpawner {
  private readonly shell: string;

  constructor(shell = 'sh') {
    this.shell = shell;
  }

  public async run(request: SpawnRequest): Promise<number> {
    const [file, args] = request.executable
      ? [request.scriptPath, []]
      : [this.shell, [request.scriptPath]];

    logger.debug(`Running ${file} ${args.join(' ')} in ${request.cwd}`);

    let result: execa.ExecaReturnValue;
    try {
      result = await execa(file, args, {
        cwd: request.cwd,
        stdio: 'inherit',
        reject: false,
      });
    } catch (error) {
      throw new HookExecutionError(request.scriptPath, describeError(error));
    }

    // With reject disabled a spawn failure comes back as a result without an exit code.
    if (result.failed && typeof result.exitCode !== 'number') {
      throw new HookExecutionError(request.scriptPath, `could not start ${result.command}`);
    }
    if (result.signal) {
      throw new HookExecutionError(request.scriptPath, `terminated by ${result.signal}`);
    }
    return result.exitCode;
  }
}
