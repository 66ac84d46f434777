import chalk from 'chalk';
import { AppContext } from '../core/app.context';
import { CommandResult } from '../types/config.types';
import { HookEntry } from '../types/hook.types';
import { EntryNotFoundError } from '../errors/document.error';
import { EnhancedErrorHandler } from '../errors/enhanced.error-handler';
import { logger } from '../utils/logger.service';

/**
 * List configured hooks, marking scripts missing from the hooks directory
 */
export class HookCommand {
  private readonly context: AppContext;

  constructor(context: AppContext) {
    this.context = context;
  }

  public async list(command?: string): Promise<CommandResult<HookEntry[]>> {
    try {
      const { configManager } = this.context;
      let entries = await configManager.listHooks();
      if (command !== undefined) {
        entries = entries.filter(entry => entry.command === command);
        if (entries.length === 0) {
          throw new EntryNotFoundError('hooks', command);
        }
      }

      if (entries.length === 0) {
        logger.info('No hooks configured');
      }
      for (const entry of entries) {
        logger.info(chalk.bold(entry.command));
        for (const line of await this.describeActions(entry)) {
          logger.info(line);
        }
      }

      return { success: true, exitCode: 0, data: entries };
    } catch (error) {
      return EnhancedErrorHandler.toResult(error, 'Failed to list hooks');
    }
  }

  private async describeActions(entry: HookEntry): Promise<string[]> {
    const { fileSystem, locator } = this.context;
    const lines: string[] = [];
    for (const action of entry.actions) {
      const present = await fileSystem.isFile(locator.hookScriptPath(action.script));
      const workdir = action.workdir ? chalk.gray(` (in ${action.workdir})`) : '';
      const missing = present ? '' : chalk.yellow(' [missing]');
      lines.push(`  ${action.phase.padEnd(4)} ${action.script}${workdir}${missing}`);
    }
    return lines;
  }
}
