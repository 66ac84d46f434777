import { AppContext } from '../core/app.context';
import { CommandResult } from '../types/config.types';
import { EnhancedErrorHandler } from '../errors/enhanced.error-handler';
import { logger } from '../utils/logger.service';

/**
 * Replace the ignore patterns of a repository
 */
export class IgnoreCommand {
  private readonly context: AppContext;

  constructor(context: AppContext) {
    this.context = context;
  }

  public async execute(name: string, patterns: string[]): Promise<CommandResult<string>> {
    try {
      const { configManager } = this.context;
      if (!(await configManager.getRepository(name))) {
        logger.warn(`Repository '${name}' is not configured; writing its ignore file anyway`);
      }

      const filePath = await configManager.writeIgnoreFile(name, patterns);
      return {
        success: true,
        message: `Wrote ${patterns.length} pattern(s) to ${filePath}`,
        exitCode: 0,
        data: filePath,
      };
    } catch (error) {
      return EnhancedErrorHandler.toResult(error, `Failed to write ignore file for '${name}'`);
    }
  }
}
