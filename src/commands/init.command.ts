import chalk from 'chalk';
import { AppContext } from '../core/app.context';
import { CommandOptions, CommandResult } from '../types/config.types';
import { EnhancedErrorHandler } from '../errors/enhanced.error-handler';
import { logger } from '../utils/logger.service';

export interface InitResult {
  configPath: string;
  created: boolean;
}

/**
 * Create the directory layout and a starter config.toml
 */
export class InitCommand {
  private readonly context: AppContext;

  constructor(context: AppContext) {
    this.context = context;
  }

  public async execute(options: CommandOptions = {}): Promise<CommandResult<InitResult>> {
    try {
      const { configManager, locator } = this.context;
      const created = await configManager.bootstrap();
      const configPath = configManager.getConfigPath();

      if (options.verbose) {
        logger.info(chalk.gray(`  config:  ${locator.resolveConfigDir()}`));
        logger.info(chalk.gray(`  hooks:   ${locator.hooksDirPath()}`));
        logger.info(chalk.gray(`  data:    ${locator.dataDirPath()}`));
      }

      return {
        success: true,
        message: created
          ? `Created configuration at ${configPath}`
          : `Configuration already exists at ${configPath}`,
        exitCode: 0,
        data: { configPath, created },
      };
    } catch (error) {
      return EnhancedErrorHandler.toResult(error, 'Failed to initialize configuration');
    }
  }
}
