#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { InitCommand } from './commands/init.command';
import { RepoCommand } from './commands/repo.command';
import { IgnoreCommand } from './commands/ignore.command';
import { HookCommand } from './commands/hook.command';
import { AppContext, ContextOverrides, GlobalFlags, createAppContext, resolveSettings } from './core/app.context';
import { isFailure } from './core/hook.runner';
import { EnhancedErrorHandler } from './errors/enhanced.error-handler';
import { logger, LogLevel } from './utils/logger.service';
import { APP_NAME, CommandResult, FALLBACK_VERSION } from './types/config.types';
import { HookRunReport } from './types/hook.types';

interface ProgramFlags extends GlobalFlags {
  verbose?: boolean;
  quiet?: boolean;
}

export interface ProgramOptions extends ContextOverrides {
  /** Called with the exit code of a failed command */
  exit?: (code: number) => void;
}

/**
 * Build the command line program. Every command runs between its pre and
 * post hooks.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();
  const exit = options.exit ?? ((code: number) => process.exit(code));

  program
    .name(APP_NAME)
    .description('Dotfile manager: tracked repositories and command hooks')
    .version(readVersion(), '-v, --version', 'Output the current version')
    .option('--config-dir <dir>', 'Use <dir> as configuration and data root')
    .option('--run-hook <mode>', 'Hook run mode: always, never or prompt')
    .option('--strict-hooks', 'Fail when a configured hook script is missing')
    .option('--abort-on-hook-failure', 'Do not run a command when one of its pre hooks fails')
    .option('--verbose', 'Show verbose output')
    .option('--quiet', 'Only show errors')
    .on('option:verbose', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.debug('Verbose mode enabled');
    })
    .on('option:quiet', () => {
      logger.setLevel(LogLevel.ERROR);
    });

  const run = async <T>(
    name: string,
    execute: (context: AppContext) => Promise<CommandResult<T>>,
  ): Promise<void> => {
    try {
      const flags: ProgramFlags = program.opts();
      const context = createAppContext(resolveSettings(flags, options.env), options);
      const { value: result, report } = await context.hookRunner.guard(
        name,
        () => execute(context),
        { cwd: context.cwd },
      );
      summarizeHooks(report);

      if (result.success) {
        if (result.message) {
          logger.success(result.message);
        }
      } else {
        logger.error(result.message || `Command '${name}' failed`);
        exit(result.exitCode);
      }
    } catch (error) {
      const context = EnhancedErrorHandler.createContext(name, program.args, process.cwd());
      exit(EnhancedErrorHandler.handleError(error, context));
    }
  };

  program
    .command('init')
    .description('Create the configuration directory and a starter config.toml')
    .action(async () => {
      const flags: ProgramFlags = program.opts();
      const verbose = flags.verbose === true;
      await run('init', context => new InitCommand(context).execute({ verbose }));
    });

  program
    .command('add <name>')
    .description('Track a repository')
    .option('-t, --target <path>', 'Work tree of the repository')
    .option('-b, --branch <branch>', 'Default branch')
    .option('-r, --remote <remote>', 'Default remote')
    .action(async (name: string, flags: { target?: string; branch?: string; remote?: string }) => {
      await run('add', context => new RepoCommand(context).add(name, flags));
    });

  program
    .command('remove <name>')
    .description('Stop tracking a repository')
    .action(async (name: string) => {
      await run('remove', context => new RepoCommand(context).remove(name));
    });

  program
    .command('rename <from> <to>')
    .description('Rename a tracked repository')
    .action(async (from: string, to: string) => {
      await run('rename', context => new RepoCommand(context).rename(from, to));
    });

  program
    .command('show <name>')
    .description('Show the settings of a tracked repository')
    .action(async (name: string) => {
      await run('show', context => new RepoCommand(context).show(name));
    });

  program
    .command('list')
    .description('List tracked repositories')
    .action(async () => {
      await run('list', context => new RepoCommand(context).list());
    });

  program
    .command('ignore <name> <patterns...>')
    .description('Replace the ignore patterns of a repository')
    .action(async (name: string, patterns: string[]) => {
      await run('ignore', context => new IgnoreCommand(context).execute(name, patterns));
    });

  program
    .command('hooks [command]')
    .description('List configured command hooks')
    .action(async (command: string | undefined) => {
      await run('hooks', context => new HookCommand(context).list(command));
    });

  return program;
}

function summarizeHooks(report: HookRunReport): void {
  const results = [...report.pre, ...report.post];
  if (results.length === 0) {
    return;
  }
  const failed = results.filter(isFailure).length;
  const executed = results.filter(result => result.status === 'executed').length;
  logger.debug(
    `Hooks for '${report.command}': ${executed} executed, ${failed} failed, ${results.length - executed} not run`,
  );
}

function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    logger.debug('Could not read package.json for version, using fallback');
  }
  return FALLBACK_VERSION;
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

if (require.main === module) {
  main().catch(error => {
    const context = EnhancedErrorHandler.createContext(undefined, process.argv.slice(2), process.cwd());
    process.exit(EnhancedErrorHandler.handleError(error, context));
  });
}
