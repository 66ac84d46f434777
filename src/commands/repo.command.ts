import chalk from 'chalk';
import { AppContext } from '../core/app.context';
import { CommandResult, RepoEntry } from '../types/config.types';
import { EntryNotFoundError } from '../errors/document.error';
import { EnhancedErrorHandler } from '../errors/enhanced.error-handler';
import { logger } from '../utils/logger.service';

export interface AddRepoOptions {
  target?: string | undefined;
  branch?: string | undefined;
  remote?: string | undefined;
}

/**
 * Repository registry commands: add, remove, rename, show and list
 */
export class RepoCommand {
  private readonly context: AppContext;

  constructor(context: AppContext) {
    this.context = context;
  }

  public async add(name: string, options: AddRepoOptions = {}): Promise<CommandResult<RepoEntry>> {
    try {
      const entry: RepoEntry = { name };
      if (options.target !== undefined) {
        entry.target = options.target;
      }
      if (options.branch !== undefined) {
        entry.branch = options.branch;
      }
      if (options.remote !== undefined) {
        entry.remote = options.remote;
      }

      const added = await this.context.configManager.addRepositoryEntry(entry);
      return {
        success: true,
        message: `Added repository '${name}'`,
        exitCode: 0,
        data: added,
      };
    } catch (error) {
      return EnhancedErrorHandler.toResult(error, `Failed to add repository '${name}'`);
    }
  }

  public async remove(name: string): Promise<CommandResult> {
    try {
      await this.context.configManager.removeRepository(name);
      return { success: true, message: `Removed repository '${name}'`, exitCode: 0 };
    } catch (error) {
      return EnhancedErrorHandler.toResult(error, `Failed to remove repository '${name}'`);
    }
  }

  public async rename(from: string, to: string): Promise<CommandResult> {
    try {
      await this.context.configManager.renameRepository(from, to);
      return { success: true, message: `Renamed repository '${from}' to '${to}'`, exitCode: 0 };
    } catch (error) {
      return EnhancedErrorHandler.toResult(error, `Failed to rename repository '${from}'`);
    }
  }

  public async show(name: string): Promise<CommandResult<RepoEntry>> {
    try {
      const entry = await this.context.configManager.getRepository(name);
      if (!entry) {
        throw new EntryNotFoundError('repos', name);
      }

      for (const line of describeRepo(entry, this.context.locator.repoStorePath(name))) {
        logger.info(line);
      }
      return { success: true, exitCode: 0, data: entry };
    } catch (error) {
      return EnhancedErrorHandler.toResult(error, `Failed to show repository '${name}'`);
    }
  }

  public async list(): Promise<CommandResult<RepoEntry[]>> {
    try {
      const repos = await this.context.configManager.listRepositories();
      if (repos.length === 0) {
        logger.info('No repositories configured');
      }
      for (const repo of repos) {
        logger.info(
          repo.target === undefined
            ? chalk.cyan(repo.name)
            : `${chalk.cyan(repo.name)} ${chalk.gray('->')} ${repo.target}`,
        );
      }
      return { success: true, exitCode: 0, data: repos };
    } catch (error) {
      return EnhancedErrorHandler.toResult(error, 'Failed to list repositories');
    }
  }
}

function describeRepo(entry: RepoEntry, storePath: string): string[] {
  const lines = [chalk.bold(entry.name), `  store:   ${storePath}`];
  if (entry.target !== undefined) {
    lines.push(`  target:  ${entry.target}`);
  } else if (entry.workdirHome) {
    lines.push('  target:  ~');
  }
  if (entry.branch !== undefined) {
    lines.push(`  branch:  ${entry.branch}`);
  }
  if (entry.remote !== undefined) {
    lines.push(`  remote:  ${entry.remote}`);
  }

  const bootstrap = entry.bootstrap;
  if (bootstrap) {
    if (bootstrap.clone !== undefined) {
      lines.push(`  clone:   ${bootstrap.clone}`);
    }
    if (bootstrap.os !== undefined) {
      lines.push(`  os:      ${bootstrap.os}`);
    }
    if (bootstrap.users !== undefined) {
      lines.push(`  users:   ${bootstrap.users.join(', ')}`);
    }
    if (bootstrap.hosts !== undefined) {
      lines.push(`  hosts:   ${bootstrap.hosts.join(', ')}`);
    }
  }
  return lines;
}
