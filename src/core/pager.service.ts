import execa from 'execa';
import chalk from 'chalk';
import { describeError } from '../errors/base.error';
import { ENV_VARS } from '../types/config.types';
import { logger } from '../utils/logger.service';

const DEFAULT_PAGER = 'less';

/**
 * Shows a hook script to the user before asking for confirmation
 */
export interface Pager {
  show(title: string, content: string): Promise<void>;
}

export interface TerminalPagerOptions {
  /** Pager command line; defaults to `$PAGER`, then `less` */
  command?: string | undefined;
  /** Whether stdout is a terminal; a plain listing is printed when it is not */
  interactive?: boolean;
  write?: (line: string) => void;
}

/**
 * Pager that hands the content to the user's pager program
 */
export class TerminalPager implements Pager {
  private readonly command: string;
  private readonly interactive: boolean;
  private readonly write: (line: string) => void;

  constructor(options: TerminalPagerOptions = {}) {
    this.command = options.command || process.env[ENV_VARS.pager] || DEFAULT_PAGER;
    this.interactive = options.interactive ?? Boolean(process.stdout.isTTY);
    this.write = options.write ?? (line => process.stdout.write(`${line}\n`));
  }

  public async show(title: string, content: string): Promise<void> {
    if (!this.interactive) {
      this.print(title, content);
      return;
    }

    try {
      const child = execa.command(this.command, {
        input: content,
        stdout: 'inherit',
        stderr: 'inherit',
        reject: false,
      });
      // Input to a pager that quit early, or never started, goes nowhere.
      child.stdin?.on('error', error => logger.debug(`Pager input not written: ${describeError(error)}`));
      const result = await child;
      // A pager that never started has shown nothing: print instead.
      if (result.failed && typeof result.exitCode !== 'number') {
        logger.warn(`Pager '${this.command}' could not be started`);
        this.print(title, content);
        return;
      }
      if (result.exitCode !== 0) {
        logger.debug(`Pager '${this.command}' exited with ${result.exitCode}`);
      }
    } catch (error) {
      logger.warn(`Pager '${this.command}' failed: ${describeError(error)}`);
      this.print(title, content);
    }
  }

  /**
   * Line numbered listing
   */
  private print(title: string, content: string): void {
    const lines = content.endsWith('\n') ? content.slice(0, -1).split('\n') : content.split('\n');
    const width = String(lines.length).length;

    this.write(chalk.bold(title));
    lines.forEach((line, index) => {
      this.write(`${chalk.gray(String(index + 1).padStart(width))} ${line}`);
    });
  }
}
