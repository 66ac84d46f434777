import { ZodError } from 'zod';
import { TomlDocument } from './toml/toml.document';
import { TomlWritable, formatInlineTable, formatKey, formatValue } from './toml/toml.scanner';
import { BootstrapSettings, RepoEntry } from '../types/config.types';
import { HookAction, HookEntry, HookPhase } from '../types/hook.types';
import {
  HooksSectionSchema,
  HookTable,
  RepoNameSchema,
  RepoToml,
  ReposSectionSchema,
  ScriptNameSchema,
} from '../types/config.schema';
import {
  DocumentValidationError,
  DuplicateRepoError,
  EntryNotFoundError,
} from '../errors/document.error';

const REPOS = 'repos';
const HOOKS = 'hooks';
const HOOK_INDENT = '  ';

/**
 * The configuration document: typed `repos` and `hooks` views over a
 * format preserving TOML tree. Anything else in the file is left alone.
 */
export class ConfigDocument {
  private readonly toml: TomlDocument;

  private constructor(toml: TomlDocument) {
    this.toml = toml;
  }

  /**
   * @throws DocumentParseError on malformed TOML
   */
  public static parse(text: string, sourcePath?: string): ConfigDocument {
    return new ConfigDocument(TomlDocument.parse(text, sourcePath));
  }

  public static empty(): ConfigDocument {
    return new ConfigDocument(TomlDocument.empty());
  }

  public toString(): string {
    return this.toml.toString();
  }

  // Repositories

  public getRepo(name: string): RepoEntry | undefined {
    const repos = this.reposSection();
    return hasOwn(repos, name) ? toRepoEntry(name, repos[name]) : undefined;
  }

  public hasRepo(name: string): boolean {
    return hasOwn(this.reposSection(), name);
  }

  public listRepos(): RepoEntry[] {
    return Object.entries(this.reposSection()).map(([name, repo]) => toRepoEntry(name, repo));
  }

  /**
   * @throws DuplicateRepoError when the name is taken
   */
  public addRepo(entry: RepoEntry): void {
    validate(RepoNameSchema, entry.name, 'Invalid repository name');
    if (this.hasRepo(entry.name)) {
      throw new DuplicateRepoError(entry.name);
    }
    this.assertEditable(REPOS);

    const fields = toRepoToml(entry);
    if (this.prefersInlineRepos()) {
      this.toml.insertSectionPair(REPOS, entry.name, formatInlineTable(fields));
      return;
    }

    const { bootstrap, ...scalars } = fields;
    const header = `[${formatKey(REPOS)}.${formatKey(entry.name)}]`;
    const lines = [header, ...pairLines(scalars)];
    if (bootstrap) {
      lines.push('', `[${formatKey(REPOS)}.${formatKey(entry.name)}.bootstrap]`, ...pairLines(bootstrap));
    }
    this.toml.insertSectionTables(REPOS, lines);
  }

  /**
   * @throws EntryNotFoundError when the repository is not configured
   */
  public removeRepo(name: string): void {
    if (!this.hasRepo(name)) {
      throw new EntryNotFoundError(REPOS, name);
    }
    this.assertEditable(REPOS);
    this.toml.removeEntry(REPOS, name);
  }

  /**
   * @throws EntryNotFoundError when `from` is not configured
   * @throws DuplicateRepoError when `to` is taken
   */
  public renameRepo(from: string, to: string): void {
    if (!this.hasRepo(from)) {
      throw new EntryNotFoundError(REPOS, from);
    }
    validate(RepoNameSchema, to, 'Invalid repository name');
    if (this.hasRepo(to)) {
      throw new DuplicateRepoError(to);
    }
    this.assertEditable(REPOS);
    this.toml.renameEntry(REPOS, from, to);
  }

  // Command hooks

  /**
   * Hook configuration of `command`, undefined when it has none
   */
  public getHook(command: string): HookEntry | undefined {
    const hooks = this.hooksSection();
    return hasOwn(hooks, command) ? toHookEntry(command, hooks[command]) : undefined;
  }

  public listHooks(): HookEntry[] {
    return Object.entries(this.hooksSection()).map(([command, tables]) =>
      toHookEntry(command, tables),
    );
  }

  /**
   * Insert or replace the hook array of a command
   */
  public setHook(entry: HookEntry): void {
    if (entry.command.trim().length === 0) {
      throw new DocumentValidationError('Command name cannot be empty');
    }
    for (const action of entry.actions) {
      validate(ScriptNameSchema, action.script, `Invalid hook script for '${entry.command}'`);
    }

    this.assertEditable(HOOKS);

    const valueText = this.formatHookArray(entry.actions);
    this.toml.transaction(() => {
      const locations = this.toml.locateEntry(HOOKS, entry.command);
      const [only] = locations;
      if (locations.length === 1 && only.kind === 'pair') {
        const node = this.toml.nodes[only.index];
        if (node.kind === 'pair' && node.key.length - 1 === only.segmentIndex) {
          this.toml.replacePairValue(only.index, valueText);
          return;
        }
      }
      if (locations.length > 0) {
        this.toml.removeEntry(HOOKS, entry.command);
      }
      this.toml.insertSectionPair(HOOKS, entry.command, valueText);
    });
  }

  /**
   * @throws EntryNotFoundError when the command has no hooks
   */
  public removeHook(command: string): void {
    if (!hasOwn(this.hooksSection(), command)) {
      throw new EntryNotFoundError(HOOKS, command);
    }
    this.assertEditable(HOOKS);
    this.toml.removeEntry(HOOKS, command);
  }

  /**
   * Entries of a section written as one root inline table (`repos = { ... }`)
   * cannot be edited line by line
   */
  private assertEditable(section: string): void {
    if (this.toml.isInlineTable(section)) {
      throw new DocumentValidationError(
        `The '${section}' section is a single inline table`,
        `rewrite it as a [${section}] table to edit it with tendril`,
      );
    }
  }

  private reposSection(): Record<string, RepoToml> {
    return decodeSection(this.toml.decoded()[REPOS], input => ReposSectionSchema.parse(input), REPOS);
  }

  private hooksSection(): Record<string, HookTable[]> {
    return decodeSection(this.toml.decoded()[HOOKS], input => HooksSectionSchema.parse(input), HOOKS);
  }

  /**
   * Follow the user's style: `name = { ... }` pairs when the repos section is
   * written that way, `[repos.name]` tables otherwise
   */
  private prefersInlineRepos(): boolean {
    const blocks = this.toml.blocks();
    if (blocks.some(block => block.path[0] === REPOS && block.path.length >= 2)) {
      return false;
    }

    const reposTable = blocks.find(block => block.path.length === 1 && block.path[0] === REPOS);
    if (reposTable) {
      return reposTable.pairs.length > 0;
    }

    return blocks[0].pairs.some(index => {
      const node = this.toml.nodes[index];
      return node.kind === 'pair' && node.key[0] === REPOS;
    });
  }

  private formatHookArray(actions: HookAction[]): string {
    if (actions.length === 0) {
      return '[]';
    }
    const eol = this.toml.eol();
    const items = actions.map(action => {
      const table: Record<string, TomlWritable | undefined> = {
        [action.phase]: action.script,
        workdir: action.workdir,
      };
      return `${HOOK_INDENT}${formatInlineTable(table)},${eol}`;
    });
    return `[${eol}${items.join('')}]`;
  }
}

function hasOwn(record: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

function decodeSection<T>(value: unknown, parse: (input: unknown) => T, section: string): T {
  try {
    return parse(value ?? {});
  } catch (error) {
    if (error instanceof ZodError) {
      throw new DocumentValidationError(
        `Invalid '${section}' section in configuration`,
        formatIssues(section, error),
      );
    }
    throw error;
  }
}

function validate(schema: { parse: (input: unknown) => unknown }, value: unknown, message: string): void {
  try {
    schema.parse(value);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new DocumentValidationError(message, error.issues.map(issue => issue.message).join(', '));
    }
    throw error;
  }
}

function formatIssues(section: string, error: ZodError): string {
  return error.issues
    .map(issue => `${[section, ...issue.path].join('.')}: ${issue.message}`)
    .join('; ');
}

function pairLines(fields: Record<string, TomlWritable | undefined>): string[] {
  return Object.entries(fields)
    .filter((entry): entry is [string, TomlWritable] => entry[1] !== undefined)
    .map(([key, value]) => `${formatKey(key)} = ${formatValue(value)}`);
}

function toRepoEntry(name: string, repo: RepoToml): RepoEntry {
  const entry: RepoEntry = { name };
  if (repo.target !== undefined) {
    entry.target = repo.target;
  }
  if (repo.branch !== undefined) {
    entry.branch = repo.branch;
  }
  if (repo.remote !== undefined) {
    entry.remote = repo.remote;
  }
  if (repo.workdir_home !== undefined) {
    entry.workdirHome = repo.workdir_home;
  }
  if (repo.bootstrap) {
    const { clone, os, users, hosts } = repo.bootstrap;
    const bootstrap: BootstrapSettings = {};
    if (clone !== undefined) {
      bootstrap.clone = clone;
    }
    if (os !== undefined) {
      bootstrap.os = os;
    }
    if (users !== undefined) {
      bootstrap.users = users;
    }
    if (hosts !== undefined) {
      bootstrap.hosts = hosts;
    }
    entry.bootstrap = bootstrap;
  }
  return entry;
}

interface RepoTomlFields {
  [key: string]: TomlWritable | undefined;
  bootstrap?: Record<string, TomlWritable | undefined> | undefined;
}

function toRepoToml(entry: RepoEntry): RepoTomlFields {
  const bootstrap = entry.bootstrap;
  return {
    target: entry.target,
    branch: entry.branch,
    remote: entry.remote,
    workdir_home: entry.workdirHome,
    bootstrap:
      bootstrap !== undefined && Object.values(bootstrap).some(value => value !== undefined)
        ? { clone: bootstrap.clone, os: bootstrap.os, users: bootstrap.users, hosts: bootstrap.hosts }
        : undefined,
  };
}

function toHookEntry(command: string, tables: HookTable[]): HookEntry {
  const actions: HookAction[] = [];
  for (const table of tables) {
    if (table.pre !== undefined) {
      actions.push(hookAction('pre', table.pre, table.workdir));
    }
    if (table.post !== undefined) {
      actions.push(hookAction('post', table.post, table.workdir));
    }
  }
  return { command, actions };
}

function hookAction(phase: HookPhase, script: string, workdir: string | undefined): HookAction {
  return workdir === undefined ? { phase, script } : { phase, script, workdir };
}
