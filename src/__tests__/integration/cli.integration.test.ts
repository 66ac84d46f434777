import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { createProgram, ProgramOptions } from '../../cli';
import { SpawnRequest } from '../../core/process.service';
import { logger } from '../../utils/logger.service';

describe('CLI Integration Tests', () => {
  let tempDir: string;
  let configPath: string;
  let exit: jest.Mock<void, [number]>;
  let run: jest.Mock<Promise<number>, [SpawnRequest]>;
  let confirm: jest.Mock<Promise<boolean>, [string]>;

  const tendril = async (args: string[], env: NodeJS.ProcessEnv = {}): Promise<void> => {
    const options: ProgramOptions = {
      env,
      cwd: tempDir,
      exit,
      capabilities: {
        spawner: { run },
        prompt: { confirm },
        pager: { show: () => Promise.resolve() },
      },
    };
    await createProgram(options).parseAsync(['node', 'tendril', '--config-dir', tempDir, ...args]);
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tendril-cli-test-'));
    configPath = path.join(tempDir, 'config.toml');
    exit = jest.fn<void, [number]>();
    run = jest.fn<Promise<number>, [SpawnRequest]>(() => Promise.resolve(0));
    confirm = jest.fn<Promise<boolean>, [string]>(() => Promise.resolve(true));
    jest.spyOn(logger, 'info').mockImplementation(() => undefined);
    jest.spyOn(logger, 'success').mockImplementation(() => undefined);
    jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
    jest.spyOn(logger, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.remove(tempDir);
  });

  const withAddHook = async (): Promise<void> => {
    await tendril(['init']);
    await fs.writeFile(configPath, '[hooks]\nadd = [{ pre = "check.sh" }]\n');
    await fs.writeFile(path.join(tempDir, 'hooks', 'check.sh'), 'exit 0\n');
  };

  it('should initialise the layout and manage repositories', async () => {
    await tendril(['init']);
    await tendril(['add', 'vim', '--target', '~', '--branch', 'main']);
    await tendril(['add', 'notes']);
    await tendril(['rename', 'notes', 'journal']);

    expect(exit).not.toHaveBeenCalled();
    expect(await fs.pathExists(path.join(tempDir, 'hooks'))).toBe(true);
    expect(await fs.pathExists(path.join(tempDir, 'repos'))).toBe(true);

    const content = await fs.readFile(configPath, 'utf8');
    expect(content.startsWith('# tendril configuration\n')).toBe(true);
    expect(content).toContain('[repos.vim]\ntarget = "~"\nbranch = "main"\n');
    expect(content).toContain('[repos.journal]\n');
    expect(content).not.toContain('[repos.notes]');
  });

  it('should exit with a usage status for a duplicate repository', async () => {
    await tendril(['add', 'vim']);
    await tendril(['add', 'vim']);

    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(2);
    expect(logger.error).toHaveBeenCalledWith("Repository 'vim' already exists");
  });

  it('should write ignore files', async () => {
    await tendril(['ignore', 'vim', '*.swp', 'undo/']);

    expect(await fs.readFile(path.join(tempDir, 'ignores', 'vim.ignore'), 'utf8')).toBe('*.swp\nundo/\n');
  });

  it('should run pre hooks around a command', async () => {
    await withAddHook();

    await tendril(['--run-hook', 'always', 'add', 'zsh']);

    expect(run).toHaveBeenCalledWith(
      expect.objectContaining({ scriptPath: path.join(tempDir, 'hooks', 'check.sh'), cwd: tempDir }),
    );
    expect(confirm).not.toHaveBeenCalled();
    expect(await fs.readFile(configPath, 'utf8')).toContain('add = [{ pre = "check.sh" }]');
  });

  it('should ask before running a hook by default', async () => {
    await withAddHook();
    confirm.mockResolvedValueOnce(false);

    await tendril(['add', 'zsh']);

    expect(confirm).toHaveBeenCalledWith("Run pre hook 'check.sh' for 'add'?");
    expect(run).not.toHaveBeenCalled();
    expect(exit).not.toHaveBeenCalled();
  });

  it('should take the hook mode from the environment', async () => {
    await withAddHook();

    await tendril(['add', 'zsh'], { TENDRIL_RUN_HOOK: 'never' });

    expect(run).not.toHaveBeenCalled();
    expect(confirm).not.toHaveBeenCalled();
  });

  it('should abort a command whose pre hook failed when asked to', async () => {
    await withAddHook();
    run.mockResolvedValueOnce(1);

    await tendril(['--run-hook', 'always', '--abort-on-hook-failure', 'add', 'zsh']);

    expect(exit).toHaveBeenCalledWith(3);
    expect(await fs.readFile(configPath, 'utf8')).not.toContain('[repos.zsh]');
  });

  it('should reject an unknown hook mode', async () => {
    await tendril(['--run-hook', 'sometimes', 'list']);

    expect(exit).toHaveBeenCalledWith(2);
    expect(logger.error).toHaveBeenCalledWith('list: Invalid value for --run-hook: \'sometimes\' is not one of always, never, prompt');
  });

  it('should report malformed configuration with its position', async () => {
    await fs.writeFile(configPath, '[repos.vim]\ntarget = "~"\nbad line\n');

    await tendril(['list']);

    expect(exit).toHaveBeenCalledWith(1);
  });
});
