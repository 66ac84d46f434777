import { IgnoreCommand } from '../../commands/ignore.command';
import { createAppContext, resolveSettings } from '../../core/app.context';
import { MemoryFileSystem } from '../../core/memory.filesystem';
import { logger } from '../../utils/logger.service';

describe('IgnoreCommand', () => {
  let fileSystem: MemoryFileSystem;
  let ignoreCommand: IgnoreCommand;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    fileSystem = new MemoryFileSystem({ '/cfg/config.toml': '[repos.vim]\n' });
    ignoreCommand = new IgnoreCommand(
      createAppContext(resolveSettings({ configDir: '/cfg' }, {}), { env: {}, cwd: '/work', fileSystem }),
    );
    warn = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should write the ignore file of a repository', async () => {
    const result = await ignoreCommand.execute('vim', ['*.swp', 'undo/']);

    expect(result).toEqual({
      success: true,
      message: 'Wrote 2 pattern(s) to /cfg/ignores/vim.ignore',
      exitCode: 0,
      data: '/cfg/ignores/vim.ignore',
    });
    expect(await fileSystem.readFile('/cfg/ignores/vim.ignore')).toBe('*.swp\nundo/\n');
    expect(warn).not.toHaveBeenCalled();
  });

  it('should warn but still write for an unconfigured repository', async () => {
    const result = await ignoreCommand.execute('zsh', ['.zcompdump']);

    expect(result.success).toBe(true);
    expect(warn).toHaveBeenCalledWith("Repository 'zsh' is not configured; writing its ignore file anyway");
  });

  it('should fail for a name with a path separator', async () => {
    const result = await ignoreCommand.execute('a/b', ['x']);

    expect(result.success).toBe(false);
    expect(result.message).toBe('Invalid repository name: Repository name cannot contain path separators');
  });
});
