import { ConfigManager } from '../../core/config.manager';
import { TomlDocumentStore } from '../../core/document.store';
import { HookRunner, HookRunnerOptions, isFailure } from '../../core/hook.runner';
import { FixedLocator } from '../../core/locator.service';
import { MemoryFileSystem } from '../../core/memory.filesystem';
import { SpawnRequest } from '../../core/process.service';
import {
  HookAbortError,
  HookExecutionError,
  ScriptNotFoundError,
  UserDeclinedError,
} from '../../errors/hook.error';

const CONFIG = [
  '[hooks]',
  'commit = [',
  '  { pre = "lint.sh" },',
  '  { pre = "missing.sh" },',
  '  { post = "notify.sh", workdir = "$PROJECT/sub" },',
  ']',
  'push = [{ pre = "lint.sh" }, { post = "gone.sh" }]',
  'sync = [{ pre = "missing.sh" }, { pre = "lint.sh" }]',
  '',
].join('\n');

const LINT = '/cfg/hooks/lint.sh';
const NOTIFY = '/cfg/hooks/notify.sh';

describe('HookRunner', () => {
  let fileSystem: MemoryFileSystem;
  let run: jest.Mock<Promise<number>, [SpawnRequest]>;
  let show: jest.Mock<Promise<void>, [string, string]>;
  let confirm: jest.Mock<Promise<boolean>, [string]>;

  const createRunner = (options: Partial<HookRunnerOptions> = {}): HookRunner => {
    const manager = new ConfigManager(
      FixedLocator.under('/cfg', fileSystem),
      new TomlDocumentStore(fileSystem),
      fileSystem,
    );
    return new HookRunner(
      manager,
      { fileSystem, spawner: { run }, pager: { show }, prompt: { confirm }, env: { PROJECT: '/proj' } },
      options,
    );
  };

  beforeEach(() => {
    fileSystem = new MemoryFileSystem({ '/cfg/config.toml': CONFIG });
    fileSystem.seed(LINT, '#!/bin/sh\nmake lint\n', true);
    fileSystem.seed(NOTIFY, 'echo done\n');
    run = jest.fn<Promise<number>, [SpawnRequest]>(() => Promise.resolve(0));
    show = jest.fn<Promise<void>, [string, string]>(() => Promise.resolve());
    confirm = jest.fn<Promise<boolean>, [string]>(() => Promise.resolve(true));
  });

  it('should default to prompting, lenient and non-aborting', () => {
    expect(createRunner().getOptions()).toEqual({ mode: 'prompt', strict: false, abortOnFailure: false });
  });

  describe('runPhase', () => {
    it('should run actions of the phase in order and report missing scripts', async () => {
      const results = await createRunner({ mode: 'always' }).runPhase('commit', 'pre', { cwd: '/work' });

      expect(results.map(result => result.status)).toEqual(['executed', 'not-found']);
      expect(results[0]).toMatchObject({ exitCode: 0, cwd: '/work' });
      expect(run).toHaveBeenCalledTimes(1);
      expect(run).toHaveBeenCalledWith({ scriptPath: LINT, executable: true, cwd: '/work' });
    });

    it('should expand workdir and run non-executable scripts through the shell', async () => {
      const results = await createRunner({ mode: 'always' }).runPhase('commit', 'post', { cwd: '/work' });

      expect(results).toEqual([
        {
          status: 'executed',
          action: { phase: 'post', script: 'notify.sh', workdir: '$PROJECT/sub', scriptPath: NOTIFY },
          exitCode: 0,
          cwd: '/proj/sub',
        },
      ]);
      expect(run).toHaveBeenCalledWith({ scriptPath: NOTIFY, executable: false, cwd: '/proj/sub' });
    });

    it('should return nothing for commands without hooks', async () => {
      expect(await createRunner({ mode: 'always' }).runPhase('init', 'pre', { cwd: '/work' })).toEqual([]);
    });

    it('should throw for a missing script in strict mode', async () => {
      await expect(
        createRunner({ mode: 'always', strict: true }).runPhase('commit', 'pre', { cwd: '/work' }),
      ).rejects.toThrow(ScriptNotFoundError);
      expect(run).toHaveBeenCalledTimes(1);
    });

    it('should go on with later actions after a missing script', async () => {
      const results = await createRunner({ mode: 'always' }).runPhase('sync', 'pre', { cwd: '/work' });

      expect(results.map(result => result.status)).toEqual(['not-found', 'executed']);
      expect(run).toHaveBeenCalledTimes(1);
      expect(run).toHaveBeenCalledWith({ scriptPath: LINT, executable: true, cwd: '/work' });
    });

    it('should skip every script when hooks are disabled', async () => {
      const results = await createRunner({ mode: 'never' }).runPhase('commit', 'pre', { cwd: '/work' });

      expect(results.map(result => result.status)).toEqual(['skipped', 'skipped']);
      expect(results[1]).toMatchObject({ reason: 'disabled' });
      expect(run).not.toHaveBeenCalled();
    });

    it('should not look up scripts when hooks are disabled, even in strict mode', async () => {
      const isFile = jest.spyOn(fileSystem, 'isFile');

      const results = await createRunner({ mode: 'never', strict: true }).runPhase('sync', 'pre', {
        cwd: '/work',
      });

      expect(results).toEqual([
        {
          status: 'skipped',
          action: { phase: 'pre', script: 'missing.sh', scriptPath: '/cfg/hooks/missing.sh' },
          reason: 'disabled',
        },
        {
          status: 'skipped',
          action: { phase: 'pre', script: 'lint.sh', scriptPath: LINT },
          reason: 'disabled',
        },
      ]);
      expect(isFile).not.toHaveBeenCalledWith('/cfg/hooks/missing.sh');
      expect(isFile).not.toHaveBeenCalledWith(LINT);
    });

    it('should show the script and ask before running it', async () => {
      const results = await createRunner({ mode: 'prompt' }).runPhase('push', 'pre', { cwd: '/work' });

      expect(show).toHaveBeenCalledWith(`Hook script: ${LINT}`, '#!/bin/sh\nmake lint\n');
      expect(confirm).toHaveBeenCalledWith("Run pre hook 'lint.sh' for 'push'?");
      expect(results[0].status).toBe('executed');
    });

    it('should record a declined script and carry on', async () => {
      confirm.mockResolvedValueOnce(false);

      const results = await createRunner({ mode: 'prompt' }).runPhase('push', 'pre', { cwd: '/work' });

      const [declined] = results;
      expect(declined).toMatchObject({ status: 'skipped', reason: 'declined' });
      expect(declined.status === 'skipped' && declined.error).toBeInstanceOf(UserDeclinedError);
      expect(run).not.toHaveBeenCalled();
    });

    it('should report non-zero exits and spawn failures', async () => {
      run.mockResolvedValueOnce(3);
      const [failedExit] = await createRunner({ mode: 'always' }).runPhase('push', 'pre', { cwd: '/w' });

      expect(failedExit).toMatchObject({ status: 'executed', exitCode: 3 });
      expect(isFailure(failedExit)).toBe(true);

      const spawnError = new HookExecutionError(LINT, 'ENOENT');
      run.mockRejectedValueOnce(spawnError);
      const [kept] = await createRunner({ mode: 'always' }).runPhase('push', 'pre', { cwd: '/w' });

      expect(kept).toMatchObject({ status: 'error', error: spawnError });

      run.mockRejectedValueOnce(new Error('boom'));
      const [wrapped] = await createRunner({ mode: 'always' }).runPhase('push', 'pre', { cwd: '/w' });

      expect(wrapped.status === 'error' && wrapped.error).toBeInstanceOf(HookExecutionError);
      expect(isFailure(wrapped)).toBe(true);
    });
  });

  describe('guard', () => {
    it('should run pre hooks, the task and post hooks', async () => {
      const calls: string[] = [];
      run.mockImplementation(request => {
        calls.push(request.scriptPath);
        return Promise.resolve(0);
      });

      const { value, report } = await createRunner({ mode: 'always' }).guard(
        'commit',
        async () => {
          calls.push('task');
          return 42;
        },
        { cwd: '/work' },
      );

      expect(value).toBe(42);
      expect(calls).toEqual([LINT, 'task', NOTIFY]);
      expect(report.command).toBe('commit');
      expect(report.pre).toHaveLength(2);
      expect(report.post).toHaveLength(1);
    });

    it('should go on after a failed pre hook by default', async () => {
      run.mockResolvedValueOnce(1);
      const task = jest.fn(() => Promise.resolve('ok'));

      const { value } = await createRunner({ mode: 'always' }).guard('commit', task, { cwd: '/work' });

      expect(value).toBe('ok');
      expect(task).toHaveBeenCalledTimes(1);
    });

    it('should abort before the task when a pre hook fails and aborting is on', async () => {
      run.mockResolvedValueOnce(1);
      const task = jest.fn(() => Promise.resolve('ok'));

      const error = await createRunner({ mode: 'always', abortOnFailure: true })
        .guard('commit', task, { cwd: '/work' })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(HookAbortError);
      expect(error).toMatchObject({
        message: "Command 'commit' aborted by failing pre hook",
        details: "'lint.sh' exited with status 1",
      });
      expect(task).not.toHaveBeenCalled();
    });

    it('should run post hooks after a failed task and rethrow its error', async () => {
      const failure = new Error('task failed');

      await expect(
        createRunner({ mode: 'always' }).guard('commit', () => Promise.reject(failure), { cwd: '/work' }),
      ).rejects.toBe(failure);
      expect(run).toHaveBeenLastCalledWith({ scriptPath: NOTIFY, executable: false, cwd: '/proj/sub' });
    });

    it('should report the task error when post hooks throw after it', async () => {
      const failure = new Error('task failed');

      await expect(
        createRunner({ mode: 'always', strict: true }).guard('push', () => Promise.reject(failure), {
          cwd: '/work',
        }),
      ).rejects.toBe(failure);
    });

    it('should skip post hooks on request', async () => {
      const { report } = await createRunner({ mode: 'always' }).guard('commit', () => Promise.resolve(1), {
        cwd: '/work',
        skipPost: true,
      });

      expect(report.post).toEqual([]);
      expect(run).toHaveBeenCalledTimes(1);
    });
  });
});
