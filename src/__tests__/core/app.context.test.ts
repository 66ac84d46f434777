import { createAppContext, resolveSettings } from '../../core/app.context';
import { MemoryFileSystem } from '../../core/memory.filesystem';
import { InvalidSettingError } from '../../errors/settings.error';

describe('resolveSettings', () => {
  it('should use defaults when nothing is set', () => {
    expect(resolveSettings({}, {})).toEqual({
      configDir: undefined,
      runHook: 'prompt',
      strictHooks: false,
      abortOnHookFailure: false,
    });
  });

  it('should read the hook mode from the environment', () => {
    expect(resolveSettings({}, { TENDRIL_RUN_HOOK: ' Always ' }).runHook).toBe('always');
  });

  it('should let the flag win over the environment', () => {
    const settings = resolveSettings(
      { runHook: 'never', strictHooks: true, abortOnHookFailure: true, configDir: '/cfg' },
      { TENDRIL_RUN_HOOK: 'always' },
    );

    expect(settings).toEqual({
      configDir: '/cfg',
      runHook: 'never',
      strictHooks: true,
      abortOnHookFailure: true,
    });
  });

  it('should name the source of an invalid mode', () => {
    expect(() => resolveSettings({ runHook: 'sometimes' }, {})).toThrow('Invalid value for --run-hook');
    expect(() => resolveSettings({}, { TENDRIL_RUN_HOOK: 'yes' })).toThrow(InvalidSettingError);
    expect(() => resolveSettings({}, { TENDRIL_RUN_HOOK: 'yes' })).toThrow(
      'Invalid value for TENDRIL_RUN_HOOK',
    );
  });
});

describe('createAppContext', () => {
  it('should wire the locator, manager and hook runner', () => {
    const fileSystem = new MemoryFileSystem();
    const context = createAppContext(resolveSettings({ runHook: 'never', strictHooks: true }, {}), {
      env: { HOME: '/home/test' },
      cwd: '/work',
      fileSystem,
    });

    expect(context.cwd).toBe('/work');
    expect(context.fileSystem).toBe(fileSystem);
    expect(context.configManager.getConfigPath()).toBe('/home/test/.config/tendril/config.toml');
    expect(context.hookRunner.getOptions()).toEqual({ mode: 'never', strict: true, abortOnFailure: false });
  });

  it('should resolve a configuration directory flag against the working directory', () => {
    const context = createAppContext(resolveSettings({ configDir: 'dots' }, {}), {
      env: {},
      cwd: '/work',
      fileSystem: new MemoryFileSystem(),
    });

    expect(context.locator.resolveConfigDir()).toBe('/work/dots');
    expect(context.locator.repoStorePath('vim')).toBe('/work/dots/repos/vim.git');
  });
});
