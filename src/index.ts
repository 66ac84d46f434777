/**
 * tendril
 *
 * Configuration and hook subsystem of a dotfile manager: a registry of
 * tracked repositories and command hooks kept in one TOML document,
 * located by the XDG base directory convention and edited in place.
 */

export * from './cli';
export * from './commands/init.command';
export * from './commands/repo.command';
export * from './commands/ignore.command';
export * from './commands/hook.command';
export * from './core/app.context';
export * from './core/config.document';
export * from './core/config.manager';
export * from './core/document.store';
export * from './core/filesystem.service';
export * from './core/hook.runner';
export * from './core/locator.service';
export * from './core/memory.filesystem';
export * from './core/pager.service';
export * from './core/process.service';
export * from './core/prompt.service';
export * from './utils/path.expander';
export * from './utils/platform.detector';
export * from './types/config.types';
export * from './types/hook.types';
export * from './types/config.schema';
export * from './errors/base.error';
export * from './errors/document.error';
export * from './errors/filesystem.error';
export * from './errors/hook.error';
export * from './errors/locator.error';
export * from './errors/settings.error';
export * from './errors/enhanced.error-handler';
