import { z } from 'zod';

/**
 * Zod schemas for the decoded `repos` and `hooks` sections of config.toml.
 *
 * Unknown keys are kept out of the typed view but never removed from the
 * document itself, so users can annotate entries freely.
 */

export const OsTypeSchema = z.enum(['any', 'unix', 'macos', 'windows']);

export const BootstrapTomlSchema = z
  .object({
    clone: z.string().optional(),
    os: OsTypeSchema.optional(),
    users: z.array(z.string()).optional(),
    hosts: z.array(z.string()).optional(),
  })
  .passthrough();

export const RepoTomlSchema = z
  .object({
    target: z.string().optional(),
    branch: z.string().optional(),
    remote: z.string().optional(),
    workdir_home: z.boolean().optional(),
    bootstrap: BootstrapTomlSchema.optional(),
  })
  .passthrough();

export const ReposSectionSchema = z.record(RepoTomlSchema);

export const ScriptNameSchema = z
  .string()
  .min(1, 'Hook script name cannot be empty')
  .refine(name => !/[/\\\0]/.test(name), {
    message: 'Hook scripts are referenced by bare file name',
  })
  .refine(name => name !== '.' && name !== '..', {
    message: "Hook script cannot be '.' or '..'",
  });

export const HookTableSchema = z
  .object({
    pre: ScriptNameSchema.optional(),
    post: ScriptNameSchema.optional(),
    workdir: z.string().optional(),
  })
  .passthrough()
  .refine(table => table.pre !== undefined || table.post !== undefined, {
    message: "Hook table needs a 'pre' or 'post' script",
  });

export const HooksSectionSchema = z.record(z.array(HookTableSchema));

/**
 * Repository names become TOML keys and directory names
 */
export const RepoNameSchema = z
  .string()
  .min(1, 'Repository name cannot be empty')
  .max(255, 'Repository name too long (max 255 characters)')
  .refine(name => !/[/\\\0]/.test(name), {
    message: 'Repository name cannot contain path separators',
  })
  .refine(name => name !== '.' && name !== '..', {
    message: "Repository name cannot be '.' or '..'",
  });

export type RepoToml = z.infer<typeof RepoTomlSchema>;
export type HookTable = z.infer<typeof HookTableSchema>;
