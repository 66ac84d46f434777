import * as path from 'path';

const ENV_REFERENCE = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

export interface ExpandContext {
  env?: NodeJS.ProcessEnv;
  home?: string | undefined;
}

/**
 * Expand a leading `~` and `$VAR` / `${VAR}` references.
 *
 * Unset variables expand to an empty string. A `~` is only expanded when it
 * is the whole path or followed by a separator; `~user` is left alone.
 */
export function expandPath(input: string, context: ExpandContext = {}): string {
  const env = context.env ?? process.env;
  const home = context.home ?? env['HOME'];

  let expanded = input;
  if (home && (expanded === '~' || expanded.startsWith('~/') || expanded.startsWith(`~${path.sep}`))) {
    expanded = path.join(home, expanded.slice(1));
  }

  return expanded.replace(
    ENV_REFERENCE,
    (_match, braced: string | undefined, bare: string | undefined) => env[braced ?? bare ?? ''] ?? '',
  );
}
