import { homedir } from 'node:os';

export type EnvLookup = Readonly<Record<string, string | undefined>>;

/**
 * Expands a leading `~` and `$VAR` / `${VAR}` references. Unset variables
 * are left as written.
 */
export function expandPath(raw: string, env: EnvLookup = process.env): string {
  let expanded = raw;
  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = homedir() + expanded.slice(1);
  }
  return expanded.replace(
    /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (whole: string, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare ?? '';
      return env[name] ?? whole;
    },
  );
}
