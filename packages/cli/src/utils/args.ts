/**
 * @module utils/args
 * argv helpers shared by the commands. Each takes the argument list after
 * the command name so commands stay testable.
 */

/** Value of `flag` given as `--flag value` or `--flag=value`, or `fallback` when absent. */
export function arg(argv: readonly string[], flag: string, fallback = ''): string {
  const inline = argv.find((a) => a.startsWith(`${flag}=`));
  if (inline !== undefined) return inline.slice(flag.length + 1) || fallback;
  const i = argv.indexOf(flag);
  if (i === -1) return fallback;
  const value = argv[i + 1];
  return value === undefined || value.startsWith('--') ? fallback : value;
}

export function hasFlag(argv: readonly string[], flag: string): boolean {
  return argv.includes(flag);
}

/** Comma-separated flag value as a trimmed list (`--only art19,website`). */
export function listArg(argv: readonly string[], flag: string): string[] | undefined {
  const raw = arg(argv, flag);
  if (!raw) return undefined;
  return raw.split(',').map((s) => s.trim()).filter(Boolean);
}

/**
 * Bare arguments, skipping flags and the values they take.
 * `valueFlags` names the flags that consume the next argument.
 */
export function positionals(argv: readonly string[], valueFlags: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a.startsWith('--')) {
      if (valueFlags.includes(a)) i++;
      continue;
    }
    out.push(a);
  }
  return out;
}
