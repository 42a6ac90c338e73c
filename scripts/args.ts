export type ParsedArgs = Record<string, string | boolean | number>;

/** `--key=value` flags (numbers coerced, bare flags true) plus up to two positionals as `_` and `__` */
export function parseArgs(argv: string[]): ParsedArgs {
  const out: ParsedArgs = {};
  for (const a of argv) {
    if (a.startsWith('--')) {
      const eq = a.indexOf('=');
      const k = eq === -1 ? a.slice(2) : a.slice(2, eq);
      const v = eq === -1 ? undefined : a.slice(eq + 1);
      if (v === undefined) out[k] = true; else if (/^\d+$/.test(v)) out[k] = Number(v); else out[k] = v;
    } else if (out._ === undefined) out._ = a; else out.__ = a;
  }
  return out;
}

export function stringArg(args: ParsedArgs, key: string): string | undefined {
  const v = args[key];
  return v === undefined || typeof v === 'boolean' ? undefined : String(v);
}

export function numberArg(args: ParsedArgs, key: string): number | undefined {
  const v = args[key];
  return typeof v === 'number' ? v : undefined;
}
