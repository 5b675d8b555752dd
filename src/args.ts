/**
 * Command-line argument parsing
 *
 * Value flags accept "--flag value" and "--flag=value"; everything else
 * starting with "-" is a boolean flag.
 */

export interface ParsedArgs {
  readonly positional: readonly string[];
  readonly flags: ReadonlySet<string>;
  readonly values: ReadonlyMap<string, string>;
}

const VALUE_FLAGS = new Set(['--since', '--session', '--source', '--output', '--days']);

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Set<string>();
  const values = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    const eq = arg.indexOf('=');
    if (arg.startsWith('--') && eq !== -1 && VALUE_FLAGS.has(arg.slice(0, eq))) {
      values.set(arg.slice(0, eq), arg.slice(eq + 1));
      continue;
    }

    if (VALUE_FLAGS.has(arg)) {
      const next = argv[i + 1];
      if (next !== undefined) {
        values.set(arg, next);
        i++;
      }
      continue;
    }

    if (arg.startsWith('-')) {
      flags.add(arg);
    } else {
      positional.push(arg);
    }
  }

  return { positional, flags, values };
}
