/**
 * Command-line tokenizer.
 *
 * `--name value` and `--name=value` set a flag; names in BOOLEAN_FLAGS take no
 * value. Anything else, including negative numbers such as `-40`, is a
 * positional argument.
 */

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface ParsedArgs {
  positionals: string[];
  flags: Map<string, string | true>;
}

const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(['help', 'version', 'verbose']);

const SHORT_ALIASES: ReadonlyMap<string, string> = new Map([
  ['-h', 'help'],
  ['-V', 'version'],
  ['-v', 'verbose'],
]);

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];

    const alias = SHORT_ALIASES.get(token);
    if (alias !== undefined) {
      flags.set(alias, true);
      continue;
    }

    if (token.startsWith('--') && token.length > 2) {
      const eq = token.indexOf('=');
      const name = eq === -1 ? token.slice(2) : token.slice(2, eq);
      if (BOOLEAN_FLAGS.has(name)) {
        if (eq !== -1) throw new UsageError(`Option --${name} does not take a value`);
        flags.set(name, true);
        continue;
      }
      if (eq !== -1) {
        flags.set(name, token.slice(eq + 1));
        continue;
      }
      const next = argv[i + 1];
      if (next === undefined || (next.startsWith('-') && !NUMERIC.test(next))) {
        throw new UsageError(`Option --${name} requires a value`);
      }
      flags.set(name, next);
      i++;
      continue;
    }

    if (token.startsWith('-') && token.length > 1 && !NUMERIC.test(token)) {
      throw new UsageError(`Unknown option '${token}'`);
    }

    positionals.push(token);
  }

  return { positionals, flags };
}

/** Parse a decimal number, rejecting blanks and anything non-finite. */
export function parseNumber(raw: string, name: string): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(value)) {
    throw new UsageError(`Invalid number for ${name}: '${raw}'`);
  }
  return value;
}

export function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  if (value === true) throw new UsageError(`Option --${name} requires a value`);
  return value;
}

export function numberFlag(args: ParsedArgs, name: string): number | undefined {
  const raw = stringFlag(args, name);
  return raw === undefined ? undefined : parseNumber(raw, `--${name}`);
}

export function assertKnownFlags(args: ParsedArgs, allowed: readonly string[]): void {
  for (const name of args.flags.keys()) {
    if (!BOOLEAN_FLAGS.has(name) && !allowed.includes(name)) {
      throw new UsageError(`Unknown option '--${name}'`);
    }
  }
}

/** Require exactly `names.length` positionals and return them in order. */
export function expectPositionals(args: ParsedArgs, names: readonly string[]): string[] {
  if (args.positionals.length < names.length) {
    throw new UsageError(`Missing argument <${names[args.positionals.length]}>`);
  }
  if (args.positionals.length > names.length) {
    throw new UsageError(`Unexpected argument '${args.positionals[names.length]}'`);
  }
  return args.positionals;
}
