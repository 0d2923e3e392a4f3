import { parseArgs } from 'node:util';

export type Command = 'parse' | 'check';
export type OutputFormat = 'text' | 'json';

export interface CLIOptions {
  command: Command | 'help';
  file: string | undefined;
  format: OutputFormat;
  verbose: boolean;
  strict: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const KNOWN_COMMANDS: readonly Command[] = ['parse', 'check'];

function isCommand(value: string): value is Command {
  return KNOWN_COMMANDS.some((c) => c === value);
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'json';
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        format: { type: 'string' },
        verbose: { type: 'boolean', default: false },
        strict: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
      strict: true,
      allowPositionals: true,
    });
  } catch (err: unknown) {
    // parseArgs reports unknown flags and missing values as TypeErrors
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCLIArgs(argv: string[]): CLIOptions {
  const { values, positionals } = readArgs(argv);

  const [cmd, file, ...rest] = positionals;

  if (values.help || cmd === undefined) {
    return { command: 'help', file: undefined, format: 'text', verbose: false, strict: false };
  }

  if (!isCommand(cmd)) {
    throw new UsageError(`Unknown command: ${cmd}`);
  }
  if (rest.length > 0) {
    throw new UsageError(`Unexpected argument: ${rest[0]}`);
  }

  const format = values.format ?? 'text';
  if (!isOutputFormat(format)) {
    throw new UsageError(`Unknown format: ${format} (expected text or json)`);
  }
  if (values.format !== undefined && cmd !== 'check') {
    throw new UsageError('--format is only supported with the "check" command');
  }

  return {
    command: cmd,
    file,
    format,
    verbose: Boolean(values.verbose),
    strict: Boolean(values.strict),
  };
}
