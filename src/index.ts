#!/usr/bin/env node
import { color, brand } from './ui/theme.js';
import { parseCLIArgs, UsageError } from './cli/args.js';
import { runCheck, runParse } from './cli/commands.js';
import { printError } from './utils/logger.js';

function printHelp(): void {
  console.log(`
${brand.teal('redirects-lint')} <command> [file] [options]

${color.bold('Commands:')}
  parse      Print the parsed rules as JSON
  check      Show a rule overview and lint warnings

${color.bold('Arguments:')}
  file       A _redirects file, a directory holding one, or - for stdin (default)

${color.bold('Options:')}
  --format <fmt>     check output: text (default) or json
  --strict           Exit with 1 when there are lint warnings
  --verbose          Show detailed output
  -h, --help         Show this help
`.trimEnd());
}

async function main(): Promise<void> {
  const cli = parseCLIArgs(process.argv.slice(2));

  if (cli.command === 'help') {
    printHelp();
    return;
  }

  const code = cli.command === 'parse' ? await runParse(cli) : await runCheck(cli);
  process.exitCode = code;
}

main().catch((err: unknown) => {
  if (err instanceof UsageError) {
    printError(err.message);
    console.log();
    printHelp();
  } else {
    printError(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exit(1);
});
