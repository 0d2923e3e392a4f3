import { RedirectsParseError } from '../redirects/errors.js';
import { lintRules } from '../redirects/lint.js';
import { serializeRules, toJSON } from '../redirects/serialize.js';
import type { Rule } from '../redirects/types.js';
import {
  printBanner,
  printLintWarnings,
  printParseFailure,
  printRulesOverview,
  printVerbose,
} from '../utils/logger.js';
import type { CLIOptions } from './args.js';
import { readRules, resolveInput, type InputSource } from './input.js';

export type ExitCode = 0 | 1;

/**
 * Read and parse the input, printing a parse failure the way the
 * chosen output format expects. Returns null when parsing failed.
 */
async function loadRules(
  source: InputSource,
  opts: CLIOptions,
  stdin?: NodeJS.ReadableStream,
): Promise<Rule[] | null> {
  try {
    return await readRules(source, stdin);
  } catch (err: unknown) {
    if (!(err instanceof RedirectsParseError)) throw err;

    if (opts.format === 'json') {
      console.log(JSON.stringify({
        error: {
          kind: err.kind,
          lineNumber: err.lineNumber,
          line: err.line,
          token: err.token,
          message: err.reason,
        },
      }, null, 2));
    } else {
      printParseFailure(err, source.path);
    }
    return null;
  }
}

/**
 * `parse`: print the rules as JSON.
 */
export async function runParse(
  opts: CLIOptions,
  stdin?: NodeJS.ReadableStream,
): Promise<ExitCode> {
  const source = await resolveInput(opts.file);
  const rules = await loadRules(source, { ...opts, format: 'json' }, stdin);
  if (!rules) return 1;

  console.log(serializeRules(rules));
  return 0;
}

/**
 * `check`: parse, print an overview and lint warnings.
 * With --strict any warning fails the run.
 */
export async function runCheck(
  opts: CLIOptions,
  stdin?: NodeJS.ReadableStream,
): Promise<ExitCode> {
  const source = await resolveInput(opts.file);

  if (opts.format === 'text') {
    printBanner('Check', source.path);
    if (opts.verbose) {
      printVerbose(`Reading ${source.kind === 'stdin' ? 'stdin' : source.path}`);
    }
  }

  const rules = await loadRules(source, opts, stdin);
  if (!rules) return 1;

  const warnings = lintRules(rules);

  if (opts.format === 'json') {
    console.log(JSON.stringify({ rules: rules.map(toJSON), warnings }, null, 2));
  } else {
    if (opts.verbose) {
      printVerbose(`Parsed ${rules.length} rule${rules.length === 1 ? '' : 's'}`);
    }
    printRulesOverview(rules);
    printLintWarnings(warnings);
  }

  return opts.strict && warnings.length > 0 ? 1 : 0;
}
