import { createReadStream } from 'node:fs';
import { createInterface } from 'node:readline';
import { RedirectsParseError } from './errors.js';
import { parseLine } from './tokenizer.js';
import type { Rule } from './types.js';

export type ParseResult =
  | { success: true; rules: Rule[] }
  | { success: false; error: RedirectsParseError };

/**
 * Parse redirect rules from an iterable of lines.
 * Throws a RedirectsParseError on the first malformed line.
 */
export function parseLines(lines: Iterable<string>): Rule[] {
  const rules: Rule[] = [];
  let lineNumber = 0;

  for (const line of lines) {
    lineNumber++;
    const rule = parseLine(line, lineNumber);
    if (rule) rules.push(rule);
  }

  return rules;
}

export function parseString(text: string): Rule[] {
  return parseLines(text.split('\n'));
}

/**
 * Like parseString, but reports failure in the result instead of throwing.
 */
export function safeParseString(text: string): ParseResult {
  try {
    return { success: true, rules: parseString(text) };
  } catch (err) {
    if (err instanceof RedirectsParseError) {
      return { success: false, error: err };
    }
    throw err;
  }
}

/**
 * Parse a redirects stream line by line.
 * Rejects with the first RedirectsParseError, or with the stream's own error.
 */
export async function parse(input: NodeJS.ReadableStream): Promise<Rule[]> {
  const rules: Rule[] = [];
  let lineNumber = 0;

  const rl = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      lineNumber++;
      const rule = parseLine(line, lineNumber);
      if (rule) rules.push(rule);
    }
  } finally {
    rl.close();
  }

  return rules;
}

export async function parseFile(filePath: string): Promise<Rule[]> {
  const stream = createReadStream(filePath, { encoding: 'utf-8' });
  try {
    return await parse(stream);
  } finally {
    stream.destroy();
  }
}
