import { stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { parse, parseFile } from '../redirects/parser.js';
import type { Rule } from '../redirects/types.js';
import { UsageError } from './args.js';

export const DEFAULT_FILENAME = '_redirects';

export interface InputSource {
  kind: 'file' | 'stdin';
  path: string | null;
}

/**
 * Resolve the CLI's file argument. Missing or `-` means stdin;
 * a directory means the `_redirects` file inside it.
 */
export async function resolveInput(arg: string | undefined): Promise<InputSource> {
  if (arg === undefined || arg === '-') {
    return { kind: 'stdin', path: null };
  }

  const full = resolve(arg);
  if (!(await isFile(full))) {
    const inner = join(full, DEFAULT_FILENAME);
    if (await isFile(inner)) {
      return { kind: 'file', path: inner };
    }
    throw new UsageError(`No ${DEFAULT_FILENAME} file found at ${arg}`);
  }
  return { kind: 'file', path: full };
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export async function readRules(
  source: InputSource,
  stdin: NodeJS.ReadableStream = process.stdin,
): Promise<Rule[]> {
  if (source.kind === 'stdin' || source.path === null) {
    return parse(stdin);
  }
  return parseFile(source.path);
}
