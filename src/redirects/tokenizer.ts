import { missingDestination, missingTo, unexpectedToken } from './errors.js';
import { createRule, DEFAULT_STATUS } from './rule.js';
import type { ParamValue, Rule } from './types.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FORCED_STATUS_PATTERN = /^([+-]?\d+)!$/;
const PATH_PREFIXES = ['/', 'http://', 'https://'];

type Phase = 'from' | 'params' | 'to' | 'status' | 'options' | 'done';

interface LineState {
  from: string;
  to: string;
  status: number;
  force: boolean;
  params: Map<string, ParamValue> | null;
  country: string[] | null;
  language: string[] | null;
}

/**
 * Parse a single line of a redirects file.
 * Returns null for blank lines and comments.
 */
export function parseLine(rawLine: string, lineNumber: number): Rule | null {
  const line = rawLine.trim();
  if (line === '' || line.startsWith('#')) return null;

  const tokens = line.split(/\s+/);
  if (tokens.length < 2) {
    throw missingDestination(lineNumber, line);
  }

  const state: LineState = {
    from: '',
    to: '',
    status: DEFAULT_STATUS,
    force: false,
    params: null,
    country: null,
    language: null,
  };

  let phase: Phase = 'from';
  let cursor = 0;

  while (phase !== 'done') {
    const token: string | undefined = tokens[cursor];

    switch (phase) {
      case 'from':
        if (token === undefined) {
          throw missingDestination(lineNumber, line);
        }
        checkPath(token, lineNumber, line);
        state.from = token;
        cursor++;
        phase = 'params';
        break;

      case 'params':
        if (token === undefined) {
          throw missingTo(lineNumber, line);
        }
        if (!token.includes('=')) {
          phase = 'to';
          break;
        }
        state.params ??= new Map<string, ParamValue>();
        addParam(state.params, token);
        cursor++;
        break;

      case 'to':
        if (token === undefined) {
          throw missingTo(lineNumber, line);
        }
        checkPath(token, lineNumber, line);
        state.to = token;
        cursor++;
        phase = 'status';
        break;

      case 'status': {
        if (token === undefined) {
          phase = 'done';
          break;
        }
        if (INTEGER_PATTERN.test(token)) {
          state.status = toStatus(token, lineNumber, line, token);
          cursor++;
          phase = 'options';
          break;
        }
        const forced = token.match(FORCED_STATUS_PATTERN);
        if (forced) {
          state.status = toStatus(forced[1], lineNumber, line, token);
          state.force = true;
          cursor++;
          phase = 'options';
          break;
        }
        if (token.includes('=')) {
          // Not consumed: re-read as an option with the default status.
          phase = 'options';
          break;
        }
        throw unexpectedToken(lineNumber, line, token);
      }

      case 'options': {
        if (token === undefined) {
          phase = 'done';
          break;
        }
        const eq = token.indexOf('=');
        if (eq === -1) {
          throw unexpectedToken(lineNumber, line, token);
        }
        const key = token.slice(0, eq);
        const values = token.slice(eq + 1).split(',');
        if (key === 'Country') {
          state.country = values;
        } else if (key === 'Language') {
          state.language = values;
        } else {
          throw unexpectedToken(lineNumber, line, token, `unknown option \`${key}\``);
        }
        cursor++;
        break;
      }
    }
  }

  return createRule({
    ...state,
    params: state.params ? Object.fromEntries(state.params) : null,
    line: lineNumber,
  });
}

/**
 * Digits beyond the safe integer range cannot be stored exactly and are rejected.
 */
function toStatus(digits: string, lineNumber: number, line: string, token: string): number {
  const value = Number.parseInt(digits, 10);
  if (!Number.isSafeInteger(value)) {
    throw unexpectedToken(lineNumber, line, token);
  }
  // -0 and 0 are the same status
  return value === 0 ? 0 : value;
}

function addParam(params: Map<string, ParamValue>, token: string): void {
  const eq = token.indexOf('=');
  if (eq === -1) {
    params.set(token, true);
  } else {
    params.set(token.slice(0, eq), token.slice(eq + 1));
  }
}

/**
 * `from` and `to` must look like a path or an absolute http(s) URL.
 */
function checkPath(token: string, lineNumber: number, line: string): void {
  if (INTEGER_PATTERN.test(token)) {
    throw unexpectedToken(lineNumber, line, token, 'numbers not allowed');
  }
  if (token.includes('=')) {
    throw unexpectedToken(lineNumber, line, token, '`=` not allowed');
  }
  if (token.endsWith('!')) {
    throw unexpectedToken(lineNumber, line, token, '`!` not allowed');
  }
  if (!PATH_PREFIXES.some((prefix) => token.startsWith(prefix))) {
    throw unexpectedToken(
      lineNumber,
      line,
      token,
      'path must start with `/`, `http://`, or `https://`',
    );
  }
}
