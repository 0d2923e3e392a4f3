import type { ParseErrorKind } from './types.js';

export const EXPECTED_FORMAT =
  '`from [k=v ...] to [status][!] [Country=..] [Language=..]`';

/**
 * Raised for the first line of a redirects file that cannot be parsed.
 * The whole parse is aborted; no partial rule list is returned.
 */
export class RedirectsParseError extends Error {
  constructor(
    readonly kind: ParseErrorKind,
    readonly lineNumber: number,
    readonly line: string,
    readonly token: string | null,
    readonly reason: string,
  ) {
    super(`line ${lineNumber}: ${reason}`);
    this.name = 'RedirectsParseError';
  }
}

export function missingDestination(lineNumber: number, line: string): RedirectsParseError {
  return new RedirectsParseError(
    'structural',
    lineNumber,
    line,
    null,
    `missing destination path: ${JSON.stringify(line)}`,
  );
}

export function unexpectedToken(
  lineNumber: number,
  line: string,
  token: string,
  prefix?: string,
): RedirectsParseError {
  const detail = `got: ${token}, was expecting format ${EXPECTED_FORMAT}`;
  return new RedirectsParseError(
    'grammar',
    lineNumber,
    line,
    token,
    prefix ? `${prefix}. ${capitalize(detail)}` : detail,
  );
}

export function missingTo(lineNumber: number, line: string): RedirectsParseError {
  return new RedirectsParseError(
    'grammar',
    lineNumber,
    line,
    null,
    `missing \`to\` field, was expecting format ${EXPECTED_FORMAT}`,
  );
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
