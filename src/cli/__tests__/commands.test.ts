import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Readable } from 'node:stream';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runCheck, runParse } from '../commands.js';
import { resolveInput } from '../input.js';
import type { CLIOptions } from '../args.js';
import { stripAnsi } from '../../ui/format.js';

// ---------------------------------------------------------------------------
// Setup / Teardown
// ---------------------------------------------------------------------------

let tempDir: string;
let output: string[];

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'redirects-cli-'));
  output = [];
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    output.push(stripAnsi(args.map(String).join(' ')));
  });
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(tempDir, { recursive: true, force: true });
});

function options(overrides: Partial<CLIOptions>): CLIOptions {
  return {
    command: 'check',
    file: undefined,
    format: 'text',
    verbose: false,
    strict: false,
    ...overrides,
  };
}

async function writeRedirects(content: string): Promise<string> {
  const file = join(tempDir, '_redirects');
  await writeFile(file, content);
  return file;
}

// ---------------------------------------------------------------------------
// resolveInput
// ---------------------------------------------------------------------------

describe('resolveInput', () => {
  it('missing argument and - mean stdin', async () => {
    expect(await resolveInput(undefined)).toEqual({ kind: 'stdin', path: null });
    expect(await resolveInput('-')).toEqual({ kind: 'stdin', path: null });
  });

  it('a directory resolves to its _redirects file', async () => {
    const file = await writeRedirects('/a /b\n');
    expect(await resolveInput(tempDir)).toEqual({ kind: 'file', path: file });
  });

  it('a missing file is a usage error', async () => {
    await expect(resolveInput(join(tempDir, 'nope'))).rejects.toThrow(
      `No _redirects file found at ${join(tempDir, 'nope')}`,
    );
  });
});

// ---------------------------------------------------------------------------
// parse
// ---------------------------------------------------------------------------

describe('runParse', () => {
  it('prints the rules as JSON', async () => {
    const file = await writeRedirects('/home /\n/app/* /app/index.html 200!\n');
    const code = await runParse(options({ command: 'parse', file }));

    expect(code).toBe(0);
    expect(output).toHaveLength(1);
    expect(JSON.parse(output[0])).toEqual([
      { From: '/home', To: '/', Status: 301, Force: false, Params: null, Country: null, Language: null },
      { From: '/app/*', To: '/app/index.html', Status: 200, Force: true, Params: null, Country: null, Language: null },
    ]);
  });

  it('reads stdin', async () => {
    const code = await runParse(
      options({ command: 'parse', file: '-' }),
      Readable.from(['/a /b 302\n']),
    );
    expect(code).toBe(0);
    expect(JSON.parse(output[0])).toEqual([
      { From: '/a', To: '/b', Status: 302, Force: false, Params: null, Country: null, Language: null },
    ]);
  });

  it('prints a JSON error and exits 1 on a bad line', async () => {
    const file = await writeRedirects('/ok /fine\n/broken\n');
    const code = await runParse(options({ command: 'parse', file }));

    expect(code).toBe(1);
    expect(JSON.parse(output[0])).toEqual({
      error: {
        kind: 'structural',
        lineNumber: 2,
        line: '/broken',
        token: null,
        message: 'missing destination path: "/broken"',
      },
    });
  });
});

// ---------------------------------------------------------------------------
// check
// ---------------------------------------------------------------------------

describe('runCheck', () => {
  it('prints an overview of each rule', async () => {
    const file = await writeRedirects(
      '/home /\n/spa/* /index.html 200\n/api/* https://api.example.com/:splat 200!\n',
    );
    const code = await runCheck(options({ file }));

    expect(code).toBe(0);
    expect(output).toContain('● Rules: 3');
    expect(output).toContain('  ├─ [L1]   redirect /home → / 301');
    expect(output).toContain('  ├─ [L2]   rewrite  /spa/* → /index.html 200');
    expect(output).toContain('  └─ [L3]   proxy    /api/* → https://api.example.com/:splat 200!');
    expect(output).toContain('  └─ 1 redirects, 1 rewrites, 1 proxies, 1 forced');
    expect(output).toContain('✓ No warnings');
  });

  it('lists lint warnings and fails under --strict', async () => {
    const file = await writeRedirects('/a /b\n/a /c\n');
    const code = await runCheck(options({ file, strict: true }));

    expect(code).toBe(1);
    expect(output).toContain('● Warnings: 1');
    expect(output).toContain(
      '  └─ [L2] ⚠ /a is already matched on line 1; this rule is never reached (duplicate-from)',
    );
  });

  it('warnings alone do not fail without --strict', async () => {
    const file = await writeRedirects('/a /b\n/a /c\n');
    expect(await runCheck(options({ file }))).toBe(0);
  });

  it('prints the failing line and reason', async () => {
    const file = await writeRedirects('/a /b\n/c /d bogus\n');
    const code = await runCheck(options({ file }));

    expect(code).toBe(1);
    const failure = output.findIndex((l) => l.startsWith('✗ Failed to parse '));
    expect(failure).toBeGreaterThan(-1);
    expect(output[failure].endsWith('_redirects:2')).toBe(true);
    expect(output[failure + 1]).toBe('  │  /c /d bogus');
    expect(output[failure + 2].startsWith('  └─ got: bogus, was expecting format')).toBe(true);
  });

  it('json format prints rules and warnings together', async () => {
    const file = await writeRedirects('/old /new/:splat 302\n');
    const code = await runCheck(options({ file, format: 'json' }));

    expect(code).toBe(0);
    expect(output).toHaveLength(1);
    expect(JSON.parse(output[0])).toEqual({
      rules: [
        { From: '/old', To: '/new/:splat', Status: 302, Force: false, Params: null, Country: null, Language: null },
      ],
      warnings: [
        {
          lineNumber: 1,
          code: 'unresolved-placeholder',
          message: '/new/:splat uses :splat but /old has no *',
        },
      ],
    });
  });

  it('says so when the file has no rules', async () => {
    const file = await writeRedirects('# nothing yet\n');
    await runCheck(options({ file }));
    expect(output).toContain('No rules found. The file only has blank lines or comments.');
  });
});
