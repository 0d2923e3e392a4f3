import { brand, color, box } from './theme.js';
import { stripAnsi } from './format.js';
import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);
const { version: VERSION } = require('../../package.json') as { version: string };

export { VERSION };

/**
 * Build the startup banner as an array of lines.
 *
 *   ╭─── redirects-lint v0.1.0 · Check ───────────────────────╮
 *   │                                                          │
 *   │  File: ~/site/public/_redirects                          │
 *   │                                                          │
 *   ╰──────────────────────────────────────────────────────────╯
 */
export function buildBanner(commandLabel: string, rows: Record<string, string> = {}): string[] {
  const name = `redirects-lint v${VERSION}`;
  const titleWidth = `${name} · ${commandLabel}`.length + 5;

  const contentLines = Object.entries(rows).map(
    ([key, value]) => `${color.secondary(key + ':')} ${value}`,
  );
  const contentWidths = contentLines.map((l) => stripAnsi(l).length + 2);
  const innerWidth = Math.max(60, titleWidth + 4, ...contentWidths);

  const lines: string[] = [];
  lines.push(
    color.tertiary(box.tl + box.h.repeat(3) + ' ') +
      brand.teal(name) +
      color.tertiary(' · ') +
      color.bold(commandLabel) +
      color.tertiary(' ' + box.h.repeat(Math.max(0, innerWidth - titleWidth)) + box.tr),
  );

  if (contentLines.length > 0) {
    const emptyRow = color.tertiary(box.v) + ' '.repeat(innerWidth) + color.tertiary(box.v);
    lines.push(emptyRow);
    for (const line of contentLines) {
      const pad = Math.max(0, innerWidth - stripAnsi(line).length - 2);
      lines.push(color.tertiary(box.v) + `  ${line}${' '.repeat(pad)}` + color.tertiary(box.v));
    }
    lines.push(emptyRow);
  }

  lines.push(color.tertiary(box.bl + box.h.repeat(innerWidth) + box.br));
  return lines;
}
