import type { RedirectsParseError } from '../redirects/errors.js';
import { isProxy, isRewrite } from '../redirects/rule.js';
import type { LintWarning, Rule } from '../redirects/types.js';
import { color, icon } from '../ui/theme.js';
import {
  step,
  lastSub,
  treeItem,
  success,
  error,
  warn,
  filePath,
  secondary,
  tertiary,
  treeCont,
  shortPath,
} from '../ui/format.js';
import { buildBanner } from '../ui/banner.js';

export type RuleKind = 'proxy' | 'rewrite' | 'redirect';

export function ruleKind(rule: Rule): RuleKind {
  if (isProxy(rule)) return 'proxy';
  if (isRewrite(rule)) return 'rewrite';
  return 'redirect';
}

/**
 * One-line summary of a rule, e.g. `/app/* → /index.html 200!`.
 */
export function describeRule(rule: Rule): string {
  const parts = [rule.from];

  if (rule.params) {
    for (const [key, value] of Object.entries(rule.params)) {
      parts.push(value === true ? key : `${key}=${value}`);
    }
  }

  parts.push(icon.arrow, rule.to, `${rule.status}${rule.force ? '!' : ''}`);

  if (rule.country) parts.push(`Country=${rule.country.join(',')}`);
  if (rule.language) parts.push(`Language=${rule.language.join(',')}`);

  return parts.join(' ');
}

const KIND_COLORS: Record<RuleKind, (text: string) => string> = {
  proxy: color.proxy,
  rewrite: color.rewrite,
  redirect: color.redirect,
};

export function printBanner(commandLabel: string, source: string | null): void {
  const rows = { File: source ? filePath(shortPath(source)) : secondary('<stdin>') };
  for (const line of buildBanner(commandLabel, rows)) {
    console.log(line);
  }
  console.log();
}

export function printRulesOverview(rules: readonly Rule[]): void {
  if (rules.length === 0) {
    console.log(secondary('No rules found. The file only has blank lines or comments.'));
    console.log();
    return;
  }

  console.log(step(`Rules: ${rules.length}`));
  rules.forEach((rule, i) => {
    const kind = ruleKind(rule);
    const label = KIND_COLORS[kind](kind.padEnd(8));
    const lineRef = tertiary(`[L${rule.line}]`.padEnd(6));
    console.log(treeItem(`${lineRef} ${label} ${describeRule(rule)}`, i, rules.length));
  });
  console.log();

  const counts = { redirect: 0, rewrite: 0, proxy: 0 };
  for (const rule of rules) counts[ruleKind(rule)]++;
  const forced = rules.filter((r) => r.force).length;

  console.log(step('Stats'));
  console.log(
    lastSub(
      `${color.bold(String(counts.redirect))} redirects, ${color.bold(String(counts.rewrite))} rewrites, ${color.bold(String(counts.proxy))} proxies, ${color.bold(String(forced))} forced`,
    ),
  );
  console.log();
}

export function printLintWarnings(warnings: readonly LintWarning[]): void {
  if (warnings.length === 0) {
    console.log(success('No warnings'));
    return;
  }

  console.log(step(`Warnings: ${warnings.length}`));
  warnings.forEach((w, i) => {
    console.log(treeItem(`${tertiary(`[L${w.lineNumber}]`)} ${warn(w.message)} ${tertiary(`(${w.code})`)}`, i, warnings.length));
  });
  console.log();
}

export function printParseFailure(err: RedirectsParseError, source: string | null): void {
  const where = source ? `${shortPath(source)}:${err.lineNumber}` : `<stdin>:${err.lineNumber}`;
  console.log(error(`Failed to parse ${where}`));
  console.log(treeCont(secondary(err.line)));
  console.log(lastSub(err.reason));
}

export function printError(message: string): void {
  console.log(error(message));
}

export function printVerbose(message: string): void {
  console.log(treeCont(tertiary(message)));
}
