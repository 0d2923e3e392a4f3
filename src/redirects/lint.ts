import type { LintWarning, Rule } from './types.js';

const PLACEHOLDER_PATTERN = /:([A-Za-z_]\w*)/g;

/**
 * Collect non-fatal observations about a parsed rule list.
 * Warnings come back in line order.
 */
export function lintRules(rules: readonly Rule[]): LintWarning[] {
  const warnings: LintWarning[] = [];
  const seen = new Map<string, Rule>();

  for (const rule of rules) {
    const key = conditionKey(rule);
    const earlier = seen.get(key);
    if (earlier) {
      warnings.push({
        lineNumber: rule.line,
        code: 'duplicate-from',
        message: `${rule.from} is already matched on line ${earlier.line}; this rule is never reached`,
      });
    } else {
      seen.set(key, rule);
    }

    if (rule.status < 100 || rule.status > 599) {
      warnings.push({
        lineNumber: rule.line,
        code: 'unknown-status',
        message: `status ${rule.status} is not an HTTP status code`,
      });
    }

    const bound = boundPlaceholders(rule);
    for (const name of placeholders(rule.to)) {
      if (!bound.has(name)) {
        warnings.push({
          lineNumber: rule.line,
          code: 'unresolved-placeholder',
          message: name === 'splat'
            ? `${rule.to} uses :splat but ${rule.from} has no *`
            : `${rule.to} uses :${name}, which ${rule.from} never binds`,
        });
      }
    }
  }

  return warnings;
}

function conditionKey(rule: Rule): string {
  return JSON.stringify([rule.from, rule.country, rule.language]);
}

/**
 * Placeholders come from `:name` segments of the source path, from
 * parameter values such as `id=:id`, and `:splat` from a trailing `*`.
 */
function boundPlaceholders(rule: Rule): Set<string> {
  const bound = new Set(placeholders(rule.from));
  if (rule.from.includes('*')) bound.add('splat');
  if (rule.params) {
    for (const value of Object.values(rule.params)) {
      if (typeof value === 'string') {
        for (const name of placeholders(value)) bound.add(name);
      }
    }
  }
  return bound;
}

function placeholders(text: string): string[] {
  return [...text.matchAll(PLACEHOLDER_PATTERN)].map((m) => m[1]);
}
