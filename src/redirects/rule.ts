import type { ParamValue, Params, Rule, RuleInit } from './types.js';

export const DEFAULT_STATUS = 301;

/**
 * Build a frozen Rule, filling in the defaults for anything left out.
 */
export function createRule(init: RuleInit): Rule {
  return Object.freeze({
    from: init.from,
    to: init.to,
    status: init.status ?? DEFAULT_STATUS,
    force: init.force ?? false,
    params: init.params ? Object.freeze({ ...init.params }) : null,
    country: init.country ? Object.freeze([...init.country]) : null,
    language: init.language ? Object.freeze([...init.language]) : null,
    line: init.line ?? 0,
  });
}

/**
 * A rewrite serves the destination without changing the visible URL.
 */
export function isRewrite(rule: Rule): boolean {
  return rule.status === 200;
}

/**
 * A proxy rule points at an absolute URL with a host.
 * Protocol-relative destinations (`//host/path`) carry a host too.
 */
export function isProxy(rule: Rule): boolean {
  const target = rule.to.startsWith('//') ? `http:${rule.to}` : rule.to;
  try {
    return new URL(target).host !== '';
  } catch {
    return false;
  }
}

export function hasParam(params: Params | null, key: string): boolean {
  if (!params) return false;
  return Object.hasOwn(params, key);
}

export function getParam(params: Params | null, key: string): ParamValue | undefined {
  if (!params || !Object.hasOwn(params, key)) return undefined;
  return params[key];
}
