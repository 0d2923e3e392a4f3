import { describe, it, expect } from 'vitest';
import * as redirects from '../index.js';

describe('package entry', () => {
  it('parses and queries rules through the public API', () => {
    const [rule] = redirects.parseString('/articles id=:id /posts/:id 200!');
    expect(redirects.isRewrite(rule)).toBe(true);
    expect(redirects.isProxy(rule)).toBe(false);
    expect(redirects.getParam(rule.params, 'id')).toBe(':id');
    expect(redirects.lintRules([rule])).toEqual([]);
  });

  it('exposes the error type for instanceof checks', () => {
    expect(() => redirects.parseString('/only')).toThrow(redirects.RedirectsParseError);
  });
});
