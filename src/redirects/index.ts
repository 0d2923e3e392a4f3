export { parse, parseFile, parseLines, parseString, safeParseString } from './parser.js';
export type { ParseResult } from './parser.js';
export { parseLine } from './tokenizer.js';
export { createRule, getParam, hasParam, isProxy, isRewrite, DEFAULT_STATUS } from './rule.js';
export { RedirectsParseError, EXPECTED_FORMAT } from './errors.js';
export { serializeRules, toJSON } from './serialize.js';
export type { RuleJSON } from './serialize.js';
export { lintRules } from './lint.js';
export type {
  LintCode,
  LintWarning,
  ParamValue,
  Params,
  ParseErrorKind,
  Rule,
  RuleInit,
} from './types.js';
