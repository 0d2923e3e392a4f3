// === Rule ===

export type ParamValue = string | true;

export type Params = Readonly<Record<string, ParamValue>>;

export interface Rule {
  readonly from: string;
  readonly to: string;
  readonly status: number;
  readonly force: boolean;
  readonly params: Params | null;
  readonly country: readonly string[] | null;
  readonly language: readonly string[] | null;
  readonly line: number;
}

export type RuleInit = Pick<Rule, 'from' | 'to'> & Partial<Omit<Rule, 'from' | 'to'>>;

// === Parse results ===

export type ParseErrorKind = 'structural' | 'grammar';

// === Lint ===

export type LintCode =
  | 'duplicate-from'
  | 'unresolved-placeholder'
  | 'unknown-status';

export interface LintWarning {
  lineNumber: number;
  code: LintCode;
  message: string;
}
