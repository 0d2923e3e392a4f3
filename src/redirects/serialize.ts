import type { Params, Rule } from './types.js';

export interface RuleJSON {
  From: string;
  To: string;
  Status: number;
  Force: boolean;
  Params: Params | null;
  Country: readonly string[] | null;
  Language: readonly string[] | null;
}

// Absent optionals stay null so consumers can tell "never mentioned" from "empty".
export function toJSON(rule: Rule): RuleJSON {
  return {
    From: rule.from,
    To: rule.to,
    Status: rule.status,
    Force: rule.force,
    Params: rule.params,
    Country: rule.country,
    Language: rule.language,
  };
}

export function serializeRules(rules: readonly Rule[], indent = 2): string {
  return JSON.stringify(rules.map(toJSON), null, indent);
}
