import type { AnalysisRule } from '../../shared/types.js';
import { DEFAULT_THRESHOLDS, type RuleThresholds } from './base.js';
import { MissingDocstringRule } from './docstring.js';
import { HighComplexityRule, LongFunctionRule } from './function-metrics.js';
import { NamingConventionRule } from './naming.js';
import { PrintStatementRule } from './print-statement.js';
import { UnusedImportRule } from './unused-import.js';
import { UnusedVariableRule } from './unused-variable.js';

export interface RuleSetOptions extends Partial<RuleThresholds> {
  /** Rule ids to leave out; unknown ids are ignored. */
  disabled?: readonly string[];
}

/**
 * The canonical rules in registration order. Suggestion order in every
 * analysis follows this order, so it is part of the output contract.
 */
export function createRuleSet(options: RuleSetOptions = {}): AnalysisRule[] {
  const maxComplexity = options.maxComplexity ?? DEFAULT_THRESHOLDS.maxComplexity;
  const maxFunctionLength = options.maxFunctionLength ?? DEFAULT_THRESHOLDS.maxFunctionLength;
  const disabled = new Set(options.disabled ?? []);

  const rules: AnalysisRule[] = [
    new UnusedImportRule(),
    new UnusedVariableRule(),
    new HighComplexityRule(maxComplexity),
    new LongFunctionRule(maxFunctionLength),
    new MissingDocstringRule(),
    new NamingConventionRule(),
    new PrintStatementRule()
  ];

  return rules.filter(rule => !disabled.has(rule.id));
}

export const CANONICAL_RULE_IDS = [
  'unused_import',
  'unused_variable',
  'high_cyclomatic_complexity',
  'long_function',
  'missing_docstring',
  'naming_conventions',
  'print_statement'
] as const;

export { BaseAnalysisRule, DEFAULT_THRESHOLDS, type RuleThresholds } from './base.js';
export { cyclomaticComplexity, functionLength } from './function-metrics.js';
export {
  HighComplexityRule,
  LongFunctionRule,
  MissingDocstringRule,
  NamingConventionRule,
  PrintStatementRule,
  UnusedImportRule,
  UnusedVariableRule
};
