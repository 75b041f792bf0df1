import type {
  AnalysisRule,
  RuleEvaluation,
  RuleFault,
  RuleInfo,
  Suggestion,
  SyntaxTree
} from './types.js';
import { RuleEvaluationError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

/**
 * Runs every registered rule over a tree. Output is grouped by rule in
 * registration order; within a rule, suggestions are ordered by position.
 */
export class RuleEngine {
  private readonly rules: readonly AnalysisRule[];

  constructor(
    rules: readonly AnalysisRule[],
    private readonly logger: Logger = silentLogger
  ) {
    const seen = new Set<string>();
    for (const rule of rules) {
      if (seen.has(rule.id)) {
        throw new Error(`Duplicate rule id "${rule.id}"`);
      }
      seen.add(rule.id);
    }
    this.rules = [...rules];
  }

  get size(): number {
    return this.rules.length;
  }

  listRules(): RuleInfo[] {
    return this.rules.map(rule => ({ id: rule.id, description: rule.description }));
  }

  evaluate(tree: SyntaxTree): RuleEvaluation {
    const suggestions: Suggestion[] = [];
    const faults: RuleFault[] = [];

    for (const rule of this.rules) {
      try {
        suggestions.push(...sortByPosition(rule.evaluate(tree)));
      } catch (error) {
        // A failing rule contributes nothing; the rest still run.
        const fault = new RuleEvaluationError(rule.id, error);
        this.logger.warn(`⚠️ ${fault.message}`, { ruleId: rule.id, correlationId: fault.correlationId });
        faults.push({ ruleId: rule.id, message: fault.message });
      }
    }

    return { suggestions, faults };
  }
}

/** Ascending line, then column; entries without a position go last. Stable. */
export function sortByPosition(suggestions: readonly Suggestion[]): Suggestion[] {
  return suggestions
    .map((suggestion, index) => ({ suggestion, index }))
    .sort((a, b) =>
      compareNullable(a.suggestion.line, b.suggestion.line) ||
      compareNullable(a.suggestion.column, b.suggestion.column) ||
      a.index - b.index
    )
    .map(entry => entry.suggestion);
}

function compareNullable(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a - b;
}
