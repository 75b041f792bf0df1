import type { AnalysisRule, Severity, Suggestion, SyntaxTree } from '../../shared/types.js';
import { positionOf, type SyntaxNode } from './syntax.js';

export interface RuleThresholds {
  maxFunctionLength: number;
  maxComplexity: number;
}

export const DEFAULT_THRESHOLDS: RuleThresholds = {
  maxFunctionLength: 50,
  maxComplexity: 10
};

export abstract class BaseAnalysisRule implements AnalysisRule {
  abstract readonly id: string;
  abstract readonly description: string;
  protected abstract readonly severity: Severity;

  abstract evaluate(tree: SyntaxTree): Suggestion[];

  protected suggest(
    at: SyntaxNode,
    message: string,
    metadata: Record<string, unknown> = {},
    ruleId: string = this.id
  ): Suggestion {
    const { line, column } = positionOf(at);
    return { ruleId, message, severity: this.severity, line, column, metadata };
  }
}
