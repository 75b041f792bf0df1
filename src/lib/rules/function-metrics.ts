import type { Suggestion, SyntaxTree } from '../../shared/types.js';
import { BaseAnalysisRule, DEFAULT_THRESHOLDS } from './base.js';
import { functionDefinitions, lastLine, nameOf, positionOf, walk, type SyntaxNode } from './syntax.js';

// Each of these adds one independent path through a function.
const BRANCH_TYPES: ReadonlySet<string> = new Set([
  'if_statement',
  'elif_clause',
  'for_statement',
  'while_statement',
  'with_statement',
  'try_statement',
  'for_in_clause',
  'except_clause',
  'except_group_clause'
]);

/**
 * `a and b and c` is one operator with three operands, though the grammar
 * nests it; only the outermost link of a same-operator chain counts.
 */
function isBooleanChainHead(node: SyntaxNode): boolean {
  const parent = node.parent;
  if (!parent || parent.type !== 'boolean_operator') return true;
  const operator = (n: SyntaxNode) => n.childForFieldName('operator')?.type;
  return parent.childForFieldName('left')?.id !== node.id || operator(parent) !== operator(node);
}

/**
 * Cyclomatic complexity over the whole function subtree, nested
 * functions included: one plus the number of branching constructs.
 */
export function cyclomaticComplexity(fn: SyntaxNode): number {
  let complexity = 1;
  for (const node of walk(fn)) {
    if (BRANCH_TYPES.has(node.type)) complexity++;
    else if (node.type === 'boolean_operator' && isBooleanChainHead(node)) complexity++;
  }
  return complexity;
}

export function functionLength(fn: SyntaxNode): number {
  return lastLine(fn) - positionOf(fn).line + 1;
}

export class HighComplexityRule extends BaseAnalysisRule {
  readonly id = 'high_cyclomatic_complexity';
  readonly description = 'Functions whose cyclomatic complexity exceeds the configured maximum';
  protected readonly severity = 'warning';

  constructor(private readonly maxComplexity = DEFAULT_THRESHOLDS.maxComplexity) {
    super();
  }

  evaluate(tree: SyntaxTree): Suggestion[] {
    const suggestions: Suggestion[] = [];
    for (const fn of functionDefinitions(tree.rootNode)) {
      const complexity = cyclomaticComplexity(fn);
      if (complexity > this.maxComplexity) {
        suggestions.push(this.suggest(
          fn,
          `Function '${nameOf(fn)}' has cyclomatic complexity ${complexity} (recommended maximum: ${this.maxComplexity}).`,
          { complexity }
        ));
      }
    }
    return suggestions;
  }
}

export class LongFunctionRule extends BaseAnalysisRule {
  readonly id = 'long_function';
  readonly description = 'Functions longer than the configured number of lines';
  protected readonly severity = 'warning';

  constructor(private readonly maxFunctionLength = DEFAULT_THRESHOLDS.maxFunctionLength) {
    super();
  }

  evaluate(tree: SyntaxTree): Suggestion[] {
    const suggestions: Suggestion[] = [];
    for (const fn of functionDefinitions(tree.rootNode)) {
      const length = functionLength(fn);
      if (length > this.maxFunctionLength) {
        suggestions.push(this.suggest(
          fn,
          `Function '${nameOf(fn)}' is ${length} lines long (recommended maximum: ${this.maxFunctionLength}).`,
          { length }
        ));
      }
    }
    return suggestions;
  }
}
