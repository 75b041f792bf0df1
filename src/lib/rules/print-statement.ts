import type { Suggestion, SyntaxTree } from '../../shared/types.js';
import { BaseAnalysisRule } from './base.js';
import { walk } from './syntax.js';

export class PrintStatementRule extends BaseAnalysisRule {
  readonly id = 'print_statement';
  readonly description = 'Calls to print() that should go through logging';
  protected readonly severity = 'info';

  evaluate(tree: SyntaxTree): Suggestion[] {
    const suggestions: Suggestion[] = [];
    for (const node of walk(tree.rootNode)) {
      if (node.type !== 'call') continue;
      const callee = node.childForFieldName('function');
      if (callee?.type === 'identifier' && callee.text === 'print') {
        suggestions.push(this.suggest(node, 'Consider using logging instead of print for production output.'));
      }
    }
    return suggestions;
  }
}
