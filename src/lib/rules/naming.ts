import type { Suggestion, SyntaxTree } from '../../shared/types.js';
import { BaseAnalysisRule } from './base.js';
import { nameOf, type SyntaxNode } from './syntax.js';

const SNAKE_CASE = /^[a-z_][a-z0-9_]*$/;
const UPPER_SNAKE_CASE = /^[A-Z_][A-Z0-9_]*$/;

/**
 * PEP 8 names for functions and plain assignment targets. Outside any
 * function or lambda, UPPER_SNAKE_CASE names are module or class constants
 * and pass; inside one they must be snake_case.
 */
export class NamingConventionRule extends BaseAnalysisRule {
  readonly id = 'naming_conventions';
  readonly description = 'Function and variable names that are not snake_case';
  protected readonly severity = 'info';

  evaluate(tree: SyntaxTree): Suggestion[] {
    const suggestions: Suggestion[] = [];
    const stack: Array<{ node: SyntaxNode; insideFunction: boolean }> = [
      { node: tree.rootNode, insideFunction: false }
    ];

    // Pre-order, so output follows source order before the engine sorts it.
    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) break;
      const { node, insideFunction } = entry;

      if (node.type === 'function_definition') {
        const name = nameOf(node);
        if (!SNAKE_CASE.test(name)) {
          suggestions.push(this.suggest(
            node,
            `Function '${name}' should follow PEP 8 naming (snake_case).`,
            { name },
            'function_naming'
          ));
        }
      } else if (node.type === 'assignment' && !node.childForFieldName('type')) {
        const target = node.childForFieldName('left');
        if (target?.type === 'identifier') this.checkVariable(target, insideFunction, suggestions);
      }

      const nested = insideFunction || node.type === 'function_definition' || node.type === 'lambda';
      const children = node.namedChildren;
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ node: children[i], insideFunction: nested });
      }
    }

    return suggestions;
  }

  private checkVariable(target: SyntaxNode, insideFunction: boolean, out: Suggestion[]): void {
    const name = target.text;
    if (name.startsWith('_') || SNAKE_CASE.test(name)) return;
    if (!insideFunction && UPPER_SNAKE_CASE.test(name)) return;
    out.push(this.suggest(
      target,
      `Variable '${name}' should follow PEP 8 naming (snake_case).`,
      { name },
      'variable_naming'
    ));
  }
}
