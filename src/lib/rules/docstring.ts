import type { Suggestion, SyntaxTree } from '../../shared/types.js';
import { BaseAnalysisRule } from './base.js';
import { functionDefinitions, nameOf, stringValue, type SyntaxNode } from './syntax.js';

export function hasDocstring(fn: SyntaxNode): boolean {
  const body = fn.childForFieldName('body');
  const first = body?.namedChildren.find(stmt => stmt.type !== 'comment');
  if (!first || first.type !== 'expression_statement') return false;
  const parts = first.namedChildren.filter(part => part.type !== 'comment');
  const text = parts.length === 1 ? stringValue(parts[0]) : null;
  return text !== null && text.trim() !== '';
}

export class MissingDocstringRule extends BaseAnalysisRule {
  readonly id = 'missing_docstring';
  readonly description = 'Public functions without a docstring';
  protected readonly severity = 'info';

  evaluate(tree: SyntaxTree): Suggestion[] {
    return functionDefinitions(tree.rootNode)
      .filter(fn => !nameOf(fn).startsWith('_') && !hasDocstring(fn))
      .map(fn => {
        const name = nameOf(fn);
        return this.suggest(fn, `Function '${name}' should have a docstring.`, { function: name });
      });
  }
}
