import type { Suggestion, SyntaxTree } from '../../shared/types.js';
import { BaseAnalysisRule } from './base.js';
import {
  comesBefore,
  functionDefinitions,
  isLoad,
  storedNames,
  walk,
  walkScope,
  withTarget,
  type SyntaxNode
} from './syntax.js';

export class UnusedVariableRule extends BaseAnalysisRule {
  readonly id = 'unused_variable';
  readonly description = 'Local variables that are assigned but never read';
  protected readonly severity = 'info';

  evaluate(tree: SyntaxTree): Suggestion[] {
    return functionDefinitions(tree.rootNode).flatMap(fn => this.evaluateFunction(fn));
  }

  private evaluateFunction(fn: SyntaxNode): Suggestion[] {
    const declared = new Set<string>();
    const firstBinding = new Map<string, SyntaxNode>();

    for (const node of walkScope(fn)) {
      if (node.type === 'global_statement' || node.type === 'nonlocal_statement') {
        node.namedChildren.forEach(name => declared.add(name.text));
        continue;
      }
      for (const name of bindingNames(node)) {
        const id = name.text;
        if (id.startsWith('_')) continue;
        const previous = firstBinding.get(id);
        if (!previous || comesBefore(name, previous)) firstBinding.set(id, name);
      }
    }

    if (firstBinding.size === 0) return [];

    // Reads anywhere below the function count, closures included.
    const loaded = new Set<string>();
    for (const node of walk(fn)) {
      if (node.type === 'identifier' && isLoad(node)) loaded.add(node.text);
    }

    const suggestions: Suggestion[] = [];
    for (const [id, name] of firstBinding) {
      if (declared.has(id) || loaded.has(id)) continue;
      suggestions.push(this.suggest(name, `Variable '${id}' is assigned but never used.`, { symbol: id }));
    }
    return suggestions;
  }
}

/** Plain names bound by an assignment-like node. */
function bindingNames(node: SyntaxNode): SyntaxNode[] {
  switch (node.type) {
    case 'assignment': {
      // An annotation without a value binds nothing
      const left = node.childForFieldName('left');
      return left && node.childForFieldName('right') ? storedNames(left) : [];
    }
    case 'augmented_assignment':
    case 'for_statement':
    case 'for_in_clause': {
      const left = node.childForFieldName('left');
      return left ? storedNames(left) : [];
    }
    case 'named_expression': {
      const name = node.childForFieldName('name');
      return name ? [name] : [];
    }
    case 'with_item': {
      const target = withTarget(node);
      return target ? storedNames(target) : [];
    }
    default:
      return [];
  }
}
