import type { Suggestion, SyntaxTree } from '../../shared/types.js';
import { BaseAnalysisRule } from './base.js';
import { isLoad, stringValue, walk, type SyntaxNode } from './syntax.js';

interface ImportBinding {
  at: SyntaxNode;
  /** Name introduced into the module namespace. */
  bound: string;
  symbol: string;
}

export class UnusedImportRule extends BaseAnalysisRule {
  readonly id = 'unused_import';
  readonly description = 'Imported names that are never used';
  protected readonly severity = 'warning';

  evaluate(tree: SyntaxTree): Suggestion[] {
    const root = tree.rootNode;
    const bindings = collectImports(root);
    if (bindings.length === 0) return [];

    const used = new Set<string>(exportedNames(root));
    for (const node of walk(root)) {
      if (node.type === 'identifier' && isLoad(node)) used.add(node.text);
    }

    return bindings
      .filter(binding => !used.has(binding.bound))
      .map(binding => this.suggest(
        binding.at,
        `Import '${binding.symbol}' is never used.`,
        { symbol: binding.symbol }
      ));
  }
}

function collectImports(root: SyntaxNode): ImportBinding[] {
  const bindings: ImportBinding[] = [];
  for (const node of walk(root)) {
    if (node.type === 'import_statement') {
      for (const name of node.childrenForFieldName('name')) {
        const alias = name.type === 'aliased_import' ? name.childForFieldName('alias') : null;
        const dotted = name.type === 'aliased_import' ? name.childForFieldName('name') : name;
        const bound = alias?.text ?? dotted?.namedChildren[0]?.text ?? name.text;
        bindings.push({ at: name, bound, symbol: bound });
      }
    } else if (node.type === 'import_from_statement') {
      const module = (node.childForFieldName('module_name')?.text ?? '').replace(/^\.+/, '');
      if (module === '__future__') continue;
      for (const name of node.childrenForFieldName('name')) {
        const alias = name.type === 'aliased_import' ? name.childForFieldName('alias') : null;
        const imported = name.type === 'aliased_import' ? name.childForFieldName('name') : name;
        const bound = alias?.text ?? imported?.text ?? name.text;
        bindings.push({ at: name, bound, symbol: module ? `${module}.${bound}` : bound });
      }
    }
  }
  return bindings;
}

/** String entries of a module-level `__all__ = [...]` or `(...)`. */
function exportedNames(root: SyntaxNode): string[] {
  const names: string[] = [];
  for (const stmt of root.namedChildren) {
    if (stmt.type !== 'expression_statement') continue;
    const assignment = stmt.namedChildren[0];
    if (assignment?.type !== 'assignment') continue;
    if (assignment.childForFieldName('left')?.text !== '__all__') continue;
    const value = assignment.childForFieldName('right');
    if (!value || (value.type !== 'list' && value.type !== 'tuple')) continue;
    for (const element of value.namedChildren) {
      const text = stringValue(element);
      if (text !== null) names.push(text);
    }
  }
  return names;
}
