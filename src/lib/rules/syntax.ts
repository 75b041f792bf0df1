import type Parser from 'web-tree-sitter';

export type SyntaxNode = Parser.SyntaxNode;

const SCOPE_TYPES = new Set(['function_definition', 'class_definition', 'lambda']);

// Nodes a target name can sit in and still be a plain binding
const PATTERN_TYPES = new Set([
  'pattern_list',
  'tuple_pattern',
  'list_pattern',
  'list_splat_pattern',
  'tuple',
  'list',
  'expression_list',
  'parenthesized_expression',
  'list_splat'
]);

const IMPORT_TYPES = new Set([
  'import_statement',
  'import_from_statement',
  'future_import_statement',
  'aliased_import',
  'relative_import'
]);

const PARAMETER_TYPES = new Set(['parameters', 'lambda_parameters', 'typed_parameter']);

export interface Position {
  line: number;
  column: number;
}

export function positionOf(node: SyntaxNode): Position {
  return { line: node.startPosition.row + 1, column: node.startPosition.column };
}

export function comesBefore(a: SyntaxNode, b: SyntaxNode): boolean {
  return a.startIndex < b.startIndex;
}

/** Yields `root` and its named descendants, breadth-first. */
export function* walk(root: SyntaxNode): Generator<SyntaxNode> {
  const queue: SyntaxNode[] = [root];
  for (let i = 0; i < queue.length; i++) {
    const current = queue[i];
    yield current;
    for (const child of current.namedChildren) queue.push(child);
  }
}

/**
 * Named descendants of a scope-defining node that belong to its own scope.
 * Nested functions, classes and lambdas are yielded but not entered.
 */
export function* walkScope(scope: SyntaxNode): Generator<SyntaxNode> {
  const queue: SyntaxNode[] = [...scope.namedChildren];
  for (let i = 0; i < queue.length; i++) {
    const current = queue[i];
    yield current;
    if (SCOPE_TYPES.has(current.type)) continue;
    for (const child of current.namedChildren) queue.push(child);
  }
}

/** Every function definition in the tree, including nested and async ones. */
export function functionDefinitions(root: SyntaxNode): SyntaxNode[] {
  const result: SyntaxNode[] = [];
  for (const node of walk(root)) {
    if (node.type === 'function_definition') result.push(node);
  }
  return result;
}

export function nameOf(definition: SyntaxNode): string {
  return definition.childForFieldName('name')?.text ?? '';
}

export function isField(parent: SyntaxNode, field: string, node: SyntaxNode): boolean {
  return parent.childForFieldName(field)?.id === node.id;
}

/** Last line holding code, ignoring trailing comments and line breaks. */
export function lastLine(node: SyntaxNode): number {
  let current = node;
  for (;;) {
    const named = current.namedChildren;
    let last: SyntaxNode | undefined;
    for (let i = named.length - 1; i >= 0; i--) {
      if (named[i].type !== 'comment') {
        last = named[i];
        break;
      }
    }
    const trailingComment = last !== undefined && last.id !== named[named.length - 1].id;
    if (last && (trailingComment || last.endIndex === current.endIndex)) {
      current = last;
      continue;
    }
    const end = current.endPosition;
    return end.column === 0 && end.row > current.startPosition.row ? end.row : end.row + 1;
  }
}

/** Plain identifiers bound by an assignment target. */
export function storedNames(target: SyntaxNode): SyntaxNode[] {
  const names: SyntaxNode[] = [];
  const stack = [target];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.type === 'identifier') {
      names.push(node);
    } else if (node.type === 'as_pattern_target') {
      // The grammar renames the target expression itself
      const wrapsName = node.namedChildCount === 1 && node.firstNamedChild?.type === 'identifier';
      if (node.namedChildCount === 0) names.push(node);
      else if (wrapsName || /^[([]/.test(node.text)) pushChildren(stack, node);
    } else if (PATTERN_TYPES.has(node.type)) {
      pushChildren(stack, node);
    }
  }
  return names;
}

function pushChildren(stack: SyntaxNode[], node: SyntaxNode): void {
  const children = node.namedChildren;
  for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
}

/** The target of a `with` item, for grammars with and without `as_pattern`. */
export function withTarget(item: SyntaxNode): SyntaxNode | null {
  const direct = item.childForFieldName('alias');
  if (direct) return direct;
  const value = item.childForFieldName('value');
  return value?.type === 'as_pattern' ? value.childForFieldName('alias') : null;
}

/**
 * Whether an identifier reads a variable. Definitions, parameters, import
 * names, keyword labels, attribute names and assignment targets do not.
 */
export function isLoad(identifier: SyntaxNode): boolean {
  const parent = identifier.parent;
  if (!parent) return false;

  switch (parent.type) {
    case 'attribute':
      return !isField(parent, 'attribute', identifier);
    case 'keyword_argument':
    case 'function_definition':
    case 'class_definition':
    case 'default_parameter':
    case 'typed_default_parameter':
      return !isField(parent, 'name', identifier);
    case 'aliased_import':
      return false;
    case 'dotted_name':
      return !(parent.parent && IMPORT_TYPES.has(parent.parent.type));
    case 'global_statement':
    case 'nonlocal_statement':
    case 'dictionary_splat_pattern':
    case 'as_pattern_target':
    case 'delete_statement':
      return false;
    default:
      break;
  }

  // Climb through tuple and list patterns to the node that owns the target.
  let target = identifier;
  let owner: SyntaxNode | null = parent;
  while (owner && PATTERN_TYPES.has(owner.type)) {
    target = owner;
    owner = owner.parent;
  }
  if (!owner) return true;
  if (PARAMETER_TYPES.has(owner.type)) return false;

  switch (owner.type) {
    case 'assignment':
    case 'augmented_assignment':
    case 'for_statement':
    case 'for_in_clause':
      return !isField(owner, 'left', target);
    case 'named_expression':
      return !isField(owner, 'name', target);
    case 'with_item':
      return !isField(owner, 'alias', target);
    case 'as_pattern_target':
    case 'delete_statement':
      return false;
    default:
      return true;
  }
}

const STRING_OPENING = /^([A-Za-z]*)('''|"""|'|")/;

/**
 * Text of a plain string literal, escapes left as written. Bytes and
 * f-strings are not plain strings and give `null`.
 */
export function stringValue(node: SyntaxNode): string | null {
  if (node.type === 'concatenated_string') {
    let value = '';
    for (const part of node.namedChildren) {
      if (part.type === 'comment') continue;
      const text = stringValue(part);
      if (text === null) return null;
      value += text;
    }
    return value;
  }
  if (node.type !== 'string') return null;

  const match = STRING_OPENING.exec(node.text);
  if (!match) return null;
  const [, prefix, quote] = match;
  if (/[bBfF]/.test(prefix)) return null;
  return node.text.slice(prefix.length + quote.length, node.text.length - quote.length);
}
