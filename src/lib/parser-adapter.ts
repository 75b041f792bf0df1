import { createRequire } from 'node:module';
import path from 'node:path';
import Parser from 'web-tree-sitter';
import type { ParseFailure, ParseOutcome } from '../shared/types.js';

// Resolves the grammar shipped in tree-sitter-wasms
const require = createRequire(import.meta.url);

/** Deepest bracket nesting accepted before parsing is refused. */
export const MAX_BRACKET_DEPTH = 200;

const OPENERS = new Set(['(', '[', '{']);
const CLOSERS = new Set([')', ']', '}']);

// Python 2 forms the grammar still accepts
const LEGACY_STATEMENTS: Record<string, string> = {
  print_statement: "Missing parentheses in call to 'print'. Did you mean print(...)?",
  exec_statement: "Missing parentheses in call to 'exec'. Did you mean exec(...)?"
};

interface GatedSyntax {
  since: readonly [number, number];
  label: string;
}

const GATED_SYNTAX: Record<string, GatedSyntax> = {
  named_expression: { since: [3, 8], label: 'assignment expressions' },
  match_statement: { since: [3, 10], label: "'match' statements" },
  type_alias_statement: { since: [3, 12], label: "'type' alias statements" },
  type_parameter: { since: [3, 12], label: 'type parameter lists' }
};

/**
 * Python parser over the tree-sitter grammar. The tree it returns is owned
 * by the caller and must be released with `tree.delete()`.
 */
export class PythonParser {
  private constructor(private readonly parser: Parser) {}

  static async load(): Promise<PythonParser> {
    await Parser.init();
    const parser = new Parser();
    const wasmPackagePath = require.resolve('tree-sitter-wasms/package.json');
    const wasmPath = path.join(path.dirname(wasmPackagePath), 'out', 'tree-sitter-python.wasm');
    parser.setLanguage(await Parser.Language.load(wasmPath));
    return new PythonParser(parser);
  }

  /**
   * Turns source text into a syntax tree or a structured failure. The first
   * error in document order wins. Malformed input never throws.
   */
  parse(text: string, languageVersion: string | null = null): ParseOutcome {
    let tree: Parser.Tree;
    try {
      tree = this.parser.parse(text);
    } catch (error) {
      if (error instanceof RangeError) {
        return { ok: false, failure: { message: 'too many nested parentheses', line: null, column: null } };
      }
      throw error;
    }

    const failure = findSyntaxError(tree, parseVersion(languageVersion));
    if (failure) {
      tree.delete();
      return { ok: false, failure };
    }
    return { ok: true, tree };
  }
}

let loading: Promise<PythonParser> | null = null;

/** Loads the grammar once per process. A failed load is retried on the next call. */
export function loadPythonParser(): Promise<PythonParser> {
  if (!loading) {
    loading = PythonParser.load().catch((error: unknown) => {
      loading = null;
      throw error;
    });
  }
  return loading;
}

export async function parsePython(text: string, languageVersion: string | null = null): Promise<ParseOutcome> {
  const parser = await loadPythonParser();
  return parser.parse(text, languageVersion);
}

/** `"3.12"` and `"3.12.1"` become `[3, 12]`; anything else disables version checks. */
export function parseVersion(version: string | null): [number, number] | null {
  const match = version === null ? null : /^(\d+)\.(\d+)/.exec(version);
  return match ? [Number(match[1]), Number(match[2])] : null;
}

function olderThan(version: readonly [number, number], since: readonly [number, number]): boolean {
  return version[0] < since[0] || (version[0] === since[0] && version[1] < since[1]);
}

function failureAt(message: string, position: Parser.Point): ParseFailure {
  return { message, line: position.row + 1, column: position.column + 1 };
}

/** Pre-order cursor walk; leaves arrive in source order so brackets can be counted. */
function findSyntaxError(tree: Parser.Tree, version: [number, number] | null): ParseFailure | null {
  const cursor = tree.walk();
  let depth = 0;

  try {
    for (;;) {
      const type = cursor.nodeType;

      if (type === 'ERROR') {
        return failureAt('invalid syntax', cursor.startPosition);
      }
      if (cursor.nodeIsMissing) {
        const expected = cursor.nodeIsNamed ? type : `'${type}'`;
        return failureAt(`expected ${expected}`, cursor.startPosition);
      }
      const legacy = LEGACY_STATEMENTS[type];
      if (legacy) {
        return failureAt(legacy, cursor.startPosition);
      }
      const gated = GATED_SYNTAX[type];
      if (gated && version && olderThan(version, gated.since)) {
        return failureAt(
          `${gated.label} require Python ${gated.since.join('.')} or newer`,
          cursor.startPosition
        );
      }

      if (cursor.gotoFirstChild()) continue;

      if (OPENERS.has(type)) {
        depth += 1;
        if (depth > MAX_BRACKET_DEPTH) {
          return failureAt('too many nested parentheses', cursor.startPosition);
        }
      } else if (CLOSERS.has(type)) {
        depth = Math.max(0, depth - 1);
      }

      while (!cursor.gotoNextSibling()) {
        if (!cursor.gotoParent()) return null;
      }
    }
  } finally {
    cursor.delete();
  }
}
