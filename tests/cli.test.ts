import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  EXIT_FAILURE,
  EXIT_FINDINGS,
  EXIT_OK,
  analyzeCommand,
  healthCommand,
  rulesCommand,
  type CliIO
} from '../src/cli/commands.js';
import { buildProgram, type ServicesFactory } from '../src/cli/index.js';
import { CLIFormatter } from '../src/cli/output.js';
import { createServices } from '../src/lib/services.js';
import { loadConfig } from '../src/shared/config.js';
import { ConfigurationError } from '../src/shared/errors.js';
import { silentLogger } from '../src/shared/logger.js';
import { FINGERPRINT_A, createTestAnalyzer, sampleSuggestion } from './helpers.js';

function captureIO(): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: text => { out.push(text); },
    stderr: text => { err.push(text); }
  };
}

describe('CLIFormatter', () => {
  it('formats suggestions in aligned columns', () => {
    const text = CLIFormatter.formatAnalysisResult({
      fingerprint: FINGERPRINT_A,
      suggestions: [
        sampleSuggestion(),
        sampleSuggestion({ ruleId: 'syntax_error', message: 'Syntax error: invalid syntax', severity: 'error', line: null, column: null })
      ],
      analysisTimeMs: 0.5,
      cached: true
    }, 'app.py');

    expect(text.split('\n')).toEqual([
      'app.py: 2 suggestions (0.50ms, cached)',
      "  1:0      info     missing_docstring          Function 'foo' should have a docstring.",
      '  -:-      error    syntax_error               Syntax error: invalid syntax'
    ]);
  });

  it('reports a clean file on one line', () => {
    const text = CLIFormatter.formatAnalysisResult(
      { fingerprint: FINGERPRINT_A, suggestions: [], analysisTimeMs: 1, cached: false },
      'clean.py'
    );

    expect(text).toBe('clean.py: no issues found (1.00ms)');
  });

  it('formats rules', () => {
    expect(CLIFormatter.formatRules([{ id: 'print_statement', description: 'Calls to print()' }]))
      .toBe('print_statement            Calls to print()');
    expect(CLIFormatter.formatRules([])).toBe('No rules are enabled.');
  });
});

describe('commands', () => {
  it('prints findings and exits 0 without errors', async () => {
    const io = captureIO();
    const code = await analyzeCommand('foo.py', {}, {
      analyzer: createTestAnalyzer(),
      io,
      readSource: async () => 'def foo():\n    return 1\n'
    });

    expect(code).toBe(EXIT_OK);
    expect(io.out[0].split('\n')[1]).toBe(
      "  1:0      info     missing_docstring          Function 'foo' should have a docstring."
    );
  });

  it('exits 1 on a syntax error', async () => {
    const io = captureIO();
    const code = await analyzeCommand('broken.py', { json: true }, {
      analyzer: createTestAnalyzer(),
      io,
      readSource: async () => 'print "hello"\n'
    });

    expect(code).toBe(EXIT_FINDINGS);
    expect(JSON.parse(io.out[0]).suggestions).toEqual([{
      ruleId: 'syntax_error',
      message: "Syntax error: Missing parentheses in call to 'print'. Did you mean print(...)?",
      severity: 'error',
      line: 1,
      column: 0,
      metadata: {}
    }]);
  });

  it('exits 2 when the file cannot be read', async () => {
    const io = captureIO();
    const code = await analyzeCommand('missing.py', {}, {
      analyzer: createTestAnalyzer(),
      io,
      readSource: async () => { throw new Error('ENOENT: no such file or directory'); }
    });

    expect(code).toBe(EXIT_FAILURE);
    expect(io.err).toEqual(['❌ Could not read missing.py: ENOENT: no such file or directory']);
  });

  it('exits 2 on invalid input', async () => {
    const io = captureIO();
    const code = await analyzeCommand('empty.py', {}, {
      analyzer: createTestAnalyzer(),
      io,
      readSource: async () => ''
    });

    expect(code).toBe(EXIT_FAILURE);
    expect(io.err).toEqual(['❌ Invalid input: code: Code cannot be empty']);
  });

  it('lists rules as JSON', async () => {
    const io = captureIO();
    const code = await rulesCommand({ json: true }, { analyzer: createTestAnalyzer(), io });

    expect(code).toBe(EXIT_OK);
    expect(JSON.parse(io.out[0]).map((rule: { id: string }) => rule.id)).toEqual([
      'unused_import',
      'unused_variable',
      'high_cyclomatic_complexity',
      'long_function',
      'missing_docstring',
      'naming_conventions',
      'print_statement'
    ]);
  });

  it('prints health', async () => {
    const io = captureIO();
    const code = await healthCommand({}, { analyzer: createTestAnalyzer(), io });

    expect(code).toBe(EXIT_OK);
    expect(io.out[0].split('\n')).toEqual([
      'status:          ok',
      'cache:           fallback',
      'persistence:     disabled',
      'model provider:  none',
      'rules loaded:    7',
      'service level:   full'
    ]);
  });
});

describe('buildProgram', () => {
  let dir: string;

  const factory: ServicesFactory = async () => createServices({
    config: loadConfig({ env: {}, configFile: null }),
    logger: silentLogger,
    keyValueClient: null
  });

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'pylens-cli-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  async function run(args: string[], servicesFactory: ServicesFactory = factory) {
    const io = captureIO();
    const exits: number[] = [];
    await buildProgram(servicesFactory, io, code => { exits.push(code); }).parseAsync(['node', 'pylens', ...args]);
    return { io, exits };
  }

  it('analyzes a file from disk', async () => {
    const file = path.join(dir, 'module.py');
    writeFileSync(file, 'import os\n');

    const { io, exits } = await run(['analyze', file, '--no-cache']);

    expect(exits).toEqual([EXIT_OK]);
    expect(io.out[0].split('\n')[0].startsWith(`${file}: 1 suggestion (`)).toBe(true);
  });

  it('lists rules', async () => {
    const { io, exits } = await run(['rules']);

    expect(exits).toEqual([EXIT_OK]);
    expect(io.out[0].split('\n')).toHaveLength(7);
  });

  it('reports configuration failures', async () => {
    const failing: ServicesFactory = async () => {
      throw new ConfigurationError('Configuration file not found: nope.yaml');
    };

    const { io, exits } = await run(['health'], failing);

    expect(exits).toEqual([EXIT_FAILURE]);
    expect(io.err).toHaveLength(1);
  });
});
