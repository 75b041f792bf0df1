import { readFile } from 'node:fs/promises';
import type { CodeAnalyzer } from '../shared/analyzer.js';
import { PyLensError, ValidationError } from '../shared/errors.js';
import { ValidationLayer } from '../shared/validation.js';
import { CLIFormatter } from './output.js';

export const EXIT_OK = 0;
/** At least one error-severity suggestion, e.g. a syntax error. */
export const EXIT_FINDINGS = 1;
export const EXIT_FAILURE = 2;

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const consoleIO: CliIO = {
  stdout: text => console.log(text),
  stderr: text => console.error(text)
};

export interface CommandContext {
  analyzer: CodeAnalyzer;
  io: CliIO;
  readSource?: (file: string) => Promise<string>;
}

export interface AnalyzeCommandOptions {
  languageVersion?: string;
  json?: boolean;
  /** `false` when `--no-cache` is given. */
  cache?: boolean;
}

export interface OutputOptions {
  json?: boolean;
}

export async function analyzeCommand(
  file: string,
  options: AnalyzeCommandOptions,
  context: CommandContext
): Promise<number> {
  const read = context.readSource ?? ((path: string) => readFile(path, 'utf8'));

  let code: string;
  try {
    code = await read(file);
  } catch (error) {
    context.io.stderr(`❌ Could not read ${file}: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_FAILURE;
  }

  try {
    const result = await context.analyzer.analyze(
      { code, languageVersion: options.languageVersion },
      { useCache: options.cache !== false }
    );
    context.io.stdout(
      options.json ? CLIFormatter.formatJson(result) : CLIFormatter.formatAnalysisResult(result, file)
    );
    return result.suggestions.some(s => s.severity === 'error') ? EXIT_FINDINGS : EXIT_OK;
  } catch (error) {
    context.io.stderr(describeFailure(error));
    return EXIT_FAILURE;
  }
}

export async function rulesCommand(options: OutputOptions, context: CommandContext): Promise<number> {
  const rules = context.analyzer.listRules();
  context.io.stdout(options.json ? CLIFormatter.formatJson(rules) : CLIFormatter.formatRules(rules));
  return EXIT_OK;
}

export async function healthCommand(options: OutputOptions, context: CommandContext): Promise<number> {
  const report = await context.analyzer.health();
  context.io.stdout(options.json ? CLIFormatter.formatJson(report) : CLIFormatter.formatHealth(report));
  return report.status === 'ok' ? EXIT_OK : EXIT_FINDINGS;
}

function describeFailure(error: unknown): string {
  if (error instanceof ValidationError) {
    return `❌ Invalid input: ${ValidationLayer.formatIssues(error.issues)}`;
  }
  if (error instanceof PyLensError) {
    return `❌ ${error.getUserFriendlyMessage()}`;
  }
  return `❌ ${error instanceof Error ? error.message : String(error)}`;
}
