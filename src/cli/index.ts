#!/usr/bin/env node

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { createServices, type Services } from '../lib/services.js';
import { loadConfig } from '../shared/config.js';
import { PyLensError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { SERVER_VERSION } from '../server/index.js';
import {
  EXIT_FAILURE,
  analyzeCommand,
  consoleIO,
  healthCommand,
  rulesCommand,
  type AnalyzeCommandOptions,
  type CliIO,
  type OutputOptions
} from './commands.js';

export type ServicesFactory = (configFile: string | undefined) => Promise<Services>;

const defaultServices: ServicesFactory = async (configFile) => {
  const config = loadConfig({ configFile });
  // Keep the terminal quiet unless a level was asked for explicitly.
  const logger = createLogger(process.env.LOG_LEVEL ? config.logLevel : 'warn', 'pylens');
  return createServices({ config, logger });
};

export function buildProgram(
  factory: ServicesFactory = defaultServices,
  io: CliIO = consoleIO,
  onExit: (code: number) => void = code => { process.exitCode = code; }
): Command {
  const program = new Command();

  program
    .name('pylens')
    .description('Static analysis for Python snippets')
    .version(SERVER_VERSION)
    .option('-c, --config <file>', 'YAML configuration file');

  const run = async (task: (services: Services) => Promise<number>) => {
    const { config } = program.opts<{ config?: string }>();
    let services: Services;
    try {
      services = await factory(config);
    } catch (error) {
      io.stderr(error instanceof PyLensError ? `❌ ${error.getUserFriendlyMessage()}` : `❌ ${String(error)}`);
      onExit(EXIT_FAILURE);
      return;
    }

    try {
      onExit(await task(services));
    } finally {
      await services.shutdown();
    }
  };

  program
    .command('analyze <file>')
    .description('Analyze a Python file')
    .option('--language-version <version>', 'target Python version (part of the cache key)')
    .option('--json', 'print the result as JSON')
    .option('--no-cache', 'skip the analysis cache')
    .action(async (file: string, options: AnalyzeCommandOptions) => {
      await run(services => analyzeCommand(file, options, { analyzer: services.analyzer, io }));
    });

  program
    .command('rules')
    .description('List the active rules in evaluation order')
    .option('--json', 'print the rules as JSON')
    .action(async (options: OutputOptions) => {
      await run(services => rulesCommand(options, { analyzer: services.analyzer, io }));
    });

  program
    .command('health')
    .description('Report cache, persistence and model provider status')
    .option('--json', 'print the report as JSON')
    .action(async (options: OutputOptions) => {
      await run(services => healthCommand(options, { analyzer: services.analyzer, io }));
    });

  return program;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error('💥 pylens failed:', error);
      process.exitCode = EXIT_FAILURE;
    });
}
