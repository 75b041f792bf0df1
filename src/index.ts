#!/usr/bin/env node

import type { Server as HttpServer } from 'node:http';
import { Command, InvalidArgumentError } from 'commander';
import { createServices, type Services } from './lib/services.js';
import { SERVER_VERSION, startStdioServer } from './server/index.js';
import { startHttpServer } from './transports/http.js';
import { loadConfig } from './shared/config.js';
import { PyLensError } from './shared/errors.js';

const TRANSPORTS = ['stdio', 'http'] as const;
type TransportType = (typeof TRANSPORTS)[number];

function parseTransport(value: string): TransportType {
  const match = TRANSPORTS.find(t => t === value);
  if (!match) {
    throw new InvalidArgumentError(`Must be one of: ${TRANSPORTS.join(', ')}.`);
  }
  return match;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Must be an integer between 0 and 65535.');
  }
  return port;
}

// Parse CLI arguments using commander
const program = new Command()
  .name('pylens-server')
  .version(SERVER_VERSION)
  .option('-t, --transport <type>', 'transport type (stdio or http)', parseTransport, 'stdio')
  .option('-p, --port <number>', 'port for the HTTP transport (defaults to PORT or 8080)', parsePort)
  .option('-c, --config <file>', 'YAML configuration file')
  .allowUnknownOption() // let MCP Inspector and other wrappers pass extra flags through
  .parse(process.argv);

const cliOptions = program.opts<{
  transport: TransportType;
  port?: number;
  config?: string;
}>();

async function main(): Promise<void> {
  const config = loadConfig({ configFile: cliOptions.config });
  const services = await createServices({ config });
  services.logger.info(`🚀 Starting pylens v${SERVER_VERSION} (${cliOptions.transport})`);

  let httpServer: HttpServer | null = null;
  if (cliOptions.transport === 'http') {
    httpServer = await startHttpServer(services, cliOptions.port ?? config.port);
  } else {
    await startStdioServer(services);
  }

  registerShutdown(services, httpServer);
}

function registerShutdown(services: Services, httpServer: HttpServer | null): void {
  let stopping = false;
  const stop = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    services.logger.info(`🔴 ${signal} received, shutting down`);
    if (httpServer) {
      const server = httpServer;
      await new Promise<void>(resolve => server.close(() => resolve()));
    }
    await services.shutdown();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      stop(signal).catch((error: unknown) => {
        console.error('💥 Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  if (error instanceof PyLensError) {
    console.error(`💥 ${error.getUserFriendlyMessage()}`);
    for (const action of error.getRecoveryActions()) {
      console.error(`   • ${action}`);
    }
  } else {
    console.error('💥 Fatal error in pylens server:', error);
  }
  process.exit(1);
});
