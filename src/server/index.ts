import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Services } from '../lib/services.js';
import { ToolHandler } from './handlers.js';

export const SERVER_NAME = 'pylens';
export const SERVER_VERSION = '0.3.0';

export function createMcpServer(handler: ToolHandler): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: handler.listTools()
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handler.call(name, args);
  });

  return server;
}

/** Serves MCP over stdio until the transport closes. */
export async function startStdioServer(services: Services): Promise<Server> {
  const handler = new ToolHandler(services.analyzer, services.logger);
  const server = createMcpServer(handler);
  const transport = new StdioServerTransport();

  server.onerror = (error) => {
    services.logger.error(`❌ MCP server error: ${error.message}`);
  };

  await server.connect(transport);
  services.logger.info('✅ pylens MCP stdio server ready');
  return server;
}

export { ToolHandler, toMcpError } from './handlers.js';
export { tools, TOOL_NAMES } from './tools.js';
