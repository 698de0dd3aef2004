/**
 * MCP server factory and stdio transport
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { ServerContext } from './context.js';
import { registerTools } from './tools/index.js';

export const SERVER_NAME = 'biolink-resolver-mcp';
export const SERVER_VERSION = '0.1.0';

/**
 * Create a new MCP server instance; the HTTP transport makes one per session
 */
export function createMcpServer(context: ServerContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerTools(server, context);

  return server;
}

export async function startStdioServer(context: ServerContext): Promise<McpServer> {
  const server = createMcpServer(context);
  await server.connect(new StdioServerTransport());
  context.logger.info(`${SERVER_NAME} ${SERVER_VERSION} listening on stdio (taxonomy ${context.model.version})`);
  return server;
}
