import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Start the MCP stdio transport. stdout carries protocol frames, so all
 * logging in this process goes to stderr.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 */
export async function startStdioTransport(createServer: () => Server) {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
