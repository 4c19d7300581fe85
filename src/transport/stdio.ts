import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Serve a single MCP session over stdin/stdout. stdout belongs to the
 * protocol from here on; all logging stays on stderr.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 * @returns Promise resolving once the server is connected over stdio.
 */
export async function startStdioTransport(createServer: () => Server): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[RAG] MCP server connected over stdio");
}
