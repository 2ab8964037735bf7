import {StdioServerTransport} from "@modelcontextprotocol/sdk/server/stdio.js";
import type {McpServer} from "@modelcontextprotocol/sdk/server/mcp.js";

// stdout carries the protocol; log to stderr only.
export async function startStdio(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[stdio] similar-cases server listening on stdio");
}
