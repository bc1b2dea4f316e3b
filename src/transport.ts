import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { describeError } from "./errors.ts";
import { createMcpServer, type ToolContext } from "./server.ts";

/**
 * Start the stdio transport. Connects a dedicated McpServer to stdin/stdout.
 * All logging must go to stderr since stdout is the JSON-RPC channel.
 */
export async function startStdioTransport(context: ToolContext): Promise<void> {
  const server = createMcpServer(context);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[deck-sync] stdio transport connected");
}

// Stateless mode: new transport + server per request.
async function handleMcpRequest(
  context: ToolContext,
  req: IncomingMessage,
  res: ServerResponse,
): Promise<void> {
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
  const server = createMcpServer(context);

  res.on("close", () => {
    Promise.all([transport.close(), server.close()]).catch((err) => {
      console.error(`[deck-sync] failed to close MCP request: ${describeError(err)}`);
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res);
}

/**
 * Serve the Streamable HTTP transport on `/mcp` with node:http.
 * Tool calls that write go through the context's exclusive queue.
 */
export function startHttpTransport(context: ToolContext, port: number): Server {
  const httpServer = createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    if (url.pathname !== "/mcp") {
      res.writeHead(404).end("Not Found");
      return;
    }

    handleMcpRequest(context, req, res).catch((err) => {
      console.error(`[deck-sync] MCP request failed: ${describeError(err)}`);
      if (!res.headersSent) {
        res.writeHead(500).end("Internal Server Error");
      }
    });
  });

  httpServer.listen(port, () => {
    console.error(`[deck-sync] HTTP transport listening on port ${port}`);
  });
  return httpServer;
}
