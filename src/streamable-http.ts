/**
 * StreamableHTTP server setup for HTTP-based MCP communication using Hono
 */
import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import { serve } from "@hono/node-server";
import { v4 as uuid } from "uuid";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { InitializeRequestSchema, type JSONRPCError } from "@modelcontextprotocol/sdk/types.js";
import { toFetchResponse, toReqRes } from "fetch-to-node";

import { runWithGeminiKey } from "./request-context.js";
import { SERVER_NAME, SERVER_VERSION } from "./server.js";
import { describeError } from "./tuna-pipeline/errors.js";
import { silentLogger, type Logger } from "./tuna-pipeline/logger.js";

/** Header for a per-user Gemini API key (multi-tenant chat UIs). */
export const GEMINI_KEY_HEADER = "X-Gemini-Key";

const SESSION_ID_HEADER_NAME = "mcp-session-id";
const JSON_RPC = "2.0";

/** Factory: create a new MCP Server per connection (SDK allows only one transport per Server). */
export type McpServerFactory = () => Server;

/** Per-request Gemini key: the dedicated header first, then a bearer token. */
export function geminiKeyFromHeaders(header: (name: string) => string | undefined): string | undefined {
  const direct = header(GEMINI_KEY_HEADER)?.trim();
  if (direct) return direct;
  return header("Authorization")?.match(/^Bearer\s+(.+)$/i)?.[1]?.trim() || undefined;
}

function isInitializeRequest(body: unknown): boolean {
  const isInitial = (data: unknown) => InitializeRequestSchema.safeParse(data).success;
  return Array.isArray(body) ? body.some(isInitial) : isInitial(body);
}

function createErrorResponse(message: string): JSONRPCError {
  return {
    jsonrpc: JSON_RPC,
    error: {
      code: -32000,
      message,
    },
    id: uuid(),
  };
}

/**
 * StreamableHTTP MCP Server handler
 */
class MCPStreamableHttpServer {
  // Active transports by session ID
  private readonly transports = new Map<string, StreamableHTTPServerTransport>();

  constructor(
    private readonly createServer: McpServerFactory,
    private readonly logger: Logger,
  ) {}

  /**
   * Handle GET requests: return server info for discovery.
   * MCP Streamable HTTP uses POST for JSON-RPC; GET allows clients to discover the server.
   */
  handleGetRequest(c: Context): Response {
    const accept = c.req.header("Accept") ?? "";
    if (accept.includes("text/event-stream")) {
      return c.text("Method Not Allowed", 405, {
        Allow: "POST",
        "Content-Type": "text/plain",
      });
    }
    return c.json(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
        transport: "streamable-http",
        message: "Use POST with JSON-RPC for MCP; include header mcp-session-id for existing sessions.",
        endpoint: "/mcp",
        perUserKeyHeader: GEMINI_KEY_HEADER,
        perUserKeyHint: "Send X-Gemini-Key (or Authorization: Bearer) with a Gemini API key to use it for extract_product_info.",
      },
      200,
      {
        Allow: "POST, GET",
        "Cache-Control": "no-store",
      },
    );
  }

  /**
   * Handle POST requests (all MCP communication).
   * Reads X-Gemini-Key or Authorization: Bearer for a per-user key.
   */
  async handlePostRequest(c: Context): Promise<Response> {
    const geminiKey = geminiKeyFromHeaders((name) => c.req.header(name));
    return runWithGeminiKey(geminiKey, () => this.handlePostRequestInner(c));
  }

  private async handlePostRequestInner(c: Context): Promise<Response> {
    const sessionId = c.req.header(SESSION_ID_HEADER_NAME);
    this.logger.debug(`POST request received ${sessionId ? `with session ID: ${sessionId}` : "without session ID"}`);

    try {
      const body: unknown = await c.req.json();

      const existing = sessionId ? this.transports.get(sessionId) : undefined;
      if (existing) {
        const { req, res } = toReqRes(c.req.raw);
        await existing.handleRequest(req, res, body);
        return toFetchResponse(res);
      }

      // New transport (and Server) for initialize requests
      if (!sessionId && isInitializeRequest(body)) {
        this.logger.info("Creating new StreamableHTTP transport for initialize request");

        const { req, res } = toReqRes(c.req.raw);
        const server = this.createServer();
        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => uuid(),
        });
        transport.onerror = (err) => {
          this.logger.error(`StreamableHTTP transport error: ${describeError(err)}`);
        };

        await server.connect(transport);
        await transport.handleRequest(req, res, body);

        const newSessionId = transport.sessionId;
        if (newSessionId) {
          this.logger.info(`New session established: ${newSessionId}`);
          this.transports.set(newSessionId, transport);
          transport.onclose = () => {
            this.logger.info(`Session closed: ${newSessionId}`);
            this.transports.delete(newSessionId);
          };
        }

        return toFetchResponse(res);
      }

      return c.json(createErrorResponse("Bad Request: invalid session ID or method."), 400);
    } catch (error) {
      this.logger.error(`Error handling MCP request: ${describeError(error)}`);
      return c.json(createErrorResponse("Internal server error."), 500);
    }
  }
}

/**
 * Hono app exposing `/health` and `/mcp` (GET for discovery, POST for JSON-RPC).
 */
export function createStreamableHttpApp(createServer: McpServerFactory, logger: Logger = silentLogger): Hono {
  const app = new Hono();
  app.use("*", cors());

  const mcpHandler = new MCPStreamableHttpServer(createServer, logger);

  app.get("/health", (c) => c.json({ status: "OK", server: SERVER_NAME, version: SERVER_VERSION }));
  app.get("/mcp", (c) => mcpHandler.handleGetRequest(c));
  app.post("/mcp", (c) => mcpHandler.handlePostRequest(c));

  return app;
}

/**
 * Sets up a web server for the MCP server using StreamableHTTP transport
 *
 * @param createServer Factory that returns a new MCP Server (one per connection)
 * @param port The port to listen on (default: 3031)
 */
export function setupStreamableHttpServer(
  createServer: McpServerFactory,
  port = 3031,
  logger: Logger = silentLogger,
): Hono {
  const app = createStreamableHttpApp(createServer, logger);

  // hostname 0.0.0.0 so it accepts connections from proxy/other hosts
  serve(
    {
      fetch: app.fetch,
      port,
      hostname: "0.0.0.0",
    },
    (info) => {
      logger.info(`MCP StreamableHTTP Server running at http://0.0.0.0:${info.port}`);
      logger.info(`- MCP Endpoint: http://<host>:${info.port}/mcp`);
      logger.info(`- Health Check: http://<host>:${info.port}/health`);
    },
  );

  return app;
}
