/**
 * Streamable HTTP transport
 *
 * One MCP server and transport per session, keyed by the mcp-session-id
 * header. Taxonomy and service clients are shared across sessions.
 */

import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { randomUUID } from 'node:crypto';
import type { Server } from 'node:http';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';

import type { ServerContext } from './context.js';
import { SERVER_NAME, SERVER_VERSION, createMcpServer } from './server.js';

export interface HttpApp {
  app: Express;
  transports: Map<string, StreamableHTTPServerTransport>;
}

function sessionIdOf(req: Request): string | undefined {
  const header = req.headers['mcp-session-id'];
  return typeof header === 'string' && header.length > 0 ? header : undefined;
}

function rpcError(res: Response, status: number, message: string): void {
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code: -32000, message },
    id: null,
  });
}

export function createHttpApp(context: ServerContext): HttpApp {
  const { config, logger } = context;
  const log = logger.child('http');

  // Track active transports by session ID
  const transports = new Map<string, StreamableHTTPServerTransport>();

  const app = express();

  // ============================================
  // MIDDLEWARE SETUP
  // ============================================

  app.use(express.json());

  // CORS configuration - allows MCP clients running in a browser
  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // Allow requests with no origin (curl, desktop clients, same-origin)
      if (!origin) {
        callback(null, true);
        return;
      }
      if (config.security.allowedOrigins.includes(origin) || config.security.allowedOrigins.includes('*')) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    },
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'mcp-session-id', 'mcp-protocol-version'],
    exposedHeaders: ['mcp-session-id'],
    maxAge: 86400, // Cache preflight for 24 hours
  };
  app.use(cors(corsOptions));

  const limiter = rateLimit({
    windowMs: config.rateLimit.windowMs,
    max: config.rateLimit.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Too many requests, please try again later' },
      id: null,
    },
    skip: (req) => req.path === '/health',
  });
  app.use(limiter);

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      const message = `${req.method} ${req.path} ${res.statusCode} ${Date.now() - start}ms`;
      if (res.statusCode >= 400) {
        log.warn(message);
      } else {
        log.debug(`${message} - ${req.ip}`);
      }
    });
    next();
  });

  /**
   * POST /mcp - JSON-RPC requests; an initialize request without a session opens one
   */
  app.post('/mcp', async (req, res) => {
    const sessionId = sessionIdOf(req);
    let transport = sessionId ? transports.get(sessionId) : undefined;

    try {
      if (!transport) {
        if (sessionId || !isInitializeRequest(req.body)) {
          rpcError(res, 400, 'Invalid session or missing MCP-Session-Id header');
          return;
        }

        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (id) => {
            transports.set(id, created);
            log.info(`Session initialized: ${id}`);
          },
          onsessionclosed: (id) => {
            transports.delete(id);
            log.info(`Session closed: ${id}`);
          },
        });
        created.onclose = () => {
          if (created.sessionId) {
            transports.delete(created.sessionId);
          }
        };

        await createMcpServer(context).connect(created);
        transport = created;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      log.error('Failed to handle MCP request', error);
      if (!res.headersSent) {
        rpcError(res, 500, 'Internal server error');
      }
    }
  });

  /**
   * GET /mcp opens the SSE stream, DELETE /mcp terminates the session
   */
  const handleSessionRequest = async (req: Request, res: Response): Promise<void> => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports.get(sessionId) : undefined;

    if (!transport) {
      rpcError(res, 400, 'Invalid session');
      return;
    }

    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      log.error(`Failed to handle ${req.method} /mcp`, error);
      if (!res.headersSent) {
        rpcError(res, 500, 'Internal server error');
      }
    }
  };
  app.get('/mcp', handleSessionRequest);
  app.delete('/mcp', handleSessionRequest);

  /**
   * Health check endpoint
   */
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: SERVER_VERSION,
      taxonomyVersion: context.model.version,
      activeSessions: transports.size,
    });
  });

  return { app, transports };
}

export function startHttpServer(context: ServerContext): Promise<Server> {
  const { app } = createHttpApp(context);
  const { port, host } = context.config.server;

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      context.logger.info(`${SERVER_NAME} running at http://${host}:${port}`);
      context.logger.info(`MCP endpoint: http://${host}:${port}/mcp`);
      resolve(server);
    });
    server.on('error', reject);
  });
}
