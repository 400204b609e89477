import express, { type NextFunction, type Request, type Response } from 'express';
import { pinoHttp } from 'pino-http';
import crypto from 'node:crypto';
import { z } from 'zod';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { config } from './config.js';
import { baseLogger as logger } from './logger.js';
import { createMcpServer } from './tools.js';
import { UpstreamClient } from './upstream.js';

export interface AppOptions {
  client?: UpstreamClient;
}

interface SseSession {
  transport: SSEServerTransport;
  server: McpServer;
  heartbeat: NodeJS.Timeout;
}

const toolCallSchema = z.object({
  method: z.literal('tools/call'),
  params: z.object({ name: z.string() })
});

const toolNameOf = (body: unknown): string | undefined => {
  const parsed = toolCallSchema.safeParse(body);
  return parsed.success ? parsed.data.params.name : undefined;
};

export function createApp(options: AppOptions = {}) {
  const client =
    options.client ??
    new UpstreamClient({
      baseUrl: config.upstream.baseUrl,
      timeoutMs: config.upstream.timeoutMs,
      userAgent: config.upstream.userAgent
    });

  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.use(
    pinoHttp({
      logger,
      genReqId: req => {
        const header = req.headers['x-request-id'];
        return typeof header === 'string' && header ? header : crypto.randomUUID();
      }
    })
  );

  const toolCounts: Record<string, number> = {};
  const metrics = { totalRequests: 0, errors: 0, toolCounts };
  const sseSessions = new Map<string, SseSession>();

  const countTool = (body: unknown) => {
    const toolName = toolNameOf(body);
    if (toolName) metrics.toolCounts[toolName] = (metrics.toolCounts[toolName] ?? 0) + 1;
  };

  app.get('/healthz', (_req: Request, res: Response) => {
    res.json({
      ok: true,
      uptime: process.uptime(),
      upstream: client.baseUrl,
      requests: metrics.totalRequests,
      errors: metrics.errors,
      toolCounts: metrics.toolCounts,
      sseSessions: sseSessions.size
    });
  });

  // Stateless Streamable HTTP: one server and transport per request.
  app.post('/mcp', async (req: Request, res: Response) => {
    const server = createMcpServer(client);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined, enableJsonResponse: true });
    res.on('close', () => {
      transport.close().catch(err => logger.debug({ err }, 'transport close failed'));
      server.close().catch(err => logger.debug({ err }, 'server close failed'));
    });
    try {
      metrics.totalRequests++;
      countTool(req.body);
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      logger.error({ err }, 'MCP error');
      metrics.errors++;
      if (!res.headersSent) res.status(500).json({ error: 'Server error' });
    }
  });

  const methodNotAllowed = (_req: Request, res: Response) => {
    res.status(405).json({ jsonrpc: '2.0', error: { code: -32000, message: 'Method not allowed.' }, id: null });
  };
  app.get('/mcp', methodNotAllowed);
  app.delete('/mcp', methodNotAllowed);

  // Legacy HTTP+SSE transport for clients that have not moved to Streamable HTTP.
  app.get(['/sse', '/sse/'], async (_req: Request, res: Response) => {
    try {
      const transport = new SSEServerTransport('/messages', res);
      const server = createMcpServer(client);
      const sid = transport.sessionId;
      const heartbeat = setInterval(() => {
        server.server
          .sendLoggingMessage({ level: 'debug', data: 'ping' })
          .catch(err => logger.debug({ err, sid }, 'SSE heartbeat failed'));
      }, 25_000);
      sseSessions.set(sid, { transport, server, heartbeat });
      transport.onclose = () => {
        const session = sseSessions.get(sid);
        if (session) clearInterval(session.heartbeat);
        sseSessions.delete(sid);
      };
      await server.connect(transport);
    } catch (err) {
      logger.error({ err }, 'SSE init error');
      metrics.errors++;
      if (!res.headersSent) res.status(500).send('Error establishing SSE stream');
    }
  });

  app.post('/messages', async (req: Request, res: Response) => {
    const sessionId = typeof req.query.sessionId === 'string' ? req.query.sessionId : '';
    if (!sessionId) {
      res.status(400).send('Missing sessionId parameter');
      return;
    }
    const session = sseSessions.get(sessionId);
    if (!session) {
      res.status(404).send('Session not found');
      return;
    }
    try {
      metrics.totalRequests++;
      countTool(req.body);
      await session.transport.handlePostMessage(req, res, req.body);
    } catch (err) {
      logger.error({ err }, 'SSE message error');
      metrics.errors++;
      if (!res.headersSent) res.status(500).send('Error handling request');
    }
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err }, 'Unhandled request error');
    metrics.errors++;
    if (!res.headersSent) res.status(500).json({ error: 'Server error' });
  });

  return app;
}

export const app = createApp();

if (!process.env.NO_LISTEN) {
  app.listen(config.port, () => {
    logger.info(`Sefaria MCP running at http://localhost:${config.port}/mcp`);
    logger.info(`Sefaria MCP SSE:  http://localhost:${config.port}/sse`);
    logger.info({ event: 'config', upstream: config.upstream.baseUrl, logLevel: config.logLevel }, 'Config');
  });
}
