import { createMcpExpressApp } from '@modelcontextprotocol/sdk/server/express.js';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import type { Express, NextFunction, Request, Response } from 'express';
import type { Logger } from 'pino';

import type { AppConfig } from '../config.js';
import { ensureError } from '../errors.js';
import type { OutboundEnvelope, RequestDispatcher } from '../mcp/dispatcher.js';
import { TOOL_NAMES } from '../openshock/commands.js';
import type { SafetyClamp } from '../safety/safetyClamp.js';
import { authenticate, extractBearerToken } from './auth.js';
import { negotiateResponseFormat, toEventStreamFrame } from './responseFormat.js';

export interface HttpAppDependencies {
  config: Pick<
    AppConfig,
    'serverName' | 'serverVersion' | 'mcpAuthToken' | 'mcpHttpHost' | 'mcpHttpAllowedHosts' | 'mcpHttpAllowJsonOnly'
  >;
  logger: Logger;
  dispatcher: RequestDispatcher;
  clamp: SafetyClamp;
}

function isBodyParseFailure(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';
}

function statusFromError(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status >= 400 && error.status < 600 ? error.status : 500;
  }
  return 500;
}

export function createHttpApp(deps: HttpAppDependencies): Express {
  const { config, logger, dispatcher, clamp } = deps;

  const app = createMcpExpressApp({
    host: config.mcpHttpHost,
    ...(config.mcpHttpAllowedHosts ? { allowedHosts: config.mcpHttpAllowedHosts } : {})
  });

  function isAuthorized(req: Request): boolean {
    const result = authenticate(extractBearerToken(req.headers.authorization), config.mcpAuthToken);
    if (!result.ok) {
      logger.warn({ path: req.path, reason: result.reason }, 'HTTP request denied: authentication failed');
      return false;
    }
    return true;
  }

  function rejectUnauthorized(res: Response): void {
    res.status(401).json({
      status: 'error',
      error: 'Invalid authentication token'
    });
  }

  function sendEnvelope(req: Request, res: Response, envelope: OutboundEnvelope): void {
    const negotiation = negotiateResponseFormat(req.headers.accept, {
      allowJsonOnly: config.mcpHttpAllowJsonOnly
    });

    logger.debug(
      {
        allowJsonOnly: config.mcpHttpAllowJsonOnly,
        originalAccept: negotiation.originalAccept,
        acceptsExplicitJson: negotiation.acceptsExplicitJson,
        acceptsExplicitEventStream: negotiation.acceptsExplicitEventStream,
        format: negotiation.format
      },
      'MCP HTTP response format negotiated'
    );

    res.status(200);
    if (negotiation.format === 'json') {
      res.json(envelope);
      return;
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.end(toEventStreamFrame(envelope));
  }

  app.get('/', (_req, res) => {
    res.status(200).json({
      name: config.serverName,
      version: config.serverVersion,
      protocol: 'MCP',
      tools: [...TOOL_NAMES],
      authConfigured: Boolean(config.mcpAuthToken),
      maxShockIntensity: clamp.effectiveCeiling(),
      endpoints: {
        mcp: 'POST /mcp',
        health: 'GET /health',
        info: 'GET /'
      }
    });
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'healthy',
      server: config.serverName,
      version: config.serverVersion,
      timestamp: new Date().toISOString()
    });
  });

  app.post('/mcp', async (req, res) => {
    if (!isAuthorized(req)) {
      rejectUnauthorized(res);
      return;
    }

    try {
      const envelope = await dispatcher.dispatch(req.body);
      sendEnvelope(req, res, envelope);
    } catch (error) {
      logger.error({ error: ensureError(error).message }, 'MCP request handling failed');
      if (!res.headersSent) {
        sendEnvelope(req, res, {
          jsonrpc: '2.0',
          error: {
            code: ErrorCode.InternalError,
            message: 'Internal server error'
          },
          id: null
        });
      }
    }
  });

  app.get('/mcp', (_req, res) => {
    res.status(405).json({
      jsonrpc: '2.0',
      error: {
        code: ErrorCode.ConnectionClosed,
        message: 'Method not allowed.'
      },
      id: null
    });
  });

  app.delete('/mcp', (_req, res) => {
    res.status(405).json({
      jsonrpc: '2.0',
      error: {
        code: ErrorCode.ConnectionClosed,
        message: 'Method not allowed.'
      },
      id: null
    });
  });

  // Body parsing runs before the routes, so the auth gate is applied again here.
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (req.path === '/mcp' && req.method === 'POST' && !isAuthorized(req)) {
      rejectUnauthorized(res);
      return;
    }

    if (isBodyParseFailure(error)) {
      logger.warn({ path: req.path }, 'Rejected unparseable JSON body');
      sendEnvelope(req, res, {
        jsonrpc: '2.0',
        error: {
          code: ErrorCode.ParseError,
          message: 'Parse error'
        },
        id: null
      });
      return;
    }

    const status = statusFromError(error);
    logger.error({ path: req.path, status, error: ensureError(error).message }, 'HTTP request failed');
    res.status(status).json({
      jsonrpc: '2.0',
      error: {
        code: ErrorCode.InternalError,
        message: 'Internal server error'
      },
      id: null
    });
  });

  return app;
}
