/**
 * Promptward HTTP Server
 * Express server exposing the analysis API
 */

import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { v4 as uuidv4 } from 'uuid';

import {
  ApiGateway,
  AuditLog,
  ConfigurationManager,
  MitigationEngine,
  PreFilter,
  RequestContext,
  createApiGateway,
  createAuditLog,
  createConfigurationManager,
  createMitigationEngine,
  createPreFilter,
  httpStatusFor,
  loadConfigFromEnv
} from './index';

const REQUEST_ID_HEADER = 'x-request-id';

/** Components wired by createServices */
export interface PromptwardServices {
  engine: MitigationEngine;
  configManager: ConfigurationManager;
  preFilter: PreFilter;
  auditLog: AuditLog;
  gateway: ApiGateway;
}

/**
 * Wire the engine, filter, audit log and gateway from environment settings.
 * Block message and audit retention follow later configuration changes.
 */
export function createServices(env: NodeJS.ProcessEnv = process.env): PromptwardServices {
  const engine = createMitigationEngine();
  const configManager = createConfigurationManager(loadConfigFromEnv(env), engine.getRuleTable());
  const config = configManager.snapshot();

  const preFilter = createPreFilter(engine, { blockMessage: config.blockMessage });
  const auditLog = createAuditLog({ maxEntries: config.auditMaxEntries });
  configManager.onChange(updated => {
    preFilter.setBlockMessage(updated.blockMessage);
    auditLog.setMaxEntries(updated.auditMaxEntries);
  });

  const gateway = createApiGateway(configManager);
  gateway.setPreFilter(preFilter);
  gateway.setAuditLog(auditLog);

  return { engine, configManager, preFilter, auditLog, gateway };
}

export function createGatewayFromEnv(env: NodeJS.ProcessEnv = process.env): ApiGateway {
  return createServices(env).gateway;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Status and message for request errors raised by the body parser.
 * Anything else is a server error.
 */
export function clientErrorFor(err: unknown): { status: number; message: string } | undefined {
  if (typeof err !== 'object' || err === null) return undefined;

  const type = 'type' in err ? err.type : undefined;
  if (type === 'entity.parse.failed') {
    return { status: 400, message: 'Malformed JSON body' };
  }
  if (type === 'entity.too.large') {
    return { status: 413, message: 'Request body too large' };
  }

  const status = 'status' in err ? err.status : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return { status, message: 'Invalid request body' };
  }
  return undefined;
}

/**
 * Build the Express application around a gateway
 */
export function createApp(gateway: ApiGateway): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors());

  // Before body parsing, so parse errors carry a request id too
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = headerValue(req.headers[REQUEST_ID_HEADER]) || uuidv4();
    res.locals.requestId = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);
    next();
  });

  app.use(express.json({ limit: '1mb' }));

  function buildContext(req: Request, res: Response): RequestContext {
    const requestId: unknown = res.locals.requestId;
    return {
      requestId: typeof requestId === 'string' ? requestId : uuidv4(),
      authHeader: req.headers.authorization,
      clientIp: req.ip || req.socket.remoteAddress || '0.0.0.0',
      userAgent: req.headers['user-agent'] || 'unknown'
    };
  }

  /**
   * POST /api/v1/analyze
   * Classify a prompt and return the mitigation verdict
   */
  app.post('/api/v1/analyze', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: unknown = req.body;
      const prompt = typeof body === 'object' && body !== null && 'prompt' in body ? body.prompt : undefined;
      const result = await gateway.analyze({ prompt }, buildContext(req, res));

      if (!result.success) {
        if (result.error.retryAfter !== undefined) {
          res.setHeader('Retry-After', String(result.error.retryAfter));
        }
        res.status(httpStatusFor(result)).json(result);
        return;
      }

      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/health
   */
  app.get('/api/v1/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const health = await gateway.healthCheck();
      res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /
   * API info
   */
  app.get('/', (_req: Request, res: Response) => {
    res.json({
      name: 'Promptward',
      version: '1.0.0',
      description: 'Prompt injection detection and mitigation',
      endpoints: {
        analyze: 'POST /api/v1/analyze',
        health: 'GET /api/v1/health'
      }
    });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const clientError = clientErrorFor(err);
    if (!clientError) {
      console.error('Server error:', err);
    }

    const status = clientError?.status ?? 500;
    const requestId: unknown = res.locals.requestId;
    res.status(status).json({
      success: false,
      error: {
        code: String(status),
        message: clientError?.message ?? 'Internal server error'
      },
      requestId: typeof requestId === 'string' ? requestId : uuidv4(),
      timestamp: new Date()
    });
  });

  return app;
}

/**
 * Start listening on PORT/HOST
 */
export function start(env: NodeJS.ProcessEnv = process.env): void {
  const gateway = createGatewayFromEnv(env);
  const app = createApp(gateway);

  const port = parseInt(env.PORT || '3000', 10);
  const host = env.HOST || '0.0.0.0';

  app.listen(port, host, () => {
    console.log(`Promptward listening on http://${host}:${port}`);
    console.log('  POST /api/v1/analyze  - Analyze a prompt');
    console.log('  GET  /api/v1/health   - Health check');
  });
}

if (require.main === module) {
  start();
}
