/**
 * API Gateway - transport-agnostic request handling for Promptward
 */

import {
  ErrorResponse,
  ApiResponse,
  AnalysisResponse,
  HealthCheckResponse
} from '../types/api';
import { IPreFilter, PreFilterRequest } from '../types';
import { IAuditLog } from '../types/logging';
import { ServiceConfig } from '../types/config';
import { InvalidInputError, requirePrompt } from '../errors';
import { createAuditEntry } from '../logging/audit-log';
import { ConfigurationManager } from '../config/configuration-manager';
import { AuthMiddleware, createAuthMiddleware } from './middleware/auth';
import { RateLimiter, createRateLimiter } from './middleware/rate-limiter';
import { renderVerdict } from './render';

/** Analyze request body */
export interface AnalyzeRequest {
  prompt?: unknown;
}

/** Gateway request context */
export interface RequestContext {
  requestId: string;
  authHeader?: string;
  clientIp: string;
  userAgent: string;
}

/**
 * API Gateway implementation
 */
export class ApiGateway {
  private preFilter?: IPreFilter;
  private auditLog?: IAuditLog;
  private configManager: ConfigurationManager;
  private authMiddleware: AuthMiddleware;
  private rateLimiter: RateLimiter;

  constructor(configManager: ConfigurationManager) {
    this.configManager = configManager;
    const config = configManager.snapshot();
    this.authMiddleware = createAuthMiddleware(config.apiTokens);
    this.rateLimiter = createRateLimiter(config.rateLimit);
    configManager.onChange(updated => this.applyConfig(updated));
  }

  /**
   * Set components
   */
  setPreFilter(filter: IPreFilter): void {
    this.preFilter = filter;
  }

  setAuditLog(log: IAuditLog): void {
    this.auditLog = log;
  }

  setRateLimiter(limiter: RateLimiter): void {
    this.rateLimiter = limiter;
  }

  /**
   * POST /api/v1/analyze
   */
  async analyze(
    body: AnalyzeRequest | undefined,
    context: RequestContext
  ): Promise<ApiResponse<AnalysisResponse>> {
    const { requestId } = context;
    const config = this.configManager.snapshot();

    if (config.enableAuth) {
      const authResult = await this.authMiddleware.authenticate(context.authHeader);
      if (!authResult.authenticated) {
        return this.createErrorResponse(requestId, '401', authResult.error || 'Unauthorized');
      }
    }

    if (config.enableRateLimit) {
      const rateLimitResult = this.rateLimiter.checkLimit(context.clientIp);
      if (!rateLimitResult.allowed) {
        return this.createErrorResponse(
          requestId,
          '429',
          'Rate limit exceeded',
          Math.ceil((rateLimitResult.retryAfterMs || 0) / 1000)
        );
      }
    }

    let prompt: string;
    try {
      prompt = requirePrompt(body?.prompt);
    } catch (error) {
      if (error instanceof InvalidInputError) {
        return this.createErrorResponse(requestId, '400', error.message);
      }
      throw error;
    }

    if (!this.preFilter) {
      return this.createErrorResponse(requestId, '503', 'Pre-filter service unavailable');
    }

    const preFilterRequest: PreFilterRequest = {
      requestId,
      prompt,
      metadata: { clientIp: context.clientIp, userAgent: context.userAgent },
      timestamp: new Date()
    };

    const result = await this.preFilter.analyze(preFilterRequest);
    if (!result.verdict) {
      return this.createErrorResponse(requestId, '500', 'Internal server error');
    }

    if (this.auditLog) {
      await this.auditLog.record(createAuditEntry({
        requestId,
        clientIp: context.clientIp,
        verdict: result.verdict,
        logPrompt: config.logPrompts
      }));
    }

    return {
      success: true,
      data: renderVerdict(result.verdict, result),
      requestId,
      timestamp: new Date()
    };
  }

  /**
   * GET /api/v1/health
   */
  async healthCheck(): Promise<HealthCheckResponse> {
    const preFilterStatus = this.preFilter?.getStatus();
    const preFilterHealthy = preFilterStatus?.healthy ?? false;
    const auditLogReady = !!this.auditLog;

    let status: HealthCheckResponse['status'] = 'unhealthy';
    if (preFilterHealthy) {
      status = auditLogReady ? 'healthy' : 'degraded';
    }

    return {
      status,
      components: {
        preFilter: preFilterHealthy,
        auditLog: auditLogReady,
        configManager: true
      },
      rulesLoaded: preFilterStatus?.rulesLoaded ?? 0,
      timestamp: new Date()
    };
  }

  getRateLimiter(): RateLimiter {
    return this.rateLimiter;
  }

  private applyConfig(config: ServiceConfig): void {
    this.authMiddleware = createAuthMiddleware(config.apiTokens);
    this.rateLimiter.updateSettings(config.rateLimit);
  }

  /**
   * Create error response
   */
  private createErrorResponse(
    requestId: string,
    code: string,
    message: string,
    retryAfter?: number
  ): ErrorResponse {
    return {
      success: false,
      error: {
        code,
        message,
        retryAfter
      },
      requestId,
      timestamp: new Date()
    };
  }
}

/**
 * Create API Gateway instance
 */
export function createApiGateway(configManager: ConfigurationManager): ApiGateway {
  return new ApiGateway(configManager);
}

/**
 * HTTP status for a gateway error code
 */
export function httpStatusFor(response: ErrorResponse): number {
  const status = parseInt(response.error.code, 10);
  return Number.isNaN(status) ? 500 : status;
}
