import express, { type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import Joi from 'joi';
import { v4 as uuidv4 } from 'uuid';
import type { IncomingMessage, Server } from 'http';
import type { ApiResponse, GateRejection, ItemOutcome } from './types/index.js';
import type { SearchGatewayConfig } from './config/types.js';
import { createProfileCache, type ProfileCache } from './storage/index.js';
import {
  AdminTokenAuthorizer,
  BatchSearchService,
  INVALID_BODY_MESSAGE,
  MaintenanceService,
  TaskAdmissionService,
  UnavailableProfileSearcher,
  UpstreamProfileSearcher,
  type AdminAuthorizer,
  type CallerContext,
  type ProfileSearcher,
} from './services/index.js';
import { validate, validateRegion, isValidationError } from './utils/validation.js';
import { logger, logHttpRequest } from './utils/logger.js';
import { metrics, GatewayMetrics } from './utils/metrics.js';

// Type guards for error handling
function isError(error: unknown): error is Error {
  return error instanceof Error;
}

function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  return String(error);
}

function logUnexpectedError(error: unknown, context: string, correlationId?: string): void {
  logger.error(`Unexpected error in ${context}`, {
    correlationId,
    errorMessage: getErrorMessage(error),
  }, isError(error) ? error : undefined);
}

/**
 * body-parser tags its failures with a `type`: malformed JSON is
 * `entity.parse.failed`, an oversized body `entity.too.large`
 */
function isBodyParserError(error: unknown): error is Error & { type: string } {
  return isError(error) && 'type' in error && typeof error.type === 'string';
}

// Requests whose body carried at least one byte before JSON decoding
const bodiesRead = new WeakSet<IncomingMessage>();

function recordBodyRead(req: IncomingMessage, _res: unknown, buf: Buffer): void {
  if (buf.length > 0) {
    bodiesRead.add(req);
  }
}

// Extend Express Request with the correlation ID
declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

const maintenanceToggleSchema = Joi.object<{ enabled: boolean }>({
  enabled: Joi.boolean().required(),
});

/**
 * Collaborators a test (or an embedding process) may supply instead of the
 * ones built from configuration
 */
export interface GatewayOverrides {
  cache?: ProfileCache;
  searcher?: ProfileSearcher;
  authorizer?: AdminAuthorizer;
}

interface GatewayServices {
  cache: ProfileCache;
  admission: TaskAdmissionService;
  maintenance: MaintenanceService;
  authorizer: AdminAuthorizer;
  batchSearch: BatchSearchService;
}

/**
 * HTTP server for the adventurer search gateway
 */
export class SearchGatewayHttpServer {
  private app: express.Application;
  private server: Server | undefined;
  private config: SearchGatewayConfig;
  private overrides: GatewayOverrides;
  private services: GatewayServices | undefined;

  constructor(config: SearchGatewayConfig, overrides: GatewayOverrides = {}) {
    this.config = config;
    this.overrides = overrides;
    logger.setLogLevel(config.logging.level);
    logger.setPretty(config.logging.pretty);
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  async initialize(): Promise<void> {
    if (this.services) {
      return;
    }

    const cache = this.overrides.cache ?? createProfileCache(this.config);
    await cache.initialize();

    const searcher = this.overrides.searcher ?? (this.config.scraper.upstreamUrl
      ? new UpstreamProfileSearcher(this.config.scraper.upstreamUrl, this.config.scraper.timeoutMs)
      : new UnavailableProfileSearcher());

    if (!this.config.scraper.upstreamUrl && !this.overrides.searcher) {
      logger.warn('No upstream configured; admitted searches will be cached as unavailable');
    }

    const admission = new TaskAdmissionService(searcher, cache, this.config.tasks);
    const maintenance = new MaintenanceService(this.config.maintenance.regions);
    const authorizer = this.overrides.authorizer ?? new AdminTokenAuthorizer(this.config.security.adminToken);

    this.services = {
      cache,
      admission,
      maintenance,
      authorizer,
      batchSearch: new BatchSearchService({
        cache,
        admission,
        authorizer,
        maintenance,
        maxQueries: this.config.batch.maxQueries,
      }),
    };
  }

  getApp(): express.Application {
    return this.app;
  }

  getServices(): GatewayServices {
    if (!this.services) {
      throw new Error('Search gateway not initialized. Call initialize() first.');
    }
    return this.services;
  }

  async start(): Promise<void> {
    try {
      await this.initialize();
      logger.info('Search gateway initialized successfully', {
        host: this.config.server.host,
        port: this.config.server.port,
        cache: this.config.cache.provider
      });

      return new Promise((resolve) => {
        this.server = this.app.listen(this.config.server.port, this.config.server.host, () => {
          logger.info('Search gateway started successfully', {
            url: `http://${this.config.server.host}:${this.config.server.port}`
          });
          resolve();
        });
      });
    } catch (error) {
      logUnexpectedError(error, 'start search gateway');
      throw error;
    }
  }

  async stop(): Promise<void> {
    try {
      logger.info('Stopping search gateway...');

      const server = this.server;
      if (server) {
        await new Promise<void>((resolve) => {
          server.close(() => resolve());
        });
        this.server = undefined;
      }

      if (this.services) {
        await this.services.admission.drain();
        await this.services.cache.close();
        this.services = undefined;
      }

      logger.info('Search gateway shutdown complete');
    } catch (error) {
      logUnexpectedError(error, 'server shutdown');
      throw error;
    }
  }

  private setupMiddleware(): void {
    // Correlation ID and request logging - placed first to catch all requests
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const startTime = Date.now();
      const correlationId = req.get('x-correlation-id') || uuidv4();

      req.correlationId = correlationId;
      res.setHeader('X-Correlation-ID', correlationId);

      metrics.incrementCounter(GatewayMetrics.httpRequestsTotal, { method: req.method, path: req.path });
      metrics.incrementGauge(GatewayMetrics.httpRequestsInFlight);

      res.on('finish', () => {
        const duration = Date.now() - startTime;
        logHttpRequest(req.method, req.path, res.statusCode, duration, {
          correlationId,
          userAgent: req.get('user-agent'),
          ip: req.ip
        });
        metrics.observeHistogram(GatewayMetrics.httpRequestDuration, duration / 1000, {
          method: req.method,
          status: res.statusCode.toString()
        });
        metrics.decrementGauge(GatewayMetrics.httpRequestsInFlight);
      });

      next();
    });

    // Security middleware
    this.app.use(helmet());
    this.app.use(cors({
      origin: process.env.CORS_ORIGIN || '*',
      exposedHeaders: ['X-Batch-Size', 'X-Correlation-ID']
    }));

    const limiter = rateLimit({
      windowMs: this.config.security.rateLimit.windowMs,
      limit: this.config.security.rateLimit.max,
      standardHeaders: true,
      legacyHeaders: false,
      keyGenerator: (req: Request) => this.callerContext(req).clientId,
      message: { success: false, error: 'Too many requests, please try again later.' }
    });
    this.app.use('/v1/', limiter);

    this.app.use(express.json({ limit: this.config.server.bodyLimit, verify: recordBodyRead }));
  }

  private setupRoutes(): void {
    // Health check and monitoring endpoints
    this.app.get('/health', this.handleHealthCheck.bind(this));
    this.app.get('/metrics', this.handleMetrics.bind(this));
    this.app.get('/metrics/json', this.handleMetricsJson.bind(this));

    this.app.use('/v1', this.createApiRouter());

    // 404 handler
    this.app.use((req: Request, res: Response) => {
      logger.warn('Route not found', {
        correlationId: req.correlationId,
        method: req.method,
        path: req.path
      });
      this.sendError(res, 'Not Found', 404, req.correlationId);
    });

    // Global error handler - express only recognizes it by its four parameters
    this.app.use((error: Error, req: Request, res: Response, _next: NextFunction) => {
      if (isBodyParserError(error) && (error.type === 'entity.parse.failed' || error.type === 'entity.too.large')) {
        logger.debug('Rejected unreadable request body', {
          correlationId: req.correlationId,
          path: req.path,
          bodyError: error.type
        });
        this.sendError(res, INVALID_BODY_MESSAGE, 400, req.correlationId);
        return;
      }

      logger.error('Unhandled exception in HTTP request', {
        correlationId: req.correlationId,
        method: req.method,
        path: req.path
      }, error);

      metrics.incrementCounter(GatewayMetrics.httpErrorsTotal, {
        method: req.method,
        error_type: error.name
      });

      // Never expose internal error details to clients in production
      const isProduction = process.env.NODE_ENV === 'production';
      this.sendError(res, isProduction ? 'Internal Server Error' : error.message, 500, req.correlationId);
    });
  }

  private createApiRouter(): express.Router {
    const router = express.Router();

    // Batch bodies are decoded as JSON whatever their content type
    router.post(
      '/adventurer/search/batch',
      express.json({ limit: this.config.server.bodyLimit, type: () => true, verify: recordBodyRead }),
      this.handleSearchBatch.bind(this)
    );
    router.get('/adventurer/search', this.handleSearch.bind(this));

    router.get('/admin/maintenance', this.handleListMaintenance.bind(this));
    router.put('/admin/maintenance/:region', this.handleSetMaintenance.bind(this));

    return router;
  }

  private async handleMetrics(req: Request, res: Response): Promise<void> {
    try {
      res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
      res.send(metrics.getPrometheusMetrics());
    } catch (error) {
      logUnexpectedError(error, 'generate Prometheus metrics', req.correlationId);
      this.sendError(res, 'Failed to generate metrics', 500, req.correlationId);
    }
  }

  private async handleMetricsJson(req: Request, res: Response): Promise<void> {
    try {
      this.sendSuccess(res, {
        ...metrics.getJsonMetrics(),
        system: metrics.getSystemMetrics()
      });
    } catch (error) {
      logUnexpectedError(error, 'generate JSON metrics', req.correlationId);
      this.sendError(res, 'Failed to generate metrics', 500, req.correlationId);
    }
  }

  private async handleHealthCheck(req: Request, res: Response): Promise<void> {
    try {
      const services = this.getServices();
      const health = await services.cache.healthCheck();

      if (!health.healthy) {
        logger.warn('Health check failed - cache unhealthy', {
          correlationId: req.correlationId,
          cache: health
        });
      }

      res.status(health.healthy ? 200 : 503).json({
        status: health.healthy ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        version: process.env.npm_package_version || '1.0.0',
        cache: health,
        tasks: services.admission.getStatus(),
        maintenance: services.maintenance.listRegions()
      });
    } catch (error) {
      logUnexpectedError(error, 'health check endpoint', req.correlationId);

      res.status(503).json({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: 'Cache health check failed'
      });
    }
  }

  private async handleSearchBatch(req: Request, res: Response): Promise<void> {
    try {
      const { batchSearch } = this.getServices();
      // An empty or missing body has nothing to decode
      const body: unknown = bodiesRead.has(req) ? req.body : null;
      const gate = batchSearch.admitBatch(body, this.callerContext(req));

      if (!gate.ok) {
        metrics.incrementCounter(GatewayMetrics.batchRejectedTotal, { reason: gate.rejection.kind });
        logger.info('Batch rejected at precondition gate', {
          correlationId: req.correlationId,
          reason: gate.rejection.kind,
          message: gate.rejection.message
        });
        this.sendRejection(res, gate.rejection, req.correlationId);
        return;
      }

      const response = await batchSearch.processBatch(gate.batch, { correlationId: req.correlationId });

      res.setHeader('X-Batch-Size', String(gate.batch.queries.length));
      res.json(response);
    } catch (error) {
      logUnexpectedError(error, 'batch search', req.correlationId);
      this.sendError(res, getErrorMessage(error), 500, req.correlationId);
    }
  }

  private async handleSearch(req: Request, res: Response): Promise<void> {
    try {
      const { batchSearch } = this.getServices();
      const result = await batchSearch.searchOne({
        region: this.queryParam(req, 'region'),
        query: this.queryParam(req, 'query'),
        searchType: this.queryParam(req, 'searchType')
      }, this.callerContext(req));

      if (!result.ok) {
        this.sendRejection(res, result.rejection, req.correlationId);
        return;
      }

      this.sendOutcome(res, result.outcome, req.correlationId);
    } catch (error) {
      logUnexpectedError(error, 'adventurer search', req.correlationId);
      this.sendError(res, getErrorMessage(error), 500, req.correlationId);
    }
  }

  private async handleListMaintenance(req: Request, res: Response): Promise<void> {
    try {
      const { maintenance } = this.getServices();
      this.sendSuccess(res, { regions: maintenance.listRegions() });
    } catch (error) {
      logUnexpectedError(error, 'list maintenance', req.correlationId);
      this.sendError(res, getErrorMessage(error), 500, req.correlationId);
    }
  }

  private async handleSetMaintenance(req: Request, res: Response): Promise<void> {
    try {
      const { authorizer, maintenance } = this.getServices();

      if (!authorizer.isAuthorizedForBypass(req.get('authorization'))) {
        logger.warn('Maintenance toggle refused - not an admin', {
          correlationId: req.correlationId,
          ip: req.ip
        });
        this.sendError(res, 'Admin token required', 401, req.correlationId);
        return;
      }

      const region = validateRegion([req.params.region ?? '']);
      if (!region.ok) {
        this.sendError(res, region.message, 400, req.correlationId);
        return;
      }

      const { enabled } = validate(maintenanceToggleSchema, req.body);
      maintenance.setMaintenance(region.value, enabled);
      this.sendSuccess(res, { region: region.value, maintenance: enabled });
    } catch (error) {
      if (isValidationError(error)) {
        this.sendError(res, getErrorMessage(error), 400, req.correlationId);
      } else {
        logUnexpectedError(error, 'set maintenance', req.correlationId);
        this.sendError(res, getErrorMessage(error), 500, req.correlationId);
      }
    }
  }

  // Helper methods
  private callerContext(req: Request): CallerContext {
    return {
      clientId: req.get(this.config.server.clientIpHeader) || req.ip || 'unknown',
      credential: req.get('authorization'),
      correlationId: req.correlationId
    };
  }

  private queryParam(req: Request, name: string): string | undefined {
    const value = req.query[name];
    if (Array.isArray(value)) {
      const first = value[0];
      return typeof first === 'string' ? first : undefined;
    }
    return typeof value === 'string' ? value : undefined;
  }

  private sendOutcome(res: Response, outcome: ItemOutcome, correlationId?: string): void {
    switch (outcome.status) {
      case 'cached':
        this.sendSuccess(res, outcome.data ?? [], outcome.httpStatus);
        return;
      case 'started':
      case 'pending':
        this.sendSuccess(res, { query: outcome.query, status: outcome.status }, outcome.httpStatus);
        return;
      case 'invalid':
      case 'rejected':
      case 'error':
        this.sendError(res, outcome.error ?? 'Search failed', outcome.httpStatus, correlationId);
        return;
    }
  }

  private sendRejection(res: Response, rejection: GateRejection, correlationId?: string): void {
    if (rejection.kind === 'maintenance') {
      res.status(503).json({
        success: false,
        error: rejection.message,
        maintenance: true,
        timestamp: new Date()
      });
      return;
    }
    this.sendError(res, rejection.message, 400, correlationId);
  }

  private sendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
    const response: ApiResponse<T> = {
      success: true,
      data,
      timestamp: new Date()
    };
    res.status(statusCode).json(response);
  }

  private sendError(res: Response, message: string, statusCode: number = 500, correlationId?: string): void {
    const response: ApiResponse<null> = {
      success: false,
      error: message,
      timestamp: new Date()
    };

    if (correlationId) {
      res.setHeader('X-Correlation-ID', correlationId);
    }

    res.status(statusCode).json(response);
  }
}
