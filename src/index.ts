import express, { Request, Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { config, ServerConfig } from './config';
import { AppError, ValidationError } from './errors';
import { CompetitionService, UpdateQuotaInput } from './competition';
import { MemoryStore } from './memoryStore';
import { applySeed, loadSeedFile } from './seed';
import { createCategoryRuleSet } from './categoryRules';
import { createScoringEngine, DEFAULT_POINT_TABLE } from './scoring';

// ============================================================================
// Request parsing
// ============================================================================

type Body = Record<string, unknown>;

function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function bodyOf(req: Request): Body {
  const body: unknown = req.body;
  if (!isBody(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}

/**
 * Parses a numeric path or query parameter
 */
function numericParam(value: unknown, name: string): number {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new ValidationError(`Invalid parameter format: ${name} must be numeric`);
  }
  return parseInt(value, 10);
}

function optionalNumericQuery(value: unknown, name: string): number | undefined {
  return value === undefined ? undefined : numericParam(value, name);
}

function readId(body: Body, key: string): number {
  const value = body[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ValidationError(`'${key}' must be a positive integer`);
  }
  return value;
}

function readOptionalId(body: Body, key: string): number | undefined {
  return body[key] === undefined ? undefined : readId(body, key);
}

function readIdList(body: Body, key: string): number[] {
  const value = body[key];
  if (!Array.isArray(value)) {
    throw new ValidationError(`'${key}' must be a list of ids`);
  }
  return value.map((item: unknown) => {
    if (typeof item !== 'number' || !Number.isInteger(item) || item < 1) {
      throw new ValidationError(`'${key}' must only contain positive integers`);
    }
    return item;
  });
}

function readOptionalAmount(body: Body, key: string): number | null | undefined {
  const value = body[key];
  if (value === undefined || value === null) return value;
  if (typeof value !== 'number') {
    throw new ValidationError(`'${key}' must be a number or null`);
  }
  return value;
}

function readAttempts(body: Body): Array<number | null> {
  const value = body.attempts;
  if (!Array.isArray(value)) {
    throw new ValidationError(`'attempts' must be a list of times in seconds`);
  }
  return value.map((item: unknown) => {
    if (item !== null && typeof item !== 'number') {
      throw new ValidationError(`'attempts' must only contain numbers or null`);
    }
    return item;
  });
}

function readOptionalBoolean(body: Body, key: string): boolean | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new ValidationError(`'${key}' must be a boolean`);
  }
  return value;
}

function readOptionalString(body: Body, key: string): string | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`'${key}' must be a string`);
  }
  return value;
}

// ============================================================================
// Responses
// ============================================================================

function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      console.error(`[HTTP] ${context} failed: ${error.message}`);
    }
    res.status(error.statusCode).json({
      error: error.message,
      code: error.code,
      timestamp: new Date().toISOString(),
      ...(process.env.NODE_ENV === 'development' && error.cause ? { details: String(error.cause) } : {})
    });
    return;
  }
  console.error(`[HTTP] Unexpected error during ${context}:`, error);
  res.status(500).json({
    error: `Failed to ${context}`,
    code: 'INTERNAL_ERROR',
    timestamp: new Date().toISOString()
  });
}

/**
 * Runs a handler and writes its result as JSON, or the error response
 */
async function respond(res: Response, context: string, work: () => Promise<unknown>, status = 200): Promise<void> {
  try {
    const body = await work();
    res.status(status).json(body);
  } catch (error) {
    sendError(res, error, context);
  }
}

// ============================================================================
// Application
// ============================================================================

export interface AppOptions {
  /** Record counts reported by /health */
  storeStats?: () => Record<string, number>;
  settings?: Pick<ServerConfig, 'rateLimitEnabled' | 'rateLimitWindowMs' | 'rateLimitMax' | 'nodeEnv'>;
}

/**
 * Builds the Express application around a competition service.
 * Exported for testing purposes (e.g., with supertest).
 */
export function createApp(service: CompetitionService, options: AppOptions = {}): express.Express {
  const settings = options.settings ?? config;
  const app = express();

  // Trust proxy - required when behind a reverse proxy
  app.set('trust proxy', true);
  app.use(cors());
  app.use(express.json());

  // Apply rate limiting to API routes (skip in test environment)
  if (settings.rateLimitEnabled && settings.nodeEnv !== 'test') {
    app.use('/api/', rateLimit({
      windowMs: settings.rateLimitWindowMs,
      limit: settings.rateLimitMax,
      message: {
        error: 'Too many requests from this IP, please try again later',
        code: 'RATE_LIMIT_EXCEEDED',
      },
      standardHeaders: true,
      legacyHeaders: false,
    }));
  }

  /**
   * Dry-run trio validation. A rejected composition is an answer, not an error.
   *
   * @route POST /api/trios/validate
   * @example
   * POST /api/trios/validate
   * Body: { "categoryId": 6, "competitorIds": [1, 2, 3] }
   */
  app.post('/api/trios/validate', (req, res) => respond(res, 'validate trio', () => {
    const body = bodyOf(req);
    return service.validateTrio(readId(body, 'categoryId'), readIdList(body, 'competitorIds'));
  }));

  /**
   * @route POST /api/trios
   * @throws {400} If the composition fails the category rules
   */
  app.post('/api/trios', (req, res) => respond(res, 'create trio', () => {
    const body = bodyOf(req);
    return service.createTrio({
      eventId: readId(body, 'eventId'),
      categoryId: readId(body, 'categoryId'),
      competitorIds: readIdList(body, 'competitorIds'),
      number: readOptionalId(body, 'number'),
    });
  }, 201));

  /**
   * Random draw of trios from a pool of competitors
   *
   * @route POST /api/trios/draw
   */
  app.post('/api/trios/draw', (req, res) => respond(res, 'draw trios', () => {
    const body = bodyOf(req);
    return service.drawTrios({
      eventId: readId(body, 'eventId'),
      categoryId: readId(body, 'categoryId'),
      competitorIds: readIdList(body, 'competitorIds'),
      runsPerCompetitor: readOptionalId(body, 'runsPerCompetitor'),
    });
  }, 201));

  app.delete('/api/trios/:id', (req, res) => respond(res, 'delete trio', async () =>
    service.deleteTrio(numericParam(req.params.id, 'id'))
  ));

  /**
   * @route POST /api/quotas
   * @throws {409} If the competitor already has a quota for the event/category
   */
  app.post('/api/quotas', (req, res) => respond(res, 'create quota', () => {
    const body = bodyOf(req);
    return service.createQuota({
      competitorId: readId(body, 'competitorId'),
      eventId: readId(body, 'eventId'),
      categoryId: readId(body, 'categoryId'),
      maxRunsAllowed: readOptionalId(body, 'maxRunsAllowed'),
    });
  }, 201));

  /**
   * Administrative quota changes: run limit (with override), block, unblock
   *
   * @route PUT /api/quotas/:id
   * @example
   * PUT /api/quotas/4
   * Body: { "mayCompete": false, "blockReason": "Unpaid entry fee" }
   */
  app.put('/api/quotas/:id', (req, res) => respond(res, 'update quota', () => {
    const id = numericParam(req.params.id, 'id');
    const body = bodyOf(req);
    const changes: UpdateQuotaInput = {
      maxRunsAllowed: readOptionalId(body, 'maxRunsAllowed'),
      override: readOptionalBoolean(body, 'override'),
      mayCompete: readOptionalBoolean(body, 'mayCompete'),
      blockReason: readOptionalString(body, 'blockReason'),
    };
    return service.updateQuota(id, changes);
  }));

  app.post('/api/quotas/auto-provision/:competitorId', (req, res) => respond(res, 'provision quotas', async () =>
    service.autoProvisionQuotas(numericParam(req.params.competitorId, 'competitorId'))
  ));

  app.get('/api/quotas/can-compete/:competitorId/:eventId/:categoryId', (req, res) =>
    respond(res, 'check quota', async () => service.checkCanCompete({
      competitorId: numericParam(req.params.competitorId, 'competitorId'),
      eventId: numericParam(req.params.eventId, 'eventId'),
      categoryId: numericParam(req.params.categoryId, 'categoryId'),
    }))
  );

  app.post('/api/results', (req, res) => respond(res, 'create result', () => {
    const body = bodyOf(req);
    return service.createResult({
      trioId: readId(body, 'trioId'),
      prize: readOptionalAmount(body, 'prize'),
    });
  }, 201));

  /**
   * Records a run for a result and counts it against the members' quotas
   *
   * @route PUT /api/results/:id/run
   * @throws {409} If a member's quota is exhausted or blocked
   * @example
   * PUT /api/results/7/run
   * Body: { "attempts": [8.41, 9.02], "prize": 1500 }
   */
  app.put('/api/results/:id/run', (req, res) => respond(res, 'record run', () => {
    const id = numericParam(req.params.id, 'id');
    const body = bodyOf(req);
    return service.recordRun(id, {
      attempts: readAttempts(body),
      noTime: readOptionalBoolean(body, 'noTime'),
      disqualified: readOptionalBoolean(body, 'disqualified'),
      prize: readOptionalAmount(body, 'prize'),
    });
  }));

  app.post('/api/events/:eventId/placements', (req, res) => respond(res, 'recompute placements', async () =>
    service.recomputePlacements(
      numericParam(req.params.eventId, 'eventId'),
      optionalNumericQuery(req.query.categoryId, 'categoryId')
    )
  ));

  app.post('/api/events/:eventId/scores', (req, res) => respond(res, 'compute scores', async () =>
    service.computeScores(
      numericParam(req.params.eventId, 'eventId'),
      optionalNumericQuery(req.query.categoryId, 'categoryId')
    )
  ));

  app.get('/api/events/:eventId/consistency', (req, res) => respond(res, 'check consistency', async () =>
    service.consistencyReport(numericParam(req.params.eventId, 'eventId'))
  ));

  /**
   * Health check endpoint for monitoring and load balancers
   *
   * @route GET /health
   */
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      memory: {
        heapUsed: Math.round(process.memoryUsage().heapUsed / 1024 / 1024), // MB
        rss: Math.round(process.memoryUsage().rss / 1024 / 1024) // MB
      },
      ...(options.storeStats ? { store: options.storeStats() } : {})
    });
  });

  return app;
}

/**
 * Wires the service from configuration over an in-memory store,
 * seeded from SEED_FILE when set.
 */
export function createDefaultService(settings: ServerConfig = config): { service: CompetitionService; store: MemoryStore } {
  const store = new MemoryStore(settings.transactionTimeoutMs);
  if (settings.seedFile) {
    applySeed(store, loadSeedFile(settings.seedFile));
  }
  const service = new CompetitionService({
    store,
    rules: createCategoryRuleSet(),
    scoring: createScoringEngine(DEFAULT_POINT_TABLE, { prizePointBase: settings.prizePointBase }),
    defaultMaxRuns: settings.defaultMaxRuns,
    prizeDiscountPercent: settings.prizeDiscountPercent,
    transactionTimeoutMs: settings.transactionTimeoutMs,
  });
  return { service, store };
}

const defaults = createDefaultService();

/**
 * Express application instance over the default service.
 * Exported for testing purposes (e.g., with supertest).
 */
export const app = createApp(defaults.service, { storeStats: () => defaults.store.stats() });

// Only start server if not in test environment
if (process.env.NODE_ENV !== 'test' && !process.env.JEST_WORKER_ID) {
  app.listen(config.port, '0.0.0.0', () => {
    // eslint-disable-next-line no-console
    console.log(`Server running on port ${config.port}`);
  });
}
