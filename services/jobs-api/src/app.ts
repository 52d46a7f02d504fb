/**
 * Jobs API
 *
 * Express application for creating reconciliation jobs, triggering and
 * reading validation, and resolving issues. Built by createApp so the server
 * entrypoint and the tests share one wiring.
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  isPipelineError,
  validateCreateJobRequest,
  validateResolutionRequest,
  RequestValidationError,
  ProcessingService,
  type ErrorEnvelope,
  type ExtractDocumentsJob,
} from '@tutorlog/shared';

export interface CapacityCheck {
  shouldWarn: boolean;
  shouldReject: boolean;
  depth: number;
}

export interface JobsApiDeps {
  service: ProcessingService;
  enqueueExtraction: (payload: ExtractDocumentsJob) => Promise<void>;
  checkCapacity?: () => Promise<CapacityCheck>;
  checkHealth?: () => Promise<void>;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function sendError(res: Response, status: number, code: string, message: string): void {
  const header = res.getHeader('X-Correlation-Id');
  const envelope: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: typeof header === 'string' ? header : getCorrelationId(),
    },
  };
  res.status(status).json(envelope);
}

/**
 * Wrap a route so thrown pipeline errors become an ErrorEnvelope with the
 * error's status; anything else is a 500.
 */
function route(name: string, handler: AsyncHandler) {
  return (req: Request, res: Response) => {
    handler(req, res).catch((error: unknown) => {
      if (isPipelineError(error)) {
        logger.warn(`${name} rejected`, { code: error.code, message: error.message });
        sendError(res, error.httpStatus, error.code, error.message);
        return;
      }
      logger.error(`${name} failed`, error);
      sendError(res, 500, 'internal_error', `Failed to ${name}`);
    });
  };
}

export function createApp(deps: JobsApiDeps): express.Express {
  const { service } = deps;
  const app = express();

  app.use(express.json());

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header !== '' ? header : ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const path = typeof routePath === 'string' ? routePath : req.path;
      const status = res.statusCode.toString();

      httpRequestDurationHistogram.observe({ method: req.method, path, status }, duration);
      httpRequestsCounter.inc({ method: req.method, path, status });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  app.get('/health', async (_req: Request, res: Response) => {
    try {
      if (deps.checkHealth) await deps.checkHealth();
      res.json({
        status: 'healthy',
        service: 'jobs-api',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'jobs-api',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  app.get(
    '/metrics',
    route('collect metrics', async (_req, res) => {
      const body = await getMetrics();
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(body);
    })
  );

  /**
   * POST /jobs
   * Registers the uploaded files and enqueues extraction
   */
  app.post(
    '/jobs',
    route('create job', async (req, res) => {
      const body = validateCreateJobRequest(req.body);
      if (!body.valid) {
        throw new RequestValidationError(`Invalid job request: ${body.errors.join('; ')}`, body.errors);
      }

      if (deps.checkCapacity) {
        const capacity = await deps.checkCapacity();
        if (capacity.shouldReject) {
          logger.warn('Rejecting job, extraction queue is full', { depth: capacity.depth });
          res.setHeader('Retry-After', '30');
          sendError(res, 503, 'backpressure', 'Extraction queue is full, retry later');
          return;
        }
        if (capacity.shouldWarn) {
          logger.warn('Extraction queue depth is high', { depth: capacity.depth });
        }
      }

      const job = await service.createJob(body.value);
      await deps.enqueueExtraction({ correlation_id: getCorrelationId(), job_id: job.id });

      res.status(202).json(job);
    })
  );

  app.get(
    '/jobs/:jobId',
    route('get job', async (req, res) => {
      res.json(await service.getJob(req.params.jobId));
    })
  );

  /**
   * POST /jobs/:jobId/validate
   * Runs validation synchronously, returning any stored result unchanged
   */
  app.post(
    '/jobs/:jobId/validate',
    route('validate job', async (req, res) => {
      res.json(await service.validateJob(req.params.jobId));
    })
  );

  app.get(
    '/jobs/:jobId/validation',
    route('get validation result', async (req, res) => {
      res.json(await service.getValidationResult(req.params.jobId));
    })
  );

  app.get(
    '/jobs/:jobId/validation/summary',
    route('get validation summary', async (req, res) => {
      res.json(await service.getValidationSummary(req.params.jobId));
    })
  );

  /**
   * POST /jobs/:jobId/resolve
   * Body: { resolutions: [{ issue_id, resolution, corrected_value? }] }
   */
  app.post(
    '/jobs/:jobId/resolve',
    route('resolve issues', async (req, res) => {
      const body = validateResolutionRequest(req.body);
      if (!body.valid) {
        throw new RequestValidationError(
          `Invalid resolution request: ${body.errors.join('; ')}`,
          body.errors
        );
      }
      res.json(await service.resolveIssues(req.params.jobId, body.value.resolutions));
    })
  );

  // Malformed JSON bodies and anything else thrown outside a route
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      sendError(res, 400, 'invalid_request', 'Request body is not valid JSON');
      return;
    }
    logger.error('Unhandled request error', error);
    sendError(res, 500, 'internal_error', 'Unexpected error');
  });

  return app;
}
