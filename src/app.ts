import express, { Request, Response, NextFunction, RequestHandler } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import multer, { MulterError } from 'multer';
import { PipelineError } from './errors';
import { HealthStatus, ObjectStore, PipelineReport, Rasterizer, RequestFields } from './types';

export interface PipelineRunner {
  run(fields: RequestFields): Promise<PipelineReport>;
}

export interface AppDeps {
  pipeline: PipelineRunner;
  store: Pick<ObjectStore, 'checkHealth'>;
  rasterizer: Pick<Rasterizer, 'checkHealth'>;
  auth?: RequestHandler;
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
}

// allow at most 1 MB of form data
const MAX_FIELD_BYTES = 1024 * 1024;

function fieldsOf(body: unknown): RequestFields {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return {};
  }
  return { ...body };
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  const limiter = rateLimit({
    windowMs: deps.rateLimitWindowMs,
    limit: deps.rateLimitMaxRequests,
    message: 'Too many requests from this IP, please try again later.'
  });
  app.use(limiter);

  // form fields only, no file parts
  const form = multer({ limits: { fieldSize: MAX_FIELD_BYTES, files: 0 } });
  const authenticate: RequestHandler = deps.auth ?? ((_req, _res, next) => next());

  // Liveness
  app.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  // Readiness of the store and the rasterizer
  app.get('/health', async (_req: Request, res: Response): Promise<void> => {
    const [storageUp, rasterizerUp] = await Promise.all([deps.store.checkHealth(), deps.rasterizer.checkHealth()]);
    const health: HealthStatus = {
      status: storageUp && rasterizerUp ? 'ok' : 'error',
      timestamp: new Date().toISOString(),
      services: {
        storage: storageUp ? 'up' : 'down',
        rasterizer: rasterizerUp ? 'up' : 'down'
      }
    };
    res.status(health.status === 'ok' ? 200 : 503).json(health);
  });

  // Render a stored PDF and publish its page images
  app.post('/convert', authenticate, form.none(), async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const fields = fieldsOf(req.body);
      console.log(`Converting ${String(fields.pdf)}...`);

      const report = await deps.pipeline.run(fields);
      res.status(report.status === 'completed' ? 200 : 500).json(report);
    } catch (error) {
      next(error);
    }
  });

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof PipelineError) {
      console.error(`Request failed (${err.code}):`, err.message);
      res.status(err.statusCode).json(err.toJSON());
      return;
    }

    console.error('Error:', err);

    if (err instanceof MulterError) {
      res.status(400).json({
        error: 'Form upload error',
        message: err.message
      });
      return;
    }

    res.status(500).json({
      error: 'Internal server error',
      message: err.message
    });
  });

  // 404 handler
  app.use((_req: Request, res: Response): void => {
    res.status(404).json({
      error: 'Not found',
      message: 'The requested endpoint does not exist'
    });
  });

  return app;
}
