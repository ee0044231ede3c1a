import express from 'express';
import rateLimit from 'express-rate-limit';
import { config } from './config';
import { AppError, internalError, invalidRequest, notFound, rateLimited } from './utils/errors';

// Routes
import demoRoutes from './routes/demo';
import evaluateRoutes from './routes/evaluate';
import rateLimitRoutes from './routes/rate-limit';

export interface AppOptions {
  // Requests per minute per client; 0 disables the limiter
  rateLimitRpm?: number;
}

export function createApp(options: AppOptions = {}): express.Express {
  const app = express();
  const rpm = options.rateLimitRpm ?? config.RATE_LIMIT_RPM;

  // Body parser with 64kb limit
  app.use(express.json({ limit: '64kb' }));

  // Handle body parser errors (oversized or malformed body)
  app.use((err: Error & { type?: string }, _req: express.Request, _res: express.Response, next: express.NextFunction) => {
    if (err.type === 'entity.too.large') {
      return next(invalidRequest('Request body exceeds 64kb limit'));
    }
    if (err.type === 'entity.parse.failed') {
      return next(invalidRequest('Request body is not valid JSON'));
    }
    next(err);
  });

  if (rpm > 0) {
    app.use(rateLimit({
      windowMs: 60 * 1000, // 1 minute
      max: rpm,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (_req, res) => {
        const err = rateLimited(60);
        res.status(err.statusCode).json(err.toJSON());
      },
    }));
  }

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/demo', demoRoutes);
  app.use('/node/evaluate', evaluateRoutes);
  app.use('/rate-limit', rateLimitRoutes);

  app.use((req, _res, next) => {
    next(notFound(req.path));
  });

  // Error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof AppError) {
      return res.status(err.statusCode).json(err.toJSON());
    }
    console.error('[server] Unhandled error:', err);
    const internal = internalError('An unexpected error occurred');
    res.status(internal.statusCode).json(internal.toJSON());
  });

  return app;
}
