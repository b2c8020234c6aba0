import express, { Request, Response, NextFunction, Express } from 'express';
import http from 'http';
import {
  Config,
  MetadataError,
  MetricsError,
  ResolutionError,
  ValidationError,
} from '../types/index.js';
import { createMetricsService, RegulatoryMetricsService } from '../analysis/service.js';
import { createChildLogger } from '../utils/logger.js';

interface ApiServer {
  app: Express;
  service: RegulatoryMetricsService;
}

type MetricField = 'wordCount' | 'checksum' | 'complexity';

const logger = createChildLogger('api-server');

function queryString(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }
  return undefined;
}

function queryStrings(value: unknown): string[] {
  const values = Array.isArray(value) ? value : [value];
  return values.filter((item): item is string => typeof item === 'string' && item.trim().length > 0);
}

function errorStatus(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof ResolutionError) return 404;
  if (error instanceof MetadataError) return 502;
  return 500;
}

/**
 * Create and configure the Express API server
 */
export function createApiServer(service: RegulatoryMetricsService, defaultDate: string): ApiServer {
  const app = express();
  app.use(express.json());

  // Request logging middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info({
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration: Date.now() - start,
      });
    });
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy' });
  });

  // GET /api/agencies
  app.get('/api/agencies', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await service.listAgencies());
    } catch (error) {
      next(error);
    }
  });

  // GET /api/agency_sections?agency=A&date=YYYY-MM-DD
  app.get('/api/agency_sections', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const agency = queryString(req.query.agency);
      const date = queryString(req.query.date);

      if (!agency || !date) {
        res.status(400).json({ error: 'agency and date are required' });
        return;
      }

      const sections = await service.sections(agency, date);
      if (Object.keys(sections).length === 0) {
        res.status(404).json({ error: 'No sections found for this agency.' });
        return;
      }

      res.json({ agency, sections });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/historical?agency=A&dates=YYYY-MM-DD&dates=YYYY-MM-DD
  app.get('/api/historical', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const agency = queryString(req.query.agency);
      const dates = queryStrings(req.query.dates);

      if (!agency) {
        res.status(400).json({ error: 'Agency must be specified.' });
        return;
      }

      res.json(await service.history(dates, agency));
    } catch (error) {
      next(error);
    }
  });

  const metricRoute = (path: string, field: MetricField) => {
    // GET <path>?agency=A&date=YYYY-MM-DD
    app.get(path, async (req: Request, res: Response, next: NextFunction) => {
      try {
        const date = queryString(req.query.date) ?? defaultDate;
        const agency = queryString(req.query.agency);
        const report = await service.analyze(date, agency);

        const values: Record<string, string | number | null> = {};
        for (const [name, metrics] of Object.entries(report.agencies)) {
          values[name] = metrics[field];
        }
        res.json(values);
      } catch (error) {
        next(error);
      }
    });
  };

  metricRoute('/api/wordcount', 'wordCount');
  metricRoute('/api/checksums', 'checksum');
  metricRoute('/api/complexity', 'complexity');

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    if (status >= 500) {
      logger.error({ error: err }, 'Request failed');
    }

    if (err instanceof MetricsError) {
      res.status(status).json({
        error: err.message,
        code: err.code,
      });
      return;
    }

    res.status(500).json({
      error: 'Internal server error',
    });
  });

  return { app, service };
}

/**
 * Start the API server with graceful shutdown
 */
export async function startServer(config: Config, port: number = config.server.port): Promise<http.Server> {
  const { app } = createApiServer(createMetricsService(config), config.analysis.defaultDate);

  const server = http.createServer(app);

  const gracefulShutdown = (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal, closing server...');

    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force exit if graceful shutdown takes too long
    setTimeout(() => {
      logger.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  await new Promise<void>((resolve) => {
    server.listen(port, () => {
      logger.info({ port }, 'API server started');
      resolve();
    });
  });

  return server;
}
