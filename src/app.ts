import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { getErrorStatus } from './errors/http-error';
import { ReportRepository } from './repositories/report.repository';
import { createReportRouter } from './routes/report.route';
import { createScanRouter } from './routes/scan.route';
import { ScanJobService } from './services/scanJob.service';
import { logger } from './utils/logger';

export interface ServerDependencies {
  scanJobService: ScanJobService;
  reportRepository: ReportRepository;
}

export function createServer(deps: ServerDependencies) {
  const app = express();

  app.use(cors({
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  app.use(express.json({ limit: '16kb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', uptime: process.uptime() });
  });

  app.use('/api/scan', createScanRouter(deps.scanJobService));
  app.use('/api/reports', createReportRouter(deps.reportRepository));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = getErrorStatus(err);
    if (status !== undefined && status >= 400 && status < 500) {
      res.status(status).json({ success: false, error: 'Invalid request' });
      return;
    }

    logger.error('Unhandled error', err);
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}
