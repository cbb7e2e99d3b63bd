import { Request, Response } from 'express';
import { z } from 'zod';
import { ScanJobService } from '../services/scanJob.service';
import { ScanRun } from '../types/jobs';
import { isIsoDate } from '../utils/date';
import { logger } from '../utils/logger';

const startSchema = z
  .object({
    date: z
      .string()
      .refine(isIsoDate, { message: 'Expected a calendar date as YYYY-MM-DD' })
      .optional(),
  })
  .default({});

function toStatusBody(run: ScanRun) {
  return {
    running: run.running,
    message: run.statusMessage,
    lastCompletedAt: run.lastCompletedAt,
    state: run.state,
    targetDate: run.targetDate,
  };
}

export class ScanController {
  constructor(private readonly scanJobService: ScanJobService) {}

  async startScan(req: Request, res: Response) {
    try {
      const parsed = startSchema.parse(req.body ?? {});
      const started = this.scanJobService.start({ targetDate: parsed.date });

      if (!started.accepted) {
        return res.status(409).json({
          success: false,
          error: 'Scan already running',
          status: toStatusBody(started.run),
        });
      }

      return res.status(202).json({
        message: 'Scan started',
        status: toStatusBody(started.run),
      });
    } catch (error) {
      logger.error('Failed to start scan', error);

      if (error instanceof z.ZodError) {
        return res.status(400).json({
          success: false,
          error: 'Invalid request payload',
          details: error.flatten(),
        });
      }

      return res.status(500).json({
        success: false,
        error: error instanceof Error ? error.message : 'Failed to start scan',
      });
    }
  }

  async getStatus(_req: Request, res: Response) {
    return res.json(toStatusBody(this.scanJobService.status()));
  }
}
