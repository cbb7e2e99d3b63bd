import { Request, Response } from 'express';
import { ReportRepository } from '../repositories/report.repository';
import { isIsoDate } from '../utils/date';
import { logger } from '../utils/logger';

export class ReportController {
  constructor(private readonly reportRepository: ReportRepository) {}

  async listReports(_req: Request, res: Response) {
    try {
      const dates = await this.reportRepository.list();
      return res.json(dates);
    } catch (error) {
      logger.error('Failed to list reports', error);
      return res.status(500).json({ success: false, error: 'Failed to list reports' });
    }
  }

  async getReport(req: Request, res: Response) {
    const { date } = req.params;
    if (!date || !isIsoDate(date)) {
      return res.status(400).json({ success: false, error: 'Invalid report date' });
    }

    try {
      const report = await this.reportRepository.load(date);
      if (!report) {
        return res.status(404).json({ success: false, error: 'Report not found' });
      }
      return res.json(report);
    } catch (error) {
      logger.error('Failed to load report', { date, error });
      return res.status(500).json({ success: false, error: 'Failed to load report' });
    }
  }

  async downloadCsv(req: Request, res: Response) {
    const { date } = req.params;
    if (!date || !isIsoDate(date)) {
      return res.status(400).json({ success: false, error: 'Invalid report date' });
    }

    try {
      const csvPath = await this.reportRepository.csvPath(date);
      if (!csvPath) {
        return res.status(404).json({ success: false, error: 'CSV report not found' });
      }
      return res.download(csvPath, `${date}.csv`);
    } catch (error) {
      logger.error('Failed to send CSV report', { date, error });
      return res.status(500).json({ success: false, error: 'Failed to send CSV report' });
    }
  }
}
