import { Router } from 'express';
import { ReportController } from '../controllers/report.controller';
import { ReportRepository } from '../repositories/report.repository';

export function createReportRouter(reportRepository: ReportRepository): Router {
  const controller = new ReportController(reportRepository);
  const router = Router();

  router.get('/', controller.listReports.bind(controller));
  router.get('/:date', controller.getReport.bind(controller));
  router.get('/:date/csv', controller.downloadCsv.bind(controller));

  return router;
}
