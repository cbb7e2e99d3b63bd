import { Router } from 'express';
import { ScanController } from '../controllers/scan.controller';
import { ScanJobService } from '../services/scanJob.service';

export function createScanRouter(scanJobService: ScanJobService): Router {
  const controller = new ScanController(scanJobService);
  const router = Router();

  router.post('/start', controller.startScan.bind(controller));
  router.get('/status', controller.getStatus.bind(controller));

  return router;
}
