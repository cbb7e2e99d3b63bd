import { createServer } from './app';
import { loadConfig } from './config';
import { ReportRepository } from './repositories/report.repository';
import { ScanService, createScanDependencies } from './services/scan.service';
import { ScanJobService } from './services/scanJob.service';
import { loadEnv } from './utils/env';
import { Logger, logger } from './utils/logger';

export async function bootstrap() {
  loadEnv();
  const config = loadConfig();
  Logger.setLevel(config.logLevel);

  const deps = createScanDependencies(config);
  const scanJobService = new ScanJobService(new ScanService(deps));
  const app = createServer({ scanJobService, reportRepository: deps.repository });

  return app.listen(config.port, () => {
    logger.info(`Drop scanner API listening on port ${config.port}`, {
      reportDir: config.reportDir,
    });
  });
}

if (require.main === module) {
  bootstrap().catch((error) => {
    logger.error('Failed to bootstrap application', { error });
    process.exit(1);
  });
}
