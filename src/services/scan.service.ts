import { AppConfig } from '../config';
import { ReportRepository } from '../repositories/report.repository';
import { toCandidate } from '../types/domain';
import { ScanRequest, ScanResult } from '../types/jobs';
import { defaultTargetDate, isIsoDate } from '../utils/date';
import { logger } from '../utils/logger';
import { AvailabilityService } from './availability.service';
import { DropListService } from './dropList.service';
import { IndexSignalService, buildIndexSources } from './indexSignal.service';
import { ReportService } from './report.service';
import { filterValuable } from './valueFilter.service';

export type ProgressCallback = (message: string) => void;

export interface ScanDependencies {
  dropLists: DropListService;
  availability: AvailabilityService;
  indexSignals: IndexSignalService;
  reports: ReportService;
  repository: ReportRepository;
  minIndexedPages: number;
  now?: () => Date;
}

export function createScanDependencies(config: AppConfig): ScanDependencies {
  return {
    dropLists: new DropListService(config),
    availability: new AvailabilityService(config),
    indexSignals: new IndexSignalService(buildIndexSources(config), config.scanDelayMs),
    reports: new ReportService(),
    repository: new ReportRepository(config.reportDir),
    minIndexedPages: config.minIndexedPages,
  };
}

export class ScanService {
  private readonly log = logger.child('scan');
  private readonly now: () => Date;

  constructor(private readonly deps: ScanDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async run(request: ScanRequest = {}, onProgress?: ProgressCallback): Promise<ScanResult> {
    const isDefaultDate = request.targetDate === undefined;
    const targetDate = request.targetDate ?? defaultTargetDate(this.now());
    if (!isIsoDate(targetDate)) {
      throw new Error(`Invalid target date '${targetDate}', expected YYYY-MM-DD`);
    }

    const progress = (message: string) => {
      this.log.info(message);
      onProgress?.(message);
    };

    progress(`Fetching drop lists for ${targetDate}${isDefaultDate ? ' (tomorrow)' : ''}`);
    const records = await this.deps.dropLists.fetchAll(targetDate);
    let candidates = records.map(toCandidate);

    if (candidates.length > 0) {
      progress(`Checking availability of ${candidates.length} domains`);
      candidates = await this.deps.availability.probeAll(candidates);

      progress(`Checking index signals for ${candidates.length} domains`);
      candidates = await this.deps.indexSignals.probeAll(candidates);

      candidates = filterValuable(candidates, this.deps.minIndexedPages);
      progress(`${candidates.length} valuable domains remain`);
    } else {
      progress(`No domains release on ${targetDate}`);
    }

    const report = this.deps.reports.assemble(candidates, this.now());
    const summary = this.deps.reports.summarize(report);

    if (request.dryRun || records.length === 0) {
      return { targetDate, report, paths: null, summary };
    }

    progress('Writing reports');
    const paths = await this.deps.repository.save(
      targetDate,
      this.deps.reports.toCsv(report),
      this.deps.reports.toJson(report),
    );
    return { targetDate, report, paths, summary };
  }
}
