import { describeError } from '../errors/http-error';
import { ScanRequest, ScanResult, ScanRun, StartScanResult } from '../types/jobs';
import { logger } from '../utils/logger';
import { ProgressCallback } from './scan.service';

export interface ScanRunner {
  run(request: ScanRequest, onProgress?: ProgressCallback): Promise<ScanResult>;
}

/**
 * Owns the process-wide scan state. At most one scan runs at a time; a start request while one
 * is running is rejected, never queued.
 */
export class ScanJobService {
  private readonly log = logger.child('scan-job');
  private inFlight: Promise<void> | null = null;
  private run: ScanRun = {
    state: 'idle',
    running: false,
    statusMessage: '',
    lastCompletedAt: null,
    targetDate: null,
    startedAt: null,
  };

  constructor(
    private readonly runner: ScanRunner,
    private readonly now: () => Date = () => new Date(),
  ) {}

  status(): ScanRun {
    return { ...this.run };
  }

  /**
   * Transitions to running synchronously, so the check and the claim cannot interleave with
   * another start() call.
   */
  start(request: ScanRequest = {}): StartScanResult {
    if (this.run.running) {
      return { accepted: false, run: this.status() };
    }

    this.run = {
      ...this.run,
      state: 'running',
      running: true,
      statusMessage: `Scanning domains for ${request.targetDate ?? 'tomorrow'}...`,
      targetDate: request.targetDate ?? null,
      startedAt: this.now().toISOString(),
    };

    this.inFlight = this.execute(request).finally(() => {
      this.inFlight = null;
    });

    return { accepted: true, run: this.status() };
  }

  /**
   * Resolves once the current scan (if any) has settled.
   */
  async whenIdle(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private async execute(request: ScanRequest): Promise<void> {
    try {
      const result = await this.runner.run(request, (message) => {
        this.run.statusMessage = message;
      });

      this.run = {
        ...this.run,
        state: 'idle',
        running: false,
        targetDate: result.targetDate,
        statusMessage: `Scan completed successfully (${result.report.totalCount} domains)`,
        lastCompletedAt: this.now().toISOString(),
      };
      this.log.info('Scan completed', { targetDate: result.targetDate, paths: result.paths });
    } catch (error) {
      const reason = describeError(error);
      this.run = {
        ...this.run,
        state: 'failed',
        running: false,
        statusMessage: `Scan failed: ${reason}`,
      };
      this.log.error('Scan failed', { error: reason });
    }
  }
}
