import { Report, ReportPaths } from './report';

export type ScanRunState = 'idle' | 'running' | 'failed';

export interface ScanRun {
  state: ScanRunState;
  running: boolean;
  statusMessage: string;
  lastCompletedAt: string | null;
  targetDate: string | null;
  startedAt: string | null;
}

export interface ScanRequest {
  /**
   * YYYY-MM-DD; tomorrow (UTC) when omitted
   */
  targetDate?: string;
  dryRun?: boolean;
}

export interface ScanResult {
  targetDate: string;
  report: Report;
  paths: ReportPaths | null;
  summary: string;
}

export type StartScanResult =
  | { accepted: true; run: ScanRun }
  | { accepted: false; run: ScanRun };
