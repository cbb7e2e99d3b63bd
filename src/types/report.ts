import { Availability, IndexPresence } from './domain';

export const REPORT_COLUMNS = [
  'domain',
  'tld',
  'release_date',
  'available',
  'indexed',
  'estimated_pages',
  'index_source',
  'checked_at',
] as const;

export type ReportColumn = (typeof REPORT_COLUMNS)[number];

export interface ReportRecord {
  domain: string;
  tld: string;
  release_date: string;
  available: Availability;
  indexed: IndexPresence;
  estimated_pages: number | null;
  index_source: string;
  checked_at: string | null;
}

export interface Report {
  generatedAt: string;
  totalCount: number;
  orderedRecords: ReportRecord[];
}

/**
 * On-disk JSON shape, also served by the reports API
 */
export interface ReportDocument {
  generated_at: string;
  total_domains: number;
  domains: ReportRecord[];
}

export interface ReportPaths {
  csvPath: string;
  jsonPath: string;
}
