import { DomainCandidate } from '../../types/domain';
import { Report, ReportDocument, ReportRecord } from '../../types/report';

export function mapCandidateToRecord(candidate: DomainCandidate): ReportRecord {
  return {
    domain: candidate.name,
    tld: candidate.namespace,
    release_date: candidate.releaseDate,
    available: candidate.available,
    indexed: candidate.indexed,
    estimated_pages: candidate.indexed === 'unknown' ? null : candidate.estimatedPages,
    index_source: candidate.indexSource,
    checked_at: candidate.checkedAt,
  };
}

export function compareRecords(a: ReportRecord, b: ReportRecord): number {
  const pagesA = a.estimated_pages ?? 0;
  const pagesB = b.estimated_pages ?? 0;
  if (pagesA !== pagesB) return pagesB - pagesA;
  if (a.domain < b.domain) return -1;
  if (a.domain > b.domain) return 1;
  return 0;
}

export function mapReportToDocument(report: Report): ReportDocument {
  return {
    generated_at: report.generatedAt,
    total_domains: report.totalCount,
    domains: report.orderedRecords,
  };
}
