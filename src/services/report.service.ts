import { stringify } from 'csv-stringify/sync';
import {
  compareRecords,
  mapCandidateToRecord,
  mapReportToDocument,
} from '../repositories/mappers/report.mapper';
import { DomainCandidate } from '../types/domain';
import { REPORT_COLUMNS, Report } from '../types/report';

const SUMMARY_TOP = 5;

export class ReportService {
  /**
   * The one place records are ordered. Both renderings read `orderedRecords` as-is.
   */
  assemble(candidates: readonly DomainCandidate[], generatedAt: Date = new Date()): Report {
    const orderedRecords = candidates.map(mapCandidateToRecord).sort(compareRecords);
    return {
      generatedAt: generatedAt.toISOString(),
      totalCount: orderedRecords.length,
      orderedRecords,
    };
  }

  toCsv(report: Report): string {
    return stringify(report.orderedRecords, {
      header: true,
      columns: [...REPORT_COLUMNS],
    });
  }

  toJson(report: Report): string {
    return `${JSON.stringify(mapReportToDocument(report), null, 2)}\n`;
  }

  summarize(report: Report): string {
    const records = report.orderedRecords;
    const indexed = records.filter((record) => record.indexed === 'present').length;
    const withPages = records.filter((record) => (record.estimated_pages ?? 0) > 0);

    const lines = [
      'Domain Scan Summary',
      '===================',
      `Total domains: ${report.totalCount}`,
      `With indexed content: ${indexed}`,
      `With page count data: ${withPages.length}`,
    ];

    if (withPages.length > 0) {
      lines.push(`Highest page count: ${withPages[0].estimated_pages}`);
    }

    if (records.length > 0) {
      lines.push('', 'Top domains by indexed pages:');
      for (const record of records.slice(0, SUMMARY_TOP)) {
        lines.push(`  - ${record.domain}: ${record.estimated_pages ?? '?'} pages`);
      }
    }

    return lines.join('\n');
  }
}
