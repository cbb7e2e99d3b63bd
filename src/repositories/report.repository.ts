import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { describeError } from '../errors/http-error';
import { ReportWriteError } from '../errors/report-write-error';
import { ReportDocument, ReportPaths } from '../types/report';
import { isIsoDate } from '../utils/date';
import { logger } from '../utils/logger';

const availabilitySchema = z.enum(['registered', 'available', 'unknown']);
const presenceSchema = z.enum(['present', 'absent', 'unknown']);

const documentSchema = z.object({
  generated_at: z.string(),
  total_domains: z.number().int().nonnegative(),
  domains: z.array(
    z.object({
      domain: z.string(),
      tld: z.string(),
      release_date: z.string(),
      available: availabilitySchema,
      indexed: presenceSchema,
      estimated_pages: z.number().int().nonnegative().nullable(),
      index_source: z.string(),
      checked_at: z.string().nullable(),
    }),
  ),
});

function isMissing(error: unknown): boolean {
  return !!error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT';
}

export class ReportRepository {
  private readonly log = logger.child('reports');

  constructor(private readonly reportDir: string) {}

  /**
   * Writes both files under temporary names first, then renames them into place (JSON last,
   * since listing goes by JSON files). Nothing half-written is ever visible under a report name.
   */
  async save(date: string, csv: string, json: string): Promise<ReportPaths> {
    this.assertDate(date);
    const csvPath = path.join(this.reportDir, `${date}.csv`);
    const jsonPath = path.join(this.reportDir, `${date}.json`);

    try {
      await fs.mkdir(this.reportDir, { recursive: true });
    } catch (error) {
      throw new ReportWriteError(`Cannot create report directory ${this.reportDir}`, this.reportDir, error);
    }

    const pending: Array<{ tmp: string; target: string; content: string }> = [
      { tmp: this.tempPath(csvPath), target: csvPath, content: csv },
      { tmp: this.tempPath(jsonPath), target: jsonPath, content: json },
    ];

    let current = csvPath;
    try {
      for (const file of pending) {
        current = file.target;
        await fs.writeFile(file.tmp, file.content, 'utf-8');
      }
      for (const file of pending) {
        current = file.target;
        await fs.rename(file.tmp, file.target);
      }
    } catch (error) {
      await Promise.all(pending.map((file) => fs.rm(file.tmp, { force: true })));
      throw new ReportWriteError(`Failed to write report ${current}`, current, error);
    }

    this.log.info(`Report ${date} written`, { csvPath, jsonPath });
    return { csvPath, jsonPath };
  }

  /**
   * Report dates, newest first.
   */
  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.reportDir);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }

    return entries
      .filter((entry) => entry.endsWith('.json'))
      .map((entry) => entry.slice(0, -'.json'.length))
      .filter(isIsoDate)
      .sort()
      .reverse();
  }

  async load(date: string): Promise<ReportDocument | null> {
    if (!isIsoDate(date)) return null;

    let raw: string;
    try {
      raw = await fs.readFile(path.join(this.reportDir, `${date}.json`), 'utf-8');
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.log.warn(`Report ${date} is not valid JSON`, { error: describeError(error) });
      return null;
    }

    const parsed = documentSchema.safeParse(data);
    if (!parsed.success) {
      this.log.warn(`Report ${date} has an unexpected shape`, {
        issues: parsed.error.issues.length,
      });
      return null;
    }
    return parsed.data;
  }

  async csvPath(date: string): Promise<string | null> {
    if (!isIsoDate(date)) return null;
    const csvPath = path.join(this.reportDir, `${date}.csv`);
    try {
      await fs.access(csvPath);
      return csvPath;
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
  }

  private tempPath(target: string): string {
    return path.join(path.dirname(target), `.${path.basename(target)}.${randomUUID()}.tmp`);
  }

  private assertDate(date: string) {
    if (!isIsoDate(date)) {
      throw new ReportWriteError(`Invalid report date '${date}'`, this.reportDir);
    }
  }
}
