import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { AppConfig } from '../config';
import { describeError } from '../errors/http-error';
import { DropRecord, NAMESPACES, Namespace } from '../types/domain';
import { createHttpClient } from '../utils/http';
import { logger } from '../utils/logger';

const listSchema = z.object({
  data: z.array(z.unknown()),
});

const entrySchema = z.object({
  name: z.string().min(1),
  release_at: z.string().min(1),
});

export type DropListConfig = Pick<AppConfig, 'dropListUrls' | 'dropListTimeoutMs' | 'userAgent'>;

export function selectByDate(records: readonly DropRecord[], targetDate: string): DropRecord[] {
  return records.filter((record) => record.releaseDate === targetDate);
}

export class DropListService {
  private readonly log = logger.child('drop-list');
  private readonly client: AxiosInstance;

  constructor(
    private readonly config: DropListConfig,
    client?: AxiosInstance,
  ) {
    this.client =
      client ??
      createHttpClient({ userAgent: config.userAgent, timeoutMs: config.dropListTimeoutMs });
  }

  /**
   * Full drop list for one namespace. Any failure degrades to an empty list so the other
   * namespace can still be scanned.
   */
  async fetch(namespace: Namespace): Promise<DropRecord[]> {
    const url = this.config.dropListUrls[namespace];

    try {
      const response = await this.client.get<unknown>(url, { responseType: 'json' });
      const parsed = listSchema.safeParse(response.data);
      if (!parsed.success) {
        this.log.warn(`Malformed drop list for .${namespace}`, {
          url,
          issues: parsed.error.issues.length,
        });
        return [];
      }

      const records: DropRecord[] = [];
      let skipped = 0;
      for (const raw of parsed.data.data) {
        const entry = entrySchema.safeParse(raw);
        if (!entry.success) {
          skipped++;
          continue;
        }
        records.push(
          Object.freeze({
            name: entry.data.name.trim().toLowerCase(),
            releaseDate: entry.data.release_at.trim(),
            namespace,
          }),
        );
      }

      if (skipped > 0) {
        this.log.warn(`Skipped ${skipped} malformed entries in .${namespace} drop list`);
      }
      this.log.info(`Fetched ${records.length} .${namespace} drop records`);
      return records;
    } catch (error) {
      this.log.warn(`Drop list for .${namespace} unavailable`, {
        url,
        error: describeError(error),
      });
      return [];
    }
  }

  /**
   * Records of every namespace releasing on `targetDate`, .se first.
   */
  async fetchAll(targetDate: string): Promise<DropRecord[]> {
    const selected: DropRecord[] = [];
    for (const namespace of NAMESPACES) {
      const records = await this.fetch(namespace);
      const dropping = selectByDate(records, targetDate);
      this.log.info(`.${namespace}: ${dropping.length} of ${records.length} release on ${targetDate}`);
      selected.push(...dropping);
    }
    return selected;
  }
}
