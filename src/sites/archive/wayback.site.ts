import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { describeError } from '../../errors/http-error';
import { IndexProbeResult, IndexSource } from '../../types/domain';

const CDX_ENDPOINT = 'http://web.archive.org/cdx/search/cdx';

const cdxRowsSchema = z.array(z.array(z.string()));

/**
 * Counts distinct url keys in the first column. Row 0 is the header.
 */
export function countArchivedUrls(rows: string[][]): number {
  const keys = new Set<string>();
  for (const row of rows.slice(1)) {
    const key = row[0]?.trim().toLowerCase();
    if (key) keys.add(key);
  }
  return keys.size;
}

export interface WaybackOptions {
  rowLimit: number;
  timeoutMs: number;
}

/**
 * Wayback Machine CDX index: distinct archived URLs under the domain, capped at `rowLimit`.
 */
export class WaybackArchiveSource implements IndexSource {
  readonly id = 'archive';

  constructor(
    private readonly client: AxiosInstance,
    private readonly options: WaybackOptions,
  ) {}

  async probe(domain: string): Promise<IndexProbeResult> {
    let body: unknown;
    try {
      const response = await this.client.get<unknown>(CDX_ENDPOINT, {
        params: {
          url: `*.${domain}`,
          matchType: 'domain',
          output: 'json',
          fl: 'urlkey',
          collapse: 'urlkey',
          limit: String(this.options.rowLimit),
        },
        timeout: this.options.timeoutMs,
        responseType: 'json',
      });
      body = response.data;
    } catch (error) {
      return { abstained: true, source: this.id, error: describeError(error) };
    }

    // the CDX server answers an empty body when nothing is archived
    if (body === '' || body === null || body === undefined) {
      return { indexed: 'absent', estimatedPages: 0, source: this.id };
    }

    const rows = cdxRowsSchema.safeParse(body);
    if (!rows.success) {
      return { abstained: true, source: this.id, error: 'Unexpected CDX response shape' };
    }

    const pages = countArchivedUrls(rows.data);
    if (pages === 0) {
      return { indexed: 'absent', estimatedPages: 0, source: this.id };
    }
    return { indexed: 'present', estimatedPages: pages, source: this.id };
  }
}
