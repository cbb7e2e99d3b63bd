import { AppConfig } from '../config';
import { describeError } from '../errors/http-error';
import { bingSite } from '../sites/search/bing.site';
import { googleSite } from '../sites/search/google.site';
import { SearchEngineSource } from '../sites/search/searchPage';
import { WaybackArchiveSource } from '../sites/archive/wayback.site';
import {
  DomainCandidate,
  IndexAbstention,
  IndexPresence,
  IndexProbeResult,
  IndexSource,
  isAbstention,
} from '../types/domain';
import { createHttpClient } from '../utils/http';
import { logger } from '../utils/logger';
import { Clock, Pacer, systemClock } from '../utils/pacer';

export interface ChainVerdict {
  indexed: IndexPresence;
  estimatedPages: number | null;
  source: string;
  abstentions: IndexAbstention[];
}

export type IndexSignalConfig = Pick<
  AppConfig,
  | 'userAgent'
  | 'archiveRowLimit'
  | 'archiveTimeoutMs'
  | 'searchTimeoutMs'
  | 'indexFallbackEnabled'
>;

/**
 * Archive first; the search engines only when fallback is enabled.
 */
export function buildIndexSources(config: IndexSignalConfig): IndexSource[] {
  const client = createHttpClient({
    userAgent: config.userAgent,
    timeoutMs: Math.max(config.archiveTimeoutMs, config.searchTimeoutMs),
  });

  const sources: IndexSource[] = [
    new WaybackArchiveSource(client, {
      rowLimit: config.archiveRowLimit,
      timeoutMs: config.archiveTimeoutMs,
    }),
  ];

  if (config.indexFallbackEnabled) {
    sources.push(
      new SearchEngineSource(googleSite, client, config.searchTimeoutMs),
      new SearchEngineSource(bingSite, client, config.searchTimeoutMs),
    );
  }

  return sources;
}

export class IndexSignalService {
  private readonly log = logger.child('index-signal');
  private readonly pacer: Pacer;

  constructor(
    private readonly sources: IndexSource[],
    delayMs: number,
    private readonly clock: Clock = systemClock,
  ) {
    this.pacer = new Pacer(delayMs, clock);
  }

  /**
   * First non-abstaining source wins. When all abstain the verdict is unknown, never an error.
   */
  async probe(domain: string): Promise<ChainVerdict> {
    const abstentions: IndexAbstention[] = [];

    for (const source of this.sources) {
      let result: IndexProbeResult;
      try {
        result = await source.probe(domain);
      } catch (error) {
        result = { abstained: true, source: source.id, error: describeError(error) };
      }

      if (isAbstention(result)) {
        this.log.debug(`${source.id} abstained for ${domain}`, { error: result.error });
        abstentions.push(result);
        continue;
      }

      return {
        indexed: result.indexed,
        estimatedPages: result.estimatedPages,
        source: result.source,
        abstentions,
      };
    }

    return { indexed: 'unknown', estimatedPages: null, source: '', abstentions };
  }

  /**
   * Probes one domain at a time. The configured delay runs from the end of one domain's probing
   * to the start of the next.
   */
  async probeAll(candidates: DomainCandidate[]): Promise<DomainCandidate[]> {
    this.pacer.reset();
    let present = 0;
    let unknown = 0;

    for (const candidate of candidates) {
      await this.pacer.wait();
      const verdict = await this.probe(candidate.name);
      this.pacer.release();

      candidate.indexed = verdict.indexed;
      candidate.estimatedPages = verdict.estimatedPages;
      candidate.indexSource = verdict.source;
      candidate.checkedAt = new Date(this.clock.now()).toISOString();

      if (verdict.indexed === 'present') present++;
      if (verdict.indexed === 'unknown') {
        unknown++;
        this.log.warn(`No index source answered for ${candidate.name}`, {
          errors: verdict.abstentions.map((a) => `${a.source}: ${a.error}`),
        });
      }
    }

    this.log.info(
      `${present} of ${candidates.length} domains have indexed content (${unknown} unknown)`,
    );
    return candidates;
  }
}
