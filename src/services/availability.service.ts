import dns from 'dns';
import { AppConfig } from '../config';
import { Availability, DomainCandidate } from '../types/domain';
import { logger } from '../utils/logger';

export const PROBED_RECORD_TYPES = ['A', 'AAAA', 'NS', 'MX'] as const;

export type RecordType = (typeof PROBED_RECORD_TYPES)[number];

/**
 * Resolves with nothing when at least one record came back; rejects with the resolver error otherwise.
 */
export type DnsLookup = (name: string, type: RecordType) => Promise<void>;

export type LookupOutcome =
  | 'resolved'
  | 'no-answer'
  | 'nxdomain'
  | 'no-nameservers'
  | 'timeout'
  | 'error';

const NO_NAMESERVER_CODES = new Set([
  dns.SERVFAIL,
  dns.CONNREFUSED,
  dns.REFUSED,
  'ENOSERVER',
]);

export function classifyLookupError(error: unknown): LookupOutcome {
  const code =
    error && typeof error === 'object' && 'code' in error ? String(error.code) : undefined;

  if (code === dns.NODATA) return 'no-answer';
  if (code === dns.NOTFOUND) return 'nxdomain';
  if (code === dns.TIMEOUT) return 'timeout';
  if (code !== undefined && NO_NAMESERVER_CODES.has(code)) return 'no-nameservers';
  return 'error';
}

export function createResolverLookup(timeoutMs: number): DnsLookup {
  const resolver = new dns.promises.Resolver({ timeout: timeoutMs, tries: 1 });

  return async (name, type) => {
    switch (type) {
      case 'A':
        await resolver.resolve4(name);
        return;
      case 'AAAA':
        await resolver.resolve6(name);
        return;
      case 'NS':
        await resolver.resolveNs(name);
        return;
      case 'MX':
        await resolver.resolveMx(name);
        return;
    }
  };
}

export class AvailabilityService {
  private readonly log = logger.child('availability');
  private readonly lookup: DnsLookup;

  constructor(config: Pick<AppConfig, 'dnsTimeoutMs'>, lookup?: DnsLookup) {
    this.lookup = lookup ?? createResolverLookup(config.dnsTimeoutMs);
  }

  /**
   * A single resolving record type, or a name that exists without records of a type, means
   * registered. Anything else is inconclusive for that type; a name inconclusive for every type
   * is reported available, timeouts included.
   */
  async probe(name: string): Promise<Availability> {
    for (const type of PROBED_RECORD_TYPES) {
      const outcome = await this.lookupOutcome(name, type);
      if (outcome === 'resolved' || outcome === 'no-answer') {
        this.log.debug(`${name} registered (${type}: ${outcome})`);
        return 'registered';
      }
      if (outcome === 'timeout') {
        this.log.debug(`${name} ${type} lookup timed out`);
      }
    }
    return 'available';
  }

  async probeAll(candidates: DomainCandidate[]): Promise<DomainCandidate[]> {
    let available = 0;
    for (const candidate of candidates) {
      candidate.available = await this.probe(candidate.name);
      if (candidate.available === 'available') available++;
    }
    this.log.info(`${available} of ${candidates.length} domains appear available`);
    return candidates;
  }

  private async lookupOutcome(name: string, type: RecordType): Promise<LookupOutcome> {
    try {
      await this.lookup(name, type);
      return 'resolved';
    } catch (error) {
      return classifyLookupError(error);
    }
  }
}
