export const NAMESPACES = ['se', 'nu'] as const;

export type Namespace = (typeof NAMESPACES)[number];

/** Registration state as far as DNS can tell. */
export type Availability = 'registered' | 'available' | 'unknown';

/** Whether a content index knows about the domain. */
export type IndexPresence = 'present' | 'absent' | 'unknown';

export interface DropRecord {
  readonly name: string;
  /**
   * Calendar date (UTC) the registry releases the name, as YYYY-MM-DD
   */
  readonly releaseDate: string;
  readonly namespace: Namespace;
}

export interface DomainCandidate {
  name: string;
  namespace: Namespace;
  releaseDate: string;
  available: Availability;
  indexed: IndexPresence;
  /**
   * Only set when the index source could count pages; null means "no figure", not zero
   */
  estimatedPages: number | null;
  /**
   * Id of the index source that produced the verdict, empty when every source abstained
   */
  indexSource: string;
  checkedAt: string | null;
}

export interface IndexVerdict {
  indexed: Exclude<IndexPresence, 'unknown'>;
  estimatedPages: number | null;
  source: string;
}

export interface IndexAbstention {
  abstained: true;
  source: string;
  error: string;
}

export type IndexProbeResult = IndexVerdict | IndexAbstention;

export interface IndexSource {
  readonly id: string;
  probe(domain: string): Promise<IndexProbeResult>;
}

export function isAbstention(result: IndexProbeResult): result is IndexAbstention {
  return 'abstained' in result;
}

export function toCandidate(record: DropRecord): DomainCandidate {
  return {
    name: record.name,
    namespace: record.namespace,
    releaseDate: record.releaseDate,
    available: 'unknown',
    indexed: 'unknown',
    estimatedPages: null,
    indexSource: '',
    checkedAt: null,
  };
}
