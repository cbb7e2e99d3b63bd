import { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { describeError } from '../../errors/http-error';
import { IndexProbeResult, IndexSource, IndexVerdict } from '../../types/domain';

export interface SearchEngineSite {
  id: string;
  searchUrl: (domain: string) => string;
  /**
   * Containers only a genuine result page has
   */
  resultSelectors: string[];
}

// Matched before RESULT_COUNT_PATTERNS.
export const NO_RESULT_PATTERNS: RegExp[] = [
  /did not match any documents/i,
  /no results found for/i,
  /there are no results for/i,
  /matchade inte några dokument/i,
];

export const RESULT_COUNT_PATTERNS: RegExp[] = [
  /about\s+(\d[\d., ]*)\s+results/i,
  /(\d[\d., ]*)\s+results/i,
  /ungefär\s+(\d[\d., ]*)\s+resultat/i,
];

export function parseCount(raw: string): number | null {
  const digits = raw.replace(/[^\d]/g, '');
  if (!digits) return null;
  const value = Number.parseInt(digits, 10);
  return Number.isSafeInteger(value) ? value : null;
}

function belongsTo(hostname: string, domain: string): boolean {
  return hostname === domain || hostname.endsWith(`.${domain}`);
}

/**
 * True when `href` points at the domain itself. The engine's own links (tabs, query URLs)
 * only count through a redirect target such as Google's `/url?q=`.
 */
export function linksToDomain(href: string, domain: string, engineUrl: URL): boolean {
  if (!URL.canParse(href, engineUrl.href)) return false;
  const target = new URL(href, engineUrl.href);

  const wanted = domain.toLowerCase();
  if (target.hostname !== engineUrl.hostname) {
    return belongsTo(target.hostname, wanted);
  }

  const redirect = target.searchParams.get('q') ?? target.searchParams.get('url');
  if (target.pathname !== '/url' || !redirect || !URL.canParse(redirect)) {
    return false;
  }
  return belongsTo(new URL(redirect).hostname, wanted);
}

/**
 * Reads a search result page for `site:domain`. Returns null when the page is not
 * recognisably a result page (captcha, consent wall, markup change).
 */
export function analyzeSearchPage(
  html: string,
  domain: string,
  site: SearchEngineSite,
): IndexVerdict | null {
  const $ = cheerio.load(html);
  $('script, style, noscript').remove();
  const text = $('body').text().replace(/\s+/g, ' ').trim();

  if (NO_RESULT_PATTERNS.some((pattern) => pattern.test(text))) {
    return { indexed: 'absent', estimatedPages: 0, source: site.id };
  }

  for (const pattern of RESULT_COUNT_PATTERNS) {
    const match = pattern.exec(text);
    const count = match ? parseCount(match[1]) : null;
    if (count !== null) {
      return count === 0
        ? { indexed: 'absent', estimatedPages: 0, source: site.id }
        : { indexed: 'present', estimatedPages: count, source: site.id };
    }
  }

  const hasResultContainer = site.resultSelectors.some((selector) => $(selector).length > 0);
  const engineUrl = new URL(site.searchUrl(domain));
  const hasDomainLink = $('a[href]')
    .toArray()
    .some((anchor) => linksToDomain($(anchor).attr('href') ?? '', domain, engineUrl));

  if (hasResultContainer || hasDomainLink) {
    return { indexed: 'present', estimatedPages: null, source: site.id };
  }
  return null;
}

export class SearchEngineSource implements IndexSource {
  readonly id: string;

  constructor(
    private readonly site: SearchEngineSite,
    private readonly client: AxiosInstance,
    private readonly timeoutMs: number,
  ) {
    this.id = site.id;
  }

  async probe(domain: string): Promise<IndexProbeResult> {
    let html: string;
    try {
      const response = await this.client.get<string>(this.site.searchUrl(domain), {
        timeout: this.timeoutMs,
        responseType: 'text',
        headers: { Accept: 'text/html,application/xhtml+xml' },
      });
      html = typeof response.data === 'string' ? response.data : String(response.data);
    } catch (error) {
      return { abstained: true, source: this.id, error: describeError(error) };
    }

    const verdict = analyzeSearchPage(html, domain, this.site);
    if (!verdict) {
      return { abstained: true, source: this.id, error: 'Unrecognised result page' };
    }
    return verdict;
  }
}
