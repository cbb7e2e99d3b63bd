import { describe, it, expect } from 'vitest';
import { SearchEngineSource, analyzeSearchPage, linksToDomain, parseCount } from '../search/searchPage';
import { bingSite } from '../search/bing.site';
import { googleSite } from '../search/google.site';
import { createStubClient, networkError } from '../../__tests__/helpers/stubHttp';

const page = (body: string) => `<html><head><title>site:example.se</title></head><body>${body}</body></html>`;

describe('parseCount', () => {
  it('strips thousand separators', () => {
    expect(parseCount('1,234')).toBe(1234);
    expect(parseCount('12.500')).toBe(12500);
    expect(parseCount('3 400')).toBe(3400);
  });

  it('returns null without digits', () => {
    expect(parseCount(', ')).toBeNull();
  });
});

describe('analyzeSearchPage', () => {
  it('reads explicit no-result phrasing as absent', () => {
    const html = page('<p>Your search - site:example.se - did not match any documents.</p>');

    expect(analyzeSearchPage(html, 'example.se', googleSite)).toEqual({
      indexed: 'absent',
      estimatedPages: 0,
      source: 'google',
    });
  });

  it('prefers no-result phrasing over any number on the page', () => {
    const html = page('<p>There are no results for site:example.se</p><p>Showing 10 results per page</p>');

    expect(analyzeSearchPage(html, 'example.se', bingSite)).toEqual({
      indexed: 'absent',
      estimatedPages: 0,
      source: 'bing',
    });
  });

  it('extracts the result count', () => {
    const html = page('<div id="result-stats">About 1,230 results (0.21 seconds)</div>');

    expect(analyzeSearchPage(html, 'example.se', googleSite)).toEqual({
      indexed: 'present',
      estimatedPages: 1230,
      source: 'google',
    });
  });

  it('extracts a count written without "about"', () => {
    const html = page('<span class="sb_count">42 results</span>');

    expect(analyzeSearchPage(html, 'example.se', bingSite)).toEqual({
      indexed: 'present',
      estimatedPages: 42,
      source: 'bing',
    });
  });

  it('ignores script contents', () => {
    const html = page('<script>var t = "did not match any documents";</script><div id="rso"></div>');

    expect(analyzeSearchPage(html, 'example.se', googleSite)).toEqual({
      indexed: 'present',
      estimatedPages: null,
      source: 'google',
    });
  });

  it('falls back to present without a count on a recognisable result page', () => {
    const html = page('<ol id="b_results"><li class="b_algo"><a href="https://www.example.se/">Example</a></li></ol>');

    expect(analyzeSearchPage(html, 'example.se', bingSite)).toEqual({
      indexed: 'present',
      estimatedPages: null,
      source: 'bing',
    });
  });

  it('returns null for a consent page whose only link is the engine query', () => {
    const html =
      '<body><p>Before you continue to Google</p>' +
      '<a href="https://www.google.com/search?q=site%3Aempty.se">Try again</a></body>';

    expect(analyzeSearchPage(html, 'empty.se', googleSite)).toBeNull();
  });

  it('ignores relative engine links that mention the domain', () => {
    const html = page('<a href="/search?q=site%3Aexample.se&tbm=isch">Images</a><a href="/images/search?q=site%3Aexample.se">Images</a>');

    expect(analyzeSearchPage(html, 'example.se', bingSite)).toBeNull();
  });

  it('returns null for an unrecognised page', () => {
    const html = page('<form action="/sorry">Please confirm you are not a robot</form>');

    expect(analyzeSearchPage(html, 'example.se', googleSite)).toBeNull();
  });
});

describe('linksToDomain', () => {
  const engine = new URL('https://www.google.com/search?q=site%3Aexample.se');

  it('accepts the domain and its subdomains', () => {
    expect(linksToDomain('https://example.se/', 'example.se', engine)).toBe(true);
    expect(linksToDomain('https://shop.example.se/cart', 'example.se', engine)).toBe(true);
  });

  it('rejects hosts that merely contain the domain', () => {
    expect(linksToDomain('https://notexample.se/', 'example.se', engine)).toBe(false);
    expect(linksToDomain('https://example.se.evil.test/', 'example.se', engine)).toBe(false);
  });

  it('follows redirect links on the engine host', () => {
    expect(linksToDomain('/url?q=https://www.example.se/about', 'example.se', engine)).toBe(true);
    expect(linksToDomain('/search?q=site%3Aexample.se', 'example.se', engine)).toBe(false);
  });

  it('rejects hrefs that are not URLs', () => {
    expect(linksToDomain('http://', 'example.se', engine)).toBe(false);
  });
});

describe('SearchEngineSource', () => {
  it('searches the site: query on the engine', async () => {
    const { client, calls } = createStubClient(() => ({ data: page('<div id="rso"></div>') }));

    await new SearchEngineSource(googleSite, client, 1_000).probe('example.se');

    expect(calls[0].url).toBe('https://www.google.com/search?q=site%3Aexample.se&hl=en&num=10');
  });

  it('abstains when the page cannot be interpreted', async () => {
    const { client } = createStubClient(() => ({ data: page('<p>Before you continue</p>') }));

    await expect(new SearchEngineSource(googleSite, client, 1_000).probe('example.se')).resolves.toEqual({
      abstained: true,
      source: 'google',
      error: 'Unrecognised result page',
    });
  });

  it('abstains when the request fails', async () => {
    const { client } = createStubClient((request) => {
      throw networkError(request, 'ETIMEDOUT');
    });

    await expect(new SearchEngineSource(bingSite, client, 1_000).probe('example.se')).resolves.toEqual({
      abstained: true,
      source: 'bing',
      error: 'ETIMEDOUT: connect ETIMEDOUT',
    });
  });
});
