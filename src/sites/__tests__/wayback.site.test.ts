import { describe, it, expect } from 'vitest';
import { WaybackArchiveSource, countArchivedUrls } from '../archive/wayback.site';
import { createStubClient, networkError } from '../../__tests__/helpers/stubHttp';

const options = { rowLimit: 500, timeoutMs: 1_000 };

describe('countArchivedUrls', () => {
  it('skips the header row and counts distinct normalized keys', () => {
    const rows = [
      ['urlkey'],
      ['se,example)/'],
      ['SE,EXAMPLE)/'],
      ['se,example)/about '],
      [''],
    ];

    expect(countArchivedUrls(rows)).toBe(2);
  });

  it('is zero for a header-only response', () => {
    expect(countArchivedUrls([['urlkey']])).toBe(0);
  });
});

describe('WaybackArchiveSource', () => {
  it('queries the CDX index for the whole domain', async () => {
    const { client, calls } = createStubClient(() => ({ data: [['urlkey']] }));

    await new WaybackArchiveSource(client, options).probe('example.se');

    expect(calls[0].url).toBe('http://web.archive.org/cdx/search/cdx');
    expect(calls[0].params).toEqual({
      url: '*.example.se',
      matchType: 'domain',
      output: 'json',
      fl: 'urlkey',
      collapse: 'urlkey',
      limit: '500',
    });
  });

  it('reports present with the number of distinct archived urls', async () => {
    const { client } = createStubClient(() => ({
      data: [['urlkey'], ['se,example)/'], ['se,example)/a'], ['se,example)/b']],
    }));

    await expect(new WaybackArchiveSource(client, options).probe('example.se')).resolves.toEqual({
      indexed: 'present',
      estimatedPages: 3,
      source: 'archive',
    });
  });

  it('reports absent with zero pages when nothing is archived', async () => {
    const { client } = createStubClient(() => ({ data: [['urlkey']] }));

    await expect(new WaybackArchiveSource(client, options).probe('fresh.se')).resolves.toEqual({
      indexed: 'absent',
      estimatedPages: 0,
      source: 'archive',
    });
  });

  it('treats an empty body as nothing archived', async () => {
    const { client } = createStubClient(() => ({ data: '' }));

    await expect(new WaybackArchiveSource(client, options).probe('fresh.se')).resolves.toEqual({
      indexed: 'absent',
      estimatedPages: 0,
      source: 'archive',
    });
  });

  it('abstains when the index is unreachable', async () => {
    const { client } = createStubClient((request) => {
      throw networkError(request);
    });

    await expect(new WaybackArchiveSource(client, options).probe('example.se')).resolves.toEqual({
      abstained: true,
      source: 'archive',
      error: 'ECONNREFUSED: connect ECONNREFUSED',
    });
  });

  it('abstains on a server error', async () => {
    const { client } = createStubClient(() => ({ status: 503, data: '' }));

    await expect(new WaybackArchiveSource(client, options).probe('example.se')).resolves.toEqual({
      abstained: true,
      source: 'archive',
      error: 'HTTP 503 Error',
    });
  });
});
