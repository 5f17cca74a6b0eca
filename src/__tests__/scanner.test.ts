import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../logger.js', () => {
  const log = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  return { logger: log, scanLogger: () => log };
});

vi.mock('../fetch/http-client.js', () => ({
  httpRequest: vi.fn(),
}));

import { scan, collectScan } from '../scan/scanner.js';
import { httpRequest } from '../fetch/http-client.js';
import type { HttpResponse } from '../fetch/http-client.js';
import type { LinkReport, ScanSummary } from '../scan/types.js';
import { ScanError } from '../errors.js';
import { logger } from '../logger.js';

const SEED_HTML = `<!DOCTYPE html><html><body>
  <a href="/">Home</a>
  <a href="/about">About</a>
  <a href="https://example.com/contact">Contact</a>
  <a href="https://other.com/x">Other</a>
  <a href="#top">Top</a>
  <a href="">Empty</a>
</body></html>`;

function ok(html = '', elapsedMs = 100): HttpResponse {
  return { success: true, statusCode: 200, html, elapsedMs, headers: {} };
}

function status(statusCode: number, elapsedMs = 50): HttpResponse {
  return { success: false, statusCode, html: '', elapsedMs, headers: {} };
}

function networkError(error: string, elapsedMs = 20): HttpResponse {
  return { success: false, statusCode: 0, elapsedMs, headers: {}, error };
}

/** Route mocked responses by URL. */
function routeResponses(routes: Record<string, HttpResponse>): void {
  vi.mocked(httpRequest).mockImplementation(async (url: string) => {
    const response = routes[url];
    if (!response) throw new Error(`unexpected request to ${url}`);
    return response;
  });
}

async function drain(iter: AsyncGenerator<LinkReport | ScanSummary>) {
  const items: Array<LinkReport | ScanSummary> = [];
  for await (const item of iter) items.push(item);
  return items;
}

describe('scan', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('checks each internal link in encounter order and ends with a summary', async () => {
    routeResponses({
      'https://example.com/': ok(SEED_HTML),
      'https://example.com/about': status(404, 80),
      'https://example.com/contact': ok('', 120),
    });

    const items = await drain(scan('https://example.com/'));

    expect(items.slice(0, 3)).toEqual([
      { type: 'link', url: 'https://example.com/', statusCode: 200, elapsedMs: 100, success: true },
      {
        type: 'link',
        url: 'https://example.com/about',
        statusCode: 404,
        elapsedMs: 80,
        success: false,
      },
      {
        type: 'link',
        url: 'https://example.com/contact',
        statusCode: 200,
        elapsedMs: 120,
        success: true,
      },
    ]);

    const summary = items[3];
    expect(items).toHaveLength(4);
    expect(summary).toMatchObject({
      type: 'summary',
      seedUrl: 'https://example.com/',
      seedStatus: 200,
      linksFound: 3,
      linksRejected: 3,
      duplicates: 0,
      linksOk: 2,
      linksFailed: 1,
    });
  });

  it('fetches the seed and then each link once, sequentially', async () => {
    routeResponses({
      'https://example.com/': ok(SEED_HTML),
      'https://example.com/about': ok(),
      'https://example.com/contact': ok(),
    });

    await drain(scan('https://example.com/', { timeoutMs: 5000 }));

    expect(vi.mocked(httpRequest).mock.calls).toEqual([
      ['https://example.com/', { timeoutMs: 5000 }],
      ['https://example.com/', { timeoutMs: 5000 }],
      ['https://example.com/about', { timeoutMs: 5000 }],
      ['https://example.com/contact', { timeoutMs: 5000 }],
    ]);
  });

  it('checks repeated links once and counts the repeats', async () => {
    routeResponses({
      'https://example.com/start': ok(
        '<a href="/a">A</a><a href="/b">B</a><a href="https://example.com/a">A again</a>'
      ),
      'https://example.com/a': ok(),
      'https://example.com/b': ok(),
    });

    const result = await collectScan('https://example.com/start');

    expect(result.reports.map((r) => r.url)).toEqual([
      'https://example.com/a',
      'https://example.com/b',
    ]);
    expect(result.summary.duplicates).toBe(1);
    expect(result.summary.linksFound).toBe(2);
  });

  it('reports link network failures and keeps going', async () => {
    routeResponses({
      'https://example.com/': ok('<a href="/down">Down</a><a href="/up">Up</a>'),
      'https://example.com/down': networkError('ECONNRESET: socket hang up'),
      'https://example.com/up': ok(),
    });

    const result = await collectScan('https://example.com/');

    expect(result.reports[0]).toEqual({
      type: 'link',
      url: 'https://example.com/down',
      statusCode: null,
      elapsedMs: 20,
      success: false,
      error: 'ECONNRESET: socket hang up',
    });
    expect(result.reports[1].success).toBe(true);
    expect(result.summary.linksFailed).toBe(1);
    expect(result.summary.linksOk).toBe(1);
  });

  it('stops with seedError when the seed cannot be fetched', async () => {
    routeResponses({
      'https://example.com/': networkError('ENOTFOUND: getaddrinfo ENOTFOUND example.com'),
    });

    const items = await drain(scan('https://example.com/'));

    expect(items).toHaveLength(1);
    expect(items[0]).toMatchObject({
      type: 'summary',
      seedStatus: null,
      seedError: 'ENOTFOUND: getaddrinfo ENOTFOUND example.com',
      linksFound: 0,
    });
    expect(httpRequest).toHaveBeenCalledTimes(1);
  });

  it('still scans a seed that answered with an error status', async () => {
    routeResponses({
      'https://example.com/gone': {
        ...status(410),
        html: '<a href="/">Back home</a>',
      },
      'https://example.com/': ok(),
    });

    const result = await collectScan('https://example.com/gone');

    expect(result.summary.seedStatus).toBe(410);
    expect(result.summary.seedError).toBeUndefined();
    expect(result.reports.map((r) => r.url)).toEqual(['https://example.com/']);
  });

  it('ends with an empty report list when the page has no internal links', async () => {
    routeResponses({
      'https://example.com/': ok('<a href="https://other.com/">Elsewhere</a>'),
    });

    const result = await collectScan('https://example.com/');

    expect(result.reports).toEqual([]);
    expect(result.summary).toMatchObject({ linksFound: 0, linksRejected: 1 });
  });

  it('warns when the seed is not served as HTML', async () => {
    routeResponses({
      'https://example.com/data': {
        ...ok('{"links":[]}'),
        headers: { 'content-type': 'application/json' },
      },
    });

    await collectScan('https://example.com/data');

    expect(logger.warn).toHaveBeenCalledWith(
      { contentType: 'application/json' },
      'Seed is not an HTML document'
    );
  });

  it('does not warn for an HTML seed with a charset', async () => {
    routeResponses({
      'https://example.com/': {
        ...ok('<p>no links</p>'),
        headers: { 'content-type': 'text/html; charset=utf-8' },
      },
    });

    await collectScan('https://example.com/');

    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('throws ScanError for an invalid seed without making a request', async () => {
    await expect(drain(scan('not a url'))).rejects.toBeInstanceOf(ScanError);
    expect(httpRequest).not.toHaveBeenCalled();
  });
});

describe('collectScan', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('hands each report to the callback as it is produced', async () => {
    routeResponses({
      'https://example.com/': ok('<a href="/one">1</a><a href="/two">2</a>'),
      'https://example.com/one': ok(),
      'https://example.com/two': status(500),
    });
    const seen: string[] = [];

    const result = await collectScan('https://example.com/', {}, (report) => seen.push(report.url));

    expect(seen).toEqual(['https://example.com/one', 'https://example.com/two']);
    expect(result.reports).toHaveLength(2);
    expect(result.summary.type).toBe('summary');
  });
});
