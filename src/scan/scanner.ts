/**
 * Single-page scan: fetch the seed, classify its anchors, check each internal link.
 * AsyncGenerator that yields a LinkReport per link and a closing ScanSummary.
 */
import { httpRequest } from '../fetch/http-client.js';
import { scanLogger } from '../logger.js';
import { extractAnchorHrefs } from './html-parser.js';
import { baseFromUrl, classifyLinks } from './link-classifier.js';
import type { LinkReport, ScanOptions, ScanResult, ScanSummary } from './types.js';

/** Drop repeated URLs, keeping the first occurrence. */
function uniqueInOrder(urls: string[]): string[] {
  return [...new Set(urls)];
}

/**
 * Scan one page.
 *
 * Throws ScanError for an invalid seed URL before any request is made.
 * A seed that cannot be fetched ends the scan with a summary carrying `seedError`.
 * Link failures are reported and the scan moves on to the next link.
 */
export async function* scan(
  seedUrl: string,
  options: ScanOptions = {}
): AsyncGenerator<LinkReport | ScanSummary> {
  const base = baseFromUrl(seedUrl);
  const log = scanLogger(seedUrl);
  const scanStartTime = Date.now();

  const seed = await httpRequest(seedUrl, options);

  if (seed.statusCode === 0) {
    log.error({ error: seed.error }, 'Seed fetch failed');
    yield {
      type: 'summary',
      seedUrl,
      seedStatus: null,
      seedError: seed.error ?? 'no response',
      linksFound: 0,
      linksRejected: 0,
      duplicates: 0,
      linksOk: 0,
      linksFailed: 0,
      durationMs: Date.now() - scanStartTime,
    };
    return;
  }

  if (!seed.success) {
    // Non-2xx seeds are still scanned
    log.warn({ statusCode: seed.statusCode }, 'Seed returned a non-2xx status');
  }

  const contentType = seed.headers['content-type'];
  if (contentType && !/html/i.test(contentType)) {
    log.warn({ contentType }, 'Seed is not an HTML document');
  }

  const hrefs = seed.html ? extractAnchorHrefs(seed.html) : [];
  const { internal, rejected } = classifyLinks(hrefs, base);
  const links = uniqueInOrder(internal);

  for (const item of rejected) {
    log.debug({ href: item.href, reason: item.reason }, 'Skipping non-internal href');
  }
  log.info(
    { internal: links.length, rejected: rejected.length },
    'Classified anchors on seed page'
  );

  let linksOk = 0;
  let linksFailed = 0;

  for (const url of links) {
    const response = await httpRequest(url, options);
    const report: LinkReport = {
      type: 'link',
      url,
      statusCode: response.statusCode === 0 ? null : response.statusCode,
      elapsedMs: response.elapsedMs,
      success: response.success,
      ...(response.error ? { error: response.error } : {}),
    };

    if (report.success) linksOk++;
    else linksFailed++;

    yield report;
  }

  yield {
    type: 'summary',
    seedUrl,
    seedStatus: seed.statusCode,
    linksFound: links.length,
    linksRejected: rejected.length,
    duplicates: internal.length - links.length,
    linksOk,
    linksFailed,
    durationMs: Date.now() - scanStartTime,
  };
}

/**
 * Run a scan to completion and return its reports and summary.
 * `onReport` sees each report as soon as its link has been checked.
 */
export async function collectScan(
  seedUrl: string,
  options: ScanOptions = {},
  onReport?: (report: LinkReport) => void
): Promise<ScanResult> {
  const reports: LinkReport[] = [];

  for await (const item of scan(seedUrl, options)) {
    if (item.type === 'summary') {
      return { reports, summary: item };
    }
    reports.push(item);
    onReport?.(item);
  }

  // scan() always ends with a summary
  throw new Error(`Scan of ${seedUrl} ended without a summary`);
}
