/**
 * Decide which anchor hrefs are internal to the scanned host, and normalize them
 * to absolute URLs.
 */
import { ScanError } from '../errors.js';

/** Scheme and host of the seed URL, fixed for the whole run. */
export interface ScanBase {
  /** Seed scheme including the trailing colon, e.g. `https:` */
  protocol: string;
  /** Seed hostname, compared exactly against absolute hrefs */
  hostname: string;
  /** Hostname plus a non-default port, used when prefixing root-relative hrefs */
  host: string;
}

export type RejectReason =
  | 'empty'
  | 'protocol-relative'
  | 'unparseable'
  | 'unsupported-scheme'
  | 'external';

export type Classification =
  | { kind: 'internal'; href: string; url: string }
  | { kind: 'rejected'; href: string; reason: RejectReason };

export interface ClassifiedLinks {
  /** Normalized internal URLs in encounter order, duplicates kept */
  internal: string[];
  rejected: Array<Extract<Classification, { kind: 'rejected' }>>;
}

const FETCHABLE_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Build the scan base from a seed URL.
 * Throws ScanError if the seed is not an absolute http(s) URL.
 */
export function baseFromUrl(seedUrl: string): ScanBase {
  let parsed: URL;
  try {
    parsed = new URL(seedUrl);
  } catch (error) {
    throw new ScanError('invalid_seed_url', `Invalid seed URL: ${seedUrl}`, { cause: error });
  }

  if (!FETCHABLE_PROTOCOLS.has(parsed.protocol)) {
    throw new ScanError(
      'invalid_seed_url',
      `Seed URL must use http or https, got "${parsed.protocol}"`
    );
  }

  return { protocol: parsed.protocol, hostname: parsed.hostname, host: parsed.host };
}

/**
 * Classify one href against the scan base, keeping the reason for a rejection.
 *
 * Rules, in order:
 * 1. empty or missing: rejected
 * 2. root-relative (`/path`, not `//host`): prefixed with the base scheme and host
 * 3. absolute http(s) URL on exactly the base hostname: kept unchanged
 * 4. everything else (fragments, relative paths, other hosts and schemes): rejected
 */
export function explainLink(href: string | null | undefined, base: ScanBase): Classification {
  const trimmed = href?.trim() ?? '';
  if (!trimmed) return { kind: 'rejected', href: trimmed, reason: 'empty' };

  if (trimmed.startsWith('//')) {
    return { kind: 'rejected', href: trimmed, reason: 'protocol-relative' };
  }

  if (trimmed.startsWith('/')) {
    return { kind: 'internal', href: trimmed, url: `${base.protocol}//${base.host}${trimmed}` };
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return { kind: 'rejected', href: trimmed, reason: 'unparseable' };
  }

  if (!FETCHABLE_PROTOCOLS.has(parsed.protocol)) {
    return { kind: 'rejected', href: trimmed, reason: 'unsupported-scheme' };
  }

  if (parsed.hostname !== base.hostname) {
    return { kind: 'rejected', href: trimmed, reason: 'external' };
  }

  return { kind: 'internal', href: trimmed, url: trimmed };
}

/** Normalized internal URL for an href, or null when it is not internal. */
export function classifyLink(href: string | null | undefined, base: ScanBase): string | null {
  const result = explainLink(href, base);
  return result.kind === 'internal' ? result.url : null;
}

export function classifyLinks(
  hrefs: Iterable<string | null | undefined>,
  base: ScanBase
): ClassifiedLinks {
  const internal: string[] = [];
  const rejected: ClassifiedLinks['rejected'] = [];

  for (const href of hrefs) {
    const result = explainLink(href, base);
    if (result.kind === 'internal') internal.push(result.url);
    else rejected.push(result);
  }

  return { internal, rejected };
}
