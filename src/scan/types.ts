/**
 * Types for the scan module
 */
import type { RequestOptions } from '../fetch/http-client.js';

export type ScanOptions = RequestOptions;

/** Outcome of checking one internal link. */
export interface LinkReport {
  type: 'link';
  url: string;
  /** null when the request got no response */
  statusCode: number | null;
  elapsedMs: number;
  success: boolean;
  error?: string;
}

export interface ScanSummary {
  type: 'summary';
  seedUrl: string;
  /** null when the seed request got no response */
  seedStatus: number | null;
  /** Set when the seed could not be fetched; no links are checked then */
  seedError?: string;
  /** Distinct internal links checked */
  linksFound: number;
  linksRejected: number;
  /** Internal anchors that repeated an earlier link */
  duplicates: number;
  linksOk: number;
  linksFailed: number;
  durationMs: number;
}

/** Everything one run produced, in report order. */
export interface ScanResult {
  reports: LinkReport[];
  summary: ScanSummary;
}
