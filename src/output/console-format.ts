/**
 * Console rendering for scan lines and the closing summary
 */
import type { LinkReport, ScanSummary } from '../scan/types.js';

const RESET = '\u001b[0m';
const GREEN = '\u001b[32m';
const YELLOW = '\u001b[33m';
const RED = '\u001b[31m';
const DIM = '\u001b[2m';

export interface FormatOptions {
  color: boolean;
}

/**
 * Color output unless NO_COLOR is set; FORCE_COLOR wins over a non-TTY stream.
 * See https://no-color.org/
 */
export function shouldUseColor(
  stream: { isTTY?: boolean },
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== '') return false;
  if (env.FORCE_COLOR !== undefined && env.FORCE_COLOR !== '0') return true;
  return stream.isTTY === true;
}

function statusColor(statusCode: number | null): string {
  if (statusCode === null || statusCode >= 400) return RED;
  if (statusCode >= 300) return YELLOW;
  if (statusCode >= 200) return GREEN;
  return YELLOW;
}

function paint(text: string, color: string, enabled: boolean): string {
  return enabled ? `${color}${text}${RESET}` : text;
}

/** Seconds with millisecond precision, e.g. 1234 -> "1.234s". */
export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(3)}s`;
}

/**
 * One line per checked link: `<status> <seconds> <url>`, plus the error for failed requests.
 *
 *   200 0.142s https://example.com/about
 *   ERR 5.001s https://example.com/slow  (ECONNABORTED: timeout of 5000ms exceeded)
 */
export function formatLinkLine(report: LinkReport, options: FormatOptions): string {
  const status = report.statusCode === null ? 'ERR' : String(report.statusCode);
  const line = `${paint(status, statusColor(report.statusCode), options.color)} ${formatSeconds(report.elapsedMs)} ${report.url}`;
  return report.error ? `${line}  ${paint(`(${report.error})`, DIM, options.color)}` : line;
}

export function formatSummary(summary: ScanSummary): string {
  if (summary.seedError) {
    return `Scan failed: could not fetch ${summary.seedUrl} (${summary.seedError})`;
  }
  const duplicates = summary.duplicates > 0 ? `, ${summary.duplicates} duplicate` : '';
  return (
    `Scan complete: ${summary.linksOk}/${summary.linksFound} links OK, ` +
    `${summary.linksFailed} failed, ${summary.linksRejected} rejected${duplicates}, ` +
    `${summary.durationMs}ms`
  );
}
