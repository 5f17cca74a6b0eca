/**
 * CSV persistence of scan reports
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ScanError } from '../errors.js';
import { logger } from '../logger.js';
import type { LinkReport } from '../scan/types.js';

export const CSV_HEADER = ['url', 'status_code', 'response_time_s', 'error'] as const;

/** Quote a field when it holds a comma, quote, or line break (RFC 4180). */
export function escapeCsvField(value: string): string {
  if (!/[",\r\n]/.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

export function toCsv(reports: LinkReport[]): string {
  const rows = reports.map((report) =>
    [
      report.url,
      report.statusCode === null ? '' : String(report.statusCode),
      (report.elapsedMs / 1000).toFixed(3),
      report.error ?? '',
    ]
      .map(escapeCsvField)
      .join(',')
  );
  return [CSV_HEADER.join(','), ...rows].join('\n') + '\n';
}

const pad = (n: number): string => String(n).padStart(2, '0');

/** `links_YYYY-MM-DD_HH-mm-ss.csv` in local time. */
export function reportFileName(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `links_${day}_${time}.csv`;
}

export interface WriteOptions {
  dir: string;
  now?: Date;
}

/**
 * Write the reports to a timestamped CSV in `dir` and return its path.
 * Throws ScanError('write_failed') if the directory or file cannot be written.
 */
export async function writeCsvReport(reports: LinkReport[], options: WriteOptions): Promise<string> {
  const path = join(options.dir, reportFileName(options.now ?? new Date()));

  try {
    await mkdir(options.dir, { recursive: true });
    await writeFile(path, toCsv(reports), 'utf-8');
  } catch (error) {
    throw new ScanError('write_failed', `Failed to write ${path}: ${String(error)}`, {
      cause: error,
    });
  }

  logger.info({ path, rows: reports.length }, 'Wrote CSV report');
  return path;
}
