#!/usr/bin/env node
/**
 * CLI entry point for linkscan
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { loadConfig, parseBasicAuth } from './config.js';
import type { BasicAuth } from './config.js';
import { isScanError } from './errors.js';
import { collectScan } from './scan/scanner.js';
import { formatLinkLine, formatSummary, shouldUseColor } from './output/console-format.js';
import { writeCsvReport } from './output/csv-report.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    return pkg.version ?? 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

export interface CliOptions {
  url: string;
  color: boolean;
  csv: boolean;
  timeout?: number;
  outputDir?: string;
  auth?: BasicAuth;
  userAgent?: string;
}

export type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  const opts: Omit<CliOptions, 'url'> = { color: true, csv: true };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      case '--no-color':
        opts.color = false;
        break;
      case '--no-csv':
        opts.csv = false;
        break;
      case '--timeout': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--timeout requires a value' };
        const v = parseInt(args[++i], 10);
        if (isNaN(v) || v <= 0)
          return { kind: 'error', message: '--timeout must be a positive integer (milliseconds)' };
        opts.timeout = v;
        break;
      }
      case '--output-dir':
        if (i + 1 >= args.length)
          return { kind: 'error', message: '--output-dir requires a value' };
        opts.outputDir = args[++i];
        break;
      case '--auth': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--auth requires a value' };
        const auth = parseBasicAuth(args[++i]);
        if (!auth) return { kind: 'error', message: '--auth must be in the form user:password' };
        opts.auth = auth;
        break;
      }
      case '--user-agent':
        if (i + 1 >= args.length)
          return { kind: 'error', message: '--user-agent requires a value' };
        opts.userAgent = args[++i];
        break;
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (positional.length === 0) {
    return { kind: 'error', message: 'Missing required <url> argument' };
  }
  if (positional.length > 1) {
    warnings.push(`Ignoring extra arguments: ${positional.slice(1).join(' ')}`);
  }

  const url = positional[0];
  if (!/^https?:\/\//i.test(url)) {
    return { kind: 'error', message: 'URL must start with http:// or https://' };
  }

  return { kind: 'ok', opts: { url, ...opts }, warnings };
}

function printUsage(): void {
  console.log(`Usage: linkscan <url> [options]

Fetches <url>, checks every link on it that points to the same host, and
writes the results to links_<timestamp>.csv.

Options:
  --timeout <ms>          Request timeout in milliseconds (env: LINKSCAN_TIMEOUT_MS, default: 20000)
  --output-dir <path>     Directory for the CSV report (env: LINKSCAN_OUTPUT_DIR, default: cwd)
  --auth <user:password>  HTTP basic auth for every request (env: LINKSCAN_AUTH)
  --user-agent <ua>       User-Agent header (env: LINKSCAN_USER_AGENT)
  --no-color              Disable colored output (env: NO_COLOR)
  --no-csv                Skip writing the CSV report
  -v, --version           Show version number
  -h, --help              Show this help message`);
}

export async function main(): Promise<void> {
  const result = parseArgs(process.argv.slice(2));

  switch (result.kind) {
    case 'version':
      console.log(`linkscan ${getVersion()}`);
      process.exit(0);
      return;
    case 'help':
      printUsage();
      process.exit(0);
      return;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      process.exit(1);
      return;
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  try {
    const config = loadConfig();
    const color = opts.color && shouldUseColor(process.stdout);
    const auth = opts.auth ?? config.auth;

    const { reports, summary } = await collectScan(
      opts.url,
      {
        timeoutMs: opts.timeout ?? config.timeoutMs,
        userAgent: opts.userAgent ?? config.userAgent,
        ...(auth ? { auth } : {}),
      },
      (report) => console.log(formatLinkLine(report, { color }))
    );

    console.error(`\n${formatSummary(summary)}`);

    if (summary.seedError) {
      process.exit(1);
      return;
    }

    if (opts.csv) {
      const path = await writeCsvReport(reports, {
        dir: resolve(opts.outputDir ?? config.outputDir),
      });
      console.error(`Saved ${reports.length} links to ${path}`);
    }
  } catch (error) {
    if (!isScanError(error)) throw error;
    console.error(`Error: ${error.message}`);
    process.exit(1);
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main().catch((err) => {
    console.error(`Fatal: ${err}`);
    process.exit(1);
  });
}
