/**
 * linkscan - find the same-host links on a page, check each one, and save the results.
 *
 * @module linkscan
 */
export { scan, collectScan } from './scan/scanner.js';
export { baseFromUrl, classifyLink, classifyLinks, explainLink } from './scan/link-classifier.js';
export { extractAnchorHrefs, linkedomParser } from './scan/html-parser.js';
export { httpRequest } from './fetch/http-client.js';
export { loadConfig, parseBasicAuth } from './config.js';
export { ScanError, isScanError } from './errors.js';
export { formatLinkLine, formatSummary, shouldUseColor } from './output/console-format.js';
export { toCsv, reportFileName, writeCsvReport } from './output/csv-report.js';
export type { ScanBase, Classification, ClassifiedLinks, RejectReason } from './scan/link-classifier.js';
export type { HtmlDocumentParser } from './scan/html-parser.js';
export type { HttpResponse, RequestOptions } from './fetch/http-client.js';
export type { LinkReport, ScanOptions, ScanResult, ScanSummary } from './scan/types.js';
export type { ScanConfig, BasicAuth } from './config.js';
export type { ScanErrorCode } from './errors.js';
