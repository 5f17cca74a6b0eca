/**
 * Single GET requests with timing, used for the seed page and every link check.
 */
import axios from 'axios';
import { logger } from '../logger.js';
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from '../config.js';
import type { BasicAuth } from '../config.js';

/** Configuration constants */
const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB
const MAX_REDIRECTS = 5;

export interface RequestOptions {
  timeoutMs?: number;
  userAgent?: string;
  auth?: BasicAuth;
}

export interface HttpResponse {
  /** True for 2xx statuses */
  success: boolean;
  /** 0 when no response was received */
  statusCode: number;
  html?: string;
  /** Wall time from dispatch to the full body being read */
  elapsedMs: number;
  headers: Record<string, string>;
  error?: string;
}

/** Flatten axios headers into a plain string map. */
function toHeaderRecord(headers: unknown): Record<string, string> {
  const record: Record<string, string> = {};
  if (!headers || typeof headers !== 'object') return record;

  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') record[name.toLowerCase()] = value;
    else if (typeof value === 'number') record[name.toLowerCase()] = String(value);
    else if (Array.isArray(value)) record[name.toLowerCase()] = value.join(', ');
  }
  return record;
}

/** Describe a request failure, preferring axios' error code (ECONNREFUSED, ECONNABORTED, ...). */
function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return String(error);
}

/**
 * Make one HTTP GET request. Never rejects: network failures, timeouts and
 * oversize bodies come back as `success: false` with `statusCode: 0`.
 */
export async function httpRequest(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const startedAt = performance.now();
  const elapsed = (): number => Math.round(performance.now() - startedAt);

  logger.debug({ url, timeoutMs, auth: options.auth ? '***' : undefined }, 'Making request');

  try {
    const response = await axios.get<string>(url, {
      timeout: timeoutMs,
      maxRedirects: MAX_REDIRECTS,
      maxContentLength: MAX_RESPONSE_SIZE,
      responseType: 'text',
      // Keep the body as text; axios would otherwise try JSON.parse
      transformResponse: (data: unknown) => data,
      validateStatus: () => true,
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
      },
      ...(options.auth ? { auth: options.auth } : {}),
    });

    const html = typeof response.data === 'string' ? response.data : '';
    const elapsedMs = elapsed();

    logger.debug(
      { url, statusCode: response.status, bodyLength: html.length, elapsedMs },
      'Request complete'
    );

    return {
      success: response.status >= 200 && response.status < 300,
      statusCode: response.status,
      html,
      elapsedMs,
      headers: toHeaderRecord(response.headers),
    };
  } catch (error) {
    const elapsedMs = elapsed();
    const message = describeError(error);
    logger.warn({ url, error: message, elapsedMs }, 'Request failed');
    return {
      success: false,
      statusCode: 0,
      elapsedMs,
      headers: {},
      error: message,
    };
  }
}
