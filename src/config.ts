/**
 * Environment-driven settings, validated with zod. CLI flags override these.
 */
import { z } from 'zod';
import { ScanError } from './errors.js';

export const DEFAULT_TIMEOUT_MS = 20000;
export const DEFAULT_USER_AGENT = 'linkscan/0.1';

export interface BasicAuth {
  username: string;
  password: string;
}

/**
 * Parse `user:password`. Splits on the first colon only, so passwords may
 * contain colons. Returns null when there is no colon or the user is empty.
 */
export function parseBasicAuth(value: string): BasicAuth | null {
  const sep = value.indexOf(':');
  if (sep <= 0) return null;
  return { username: value.slice(0, sep), password: value.slice(sep + 1) };
}

const basicAuthSchema = z.string().transform((value, ctx) => {
  const auth = parseBasicAuth(value);
  if (!auth) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected user:password' });
    return z.NEVER;
  }
  return auth;
});

const envSchema = z.object({
  LINKSCAN_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  LINKSCAN_OUTPUT_DIR: z.string().min(1).optional(),
  LINKSCAN_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  LINKSCAN_AUTH: basicAuthSchema.optional(),
});

export interface ScanConfig {
  timeoutMs: number;
  outputDir: string;
  userAgent: string;
  auth?: BasicAuth;
}

/**
 * Load configuration from the environment.
 * Throws ScanError('invalid_config') naming the first offending variable.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ScanConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== ''));
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue?.path.join('.') ?? 'environment';
    throw new ScanError('invalid_config', `Invalid ${name}: ${issue?.message ?? 'invalid value'}`);
  }

  const data = parsed.data;
  return {
    timeoutMs: data.LINKSCAN_TIMEOUT_MS,
    outputDir: data.LINKSCAN_OUTPUT_DIR ?? cwd,
    userAgent: data.LINKSCAN_USER_AGENT,
    ...(data.LINKSCAN_AUTH ? { auth: data.LINKSCAN_AUTH } : {}),
  };
}
