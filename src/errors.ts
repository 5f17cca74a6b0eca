/**
 * Run-level errors. Per-link failures are values on LinkReport, not exceptions.
 */

export type ScanErrorCode = 'invalid_seed_url' | 'invalid_config' | 'write_failed';

export class ScanError extends Error {
  readonly code: ScanErrorCode;

  constructor(code: ScanErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScanError';
    this.code = code;
  }
}

export function isScanError(error: unknown): error is ScanError {
  return error instanceof ScanError;
}
