/**
 * Error codes for programmatic error handling
 */

export const TarErrorCode = {
  /** Invalid tar header checksum - archive may be corrupted or needs decompression */
  INVALID_CHECKSUM: 'TAR_INVALID_CHECKSUM',
  /** Unknown tar format - not USTAR, GNU, or V7 */
  INVALID_FORMAT: 'TAR_INVALID_FORMAT',
  /** An entry size that cannot be used to locate the next header */
  INVALID_SIZE: 'TAR_INVALID_SIZE',
  /** Input ended inside a header block or inside member data */
  TRUNCATED: 'TAR_TRUNCATED',
  EMPTY_ARCHIVE: 'TAR_EMPTY_ARCHIVE',
  UNSUPPORTED_MODE: 'TAR_UNSUPPORTED_MODE',
  COMPRESSION_MISMATCH: 'TAR_COMPRESSION_MISMATCH',
  CLOSED: 'TAR_CLOSED',
  STREAM_DETACHED: 'TAR_STREAM_DETACHED',

  // reader-level kinds
  TYPE_MISMATCH: 'TAR_TYPE_MISMATCH',
  OPEN_FAILED: 'TAR_OPEN_FAILED',
  EXTRACTION_FAILED: 'TAR_EXTRACTION_FAILED',
  ARCHIVE_FAILED: 'TAR_ARCHIVE_FAILED',
  NOT_SUPPORTED: 'TAR_NOT_SUPPORTED',
} as const;

export type TarErrorCodeValue = (typeof TarErrorCode)[keyof typeof TarErrorCode];

export interface TarErrorContext {
  sourcePath?: string;
  memberName?: string;
  cause?: unknown;
}

export class TarError extends Error {
  readonly code: TarErrorCodeValue;
  readonly sourcePath?: string;
  readonly memberName?: string;

  constructor(message: string, code: TarErrorCodeValue, context: TarErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = 'TarError';
    this.code = code;
    if (context.sourcePath !== undefined) this.sourcePath = context.sourcePath;
    if (context.memberName !== undefined) this.memberName = context.memberName;
  }
}

/**
 * Create an error with a code property
 *
 * @param message - Human-readable error message
 * @param code - Error code from TarErrorCode
 * @param context - Archive and member the error relates to, and the underlying cause
 */
export function createTarError(message: string, code: TarErrorCodeValue, context?: TarErrorContext): TarError {
  return new TarError(message, code, context);
}

export function isTarError(value: unknown, code?: TarErrorCodeValue): value is TarError {
  return value instanceof TarError && (code === undefined || value.code === code);
}
