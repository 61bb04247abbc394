/**
 * shiftlog error type with exit code integration.
 *
 * Every failure that leaves the core is a ShiftlogError whose `kind` tells the
 * calling agent which retry strategy applies.
 */

import { ExitCode, getExitCodeName, isRecoverableCode } from '../types/exit-codes.js';

/**
 * Error taxonomy surfaced to callers.
 *
 * - unresolvable: transcript, session or target cannot be located
 * - gate_violation: a delegate claim without evidence, or a snapshot write in anchor mode
 * - transient: lock contention; a retry may succeed
 * - security: path traversal or a disallowed symlink
 */
export type ErrorKind =
  | 'unresolvable'
  | 'gate_violation'
  | 'transient'
  | 'security'
  | 'validation'
  | 'io'
  | 'internal';

/** Map a numeric exit code to its error kind. */
export function exitCodeToKind(code: ExitCode): ErrorKind {
  switch (code) {
    case ExitCode.SESSION_NOT_FOUND:
    case ExitCode.TRANSCRIPT_UNRESOLVABLE:
    case ExitCode.TARGET_UNRESOLVABLE:
    case ExitCode.AUDIT_ENTRY_NOT_FOUND:
      return 'unresolvable';
    case ExitCode.LOCK_TIMEOUT:
      return 'transient';
    case ExitCode.COMPACTION_UNVERIFIED:
    case ExitCode.SNAPSHOT_WRITE_BLOCKED:
    case ExitCode.AUDIT_ALREADY_PROCESSED:
      return 'gate_violation';
    case ExitCode.PATH_TRAVERSAL:
    case ExitCode.SYMLINK_CHAIN:
    case ExitCode.SESSION_ID_INVALID:
      return 'security';
    case ExitCode.INVALID_INPUT:
    case ExitCode.VALIDATION_ERROR:
    case ExitCode.CONFIG_ERROR:
      return 'validation';
    case ExitCode.FILE_ERROR:
    case ExitCode.CONTEXT_ROOT_UNWRITABLE:
    case ExitCode.ARCHIVE_FAILED:
      return 'io';
    default:
      return 'internal';
  }
}

/**
 * Structured error class for shiftlog operations.
 * Carries an exit code, human-readable message, and optional fix suggestion.
 */
export class ShiftlogError extends Error {
  readonly code: ExitCode;
  readonly kind: ErrorKind;
  readonly fix?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ShiftlogError';
    this.code = code;
    this.kind = exitCodeToKind(code);
    this.fix = options?.fix;
    this.details = options?.details;
  }

  /** Whether a retry of the same call may succeed. */
  get retryable(): boolean {
    return isRecoverableCode(this.code);
  }

  /** Structured JSON representation for callers that log or forward errors. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        kind: this.kind,
        message: this.message,
        retryable: this.retryable,
        ...(this.fix && { fix: this.fix }),
        ...(this.details && { details: this.details }),
      },
    };
  }
}

/** Narrow an unknown thrown value to a ShiftlogError of the given code. */
export function isShiftlogError(err: unknown, code?: ExitCode): err is ShiftlogError {
  return err instanceof ShiftlogError && (code === undefined || err.code === code);
}

/** Node errno check without a cast at every call site. */
export function isErrnoException(err: unknown, errno?: string): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && (errno === undefined || err.code === errno);
}
