/**
 * shiftlog exit codes.
 * Ranges: 0 = success, 1-99 = errors. Synthesis delegate failures have no
 * code: they are recovered by the direct path and carried on the result.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === INPUT / IO (1-9) ===
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  VALIDATION_ERROR = 6,
  LOCK_TIMEOUT = 7,
  CONFIG_ERROR = 8,

  // === SESSION ERRORS (30-39) ===
  SESSION_NOT_FOUND = 31,
  SESSION_ID_INVALID = 33,
  CONTEXT_ROOT_UNWRITABLE = 34,

  // === TRANSCRIPT / ARCHIVE (40-49) ===
  TRANSCRIPT_UNRESOLVABLE = 40,
  ARCHIVE_FAILED = 42,

  // === CONTEXT STORE (50-59) ===
  TARGET_UNRESOLVABLE = 50,
  COMPACTION_UNVERIFIED = 51,
  SNAPSHOT_WRITE_BLOCKED = 52,
  AUDIT_ENTRY_NOT_FOUND = 53,
  AUDIT_ALREADY_PROCESSED = 54,

  // === SECURITY (70-79) ===
  PATH_TRAVERSAL = 70,
  SYMLINK_CHAIN = 71,
}

/** Check if an exit code represents an error (1-99). */
export function isErrorCode(code: ExitCode): boolean {
  return code >= 1 && code < 100;
}

/** Check if an exit code is recoverable (retry may succeed). */
export function isRecoverableCode(code: ExitCode): boolean {
  const nonRecoverable = new Set<ExitCode>([
    ExitCode.FILE_ERROR,
    ExitCode.CONTEXT_ROOT_UNWRITABLE,
    ExitCode.SESSION_ID_INVALID,
    ExitCode.COMPACTION_UNVERIFIED,
    ExitCode.SNAPSHOT_WRITE_BLOCKED,
    ExitCode.AUDIT_ALREADY_PROCESSED,
    ExitCode.PATH_TRAVERSAL,
    ExitCode.SYMLINK_CHAIN,
  ]);

  if (!isErrorCode(code)) return false;
  return !nonRecoverable.has(code);
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
