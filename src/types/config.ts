/**
 * Configuration type definitions for shiftlog.
 * Covers project and global config with cascade resolution.
 */

/** Session lifecycle configuration. */
export interface SessionConfig {
  /** Active sessions older than this are reaped. */
  staleAfterHours: number;
  /** Minimum interval between reaper sweeps triggered by clock-in. */
  cleanupCadenceHours: number;
  /** Archived transcripts older than this are deleted. */
  archiveRetentionDays: number;
}

/** Context store configuration. */
export interface ContextConfig {
  /** Line ceiling for every live context artifact. */
  maxLines: number;
  /** Section names the compaction gate archives last. */
  requiredSections: string[];
  /** Window in which a changelog entry from another session counts as a conflict. */
  conflictWindowMinutes: number;
  /** Extra directories a symlinked context root may point into. */
  allowedRoots: string[];
}

/** Transcript discovery configuration. */
export interface TranscriptsConfig {
  /** Root directory holding per-project transcript folders. */
  root: string;
  /** Slack applied before the session start when scanning by modification time. */
  toleranceMinutes: number;
  /** Files older than this are ignored by the temporal scan. */
  maxAgeHours: number;
  /** Upper bound on project folders inspected by the metadata scan. */
  maxProjectsScan: number;
}

/** Synthesis delegate configuration. */
export interface SynthesisConfig {
  enabled: boolean;
  timeoutMs: number;
  /** Delegate output shorter than this is treated as truncated. */
  minContentChars: number;
}

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the context root (default: 'logs/shiftlog.log') */
  filePath: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** shiftlog configuration (config.json). */
export interface ShiftlogConfig {
  version: string;
  session: SessionConfig;
  context: ContextConfig;
  transcripts: TranscriptsConfig;
  synthesis: SynthesisConfig;
  logging: LoggingConfig;
}

/** Configuration resolution priority. */
export type ConfigSource = 'env' | 'project' | 'global' | 'default';

/** A resolved config value with its source. */
export interface ResolvedValue<T> {
  value: T;
  source: ConfigSource;
}
