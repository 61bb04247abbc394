/**
 * Session type definitions.
 * One agent's unit of work between clock-in and clock-out.
 */

import type { MergeResult } from './context.js';

/** How writes reach the shared context store. */
export type PersistenceMode = 'legacy' | 'anchor';

/** Contents of sessions/active/<id>/session.json (snake_case on disk). */
export interface SessionRecord {
  session_id: string;
  focus: string;
  role: string;
  created_at: string;
  working_dir: string;
  is_anchor_mode: boolean;
  /** Transcript location known at clock-in, if any. */
  transcript_path: string | null;
  registry_linked: boolean;
}

/** One entry of the cross-project session registry. */
export interface RegistryEntry {
  session_id: string;
  focus: string;
  created_at: string;
  working_dir: string;
  is_anchor_mode: boolean;
}

/** Another active session holding the same focus. */
export interface FocusConflict {
  sessionId: string;
  focus: string;
  createdAt: string;
  workingDir: string;
}

/** A context file location and whether it currently exists. */
export interface ArtifactPath {
  path: string;
  exists: boolean;
}

/** Outcome of a reaper sweep. */
export interface CleanupReport {
  /** False when the cadence had not elapsed. */
  ran: boolean;
  reaped: string[];
  trimmedArchives: number;
}

export interface ClockInOptions {
  focus: string;
  /** Absolute project working directory. */
  workingDir: string;
  role?: string;
  /** Transcript location, when the caller already knows it. */
  transcriptPath?: string;
}

/**
 * A context file offered at clock-in: inlined when small, by path when
 * large, and with the validation errors when it fails validation.
 */
export type InlineContext =
  | { status: 'inline'; path: string; content: string }
  | { status: 'path'; path: string }
  | { status: 'invalid'; path: string; errors: string[] };

export interface ClockInResult {
  sessionId: string;
  sessionDir: string;
  contextRoot: string;
  mode: PersistenceMode;
  contextPaths: {
    projectContext: ArtifactPath;
    checklist: ArtifactPath;
    roadmap: ArtifactPath;
  };
  /** CURRENT-STATE.md; null when the project has none. */
  stateVector: InlineContext | null;
  /** CONTEXT-NEGATIVES.md; null when the project has none. */
  negativeConstraints: InlineContext | null;
  conflict: FocusConflict | null;
  cleanup: CleanupReport;
}

export interface ClockOutOptions {
  sessionId: string;
  /** Project root; looked up in the registry when omitted. */
  workingDir?: string;
  description?: string;
}

export type SynthesisStatus = 'applied' | 'skipped' | 'fallback';

/** Stages of clock-out that may degrade without failing it. */
export type DegradedStage = 'parse' | 'readable' | 'synthesis' | 'context_update' | 'registry';

export interface ClockOutResult {
  sessionId: string;
  status: 'complete' | 'partial';
  rawArchivePath: string;
  transcriptPath: string | null;
  summaryPath: string | null;
  summary: string;
  recordCount: number;
  synthesis: SynthesisStatus;
  contextUpdate: MergeResult | null;
  degraded: DegradedStage[];
}
