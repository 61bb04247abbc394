/**
 * Context store type definitions: audit entries, changelog, conflicts,
 * compaction and merge results.
 */

import type { PersistenceMode } from './session.js';

export type AuditStatus = 'pending' | 'processed';

/** One staged update request (inbox/<status>/<id>.json). */
export interface AuditEntry {
  id: string;
  timestamp: string;
  target: string;
  content: string;
  status: AuditStatus;
  intent: string;
  session_id: string | null;
  processed_at?: string;
}

/** processed/index.json. */
export interface ProcessedIndex {
  entries: Array<{ id: string; target: string; processed_at: string }>;
}

export interface InboxStatus {
  pending: number;
  processed: number;
}

/** One dated changelog entry, newest first in the file. */
export interface ChangelogEntry {
  timestamp: string;
  target: string;
  sessionId: string;
  intent: string;
  description: string;
  /** `##` sections the change touched; omitted when it touched none. */
  sections?: string[];
}

/** A recent change to some target, from the changelog or the event log. */
export interface RecentChange {
  timestamp: string;
  target: string;
  sessionId: string;
  /** Content of the change when the source carries it (events do). */
  content?: string;
  /** Section names recorded with the change (the changelog does). */
  sections?: string[];
}

export interface ConflictReport {
  hasConflict: boolean;
  conflicts: RecentChange[];
  /** `##` section names touched both by the new content and a conflicting change. */
  overlappingSections: string[];
}

export interface CompactionOptions {
  maxLines: number;
  requiredSections: string[];
}

/** Pure result of planning a compaction. */
export interface CompactionPlan {
  needed: boolean;
  /** Live content after the move. */
  kept: string;
  /** Text moved verbatim to history, in original order. */
  archived: string;
  sectionsArchived: string[];
  linesBefore: number;
  linesAfter: number;
}

export interface CompactionSummary {
  performed: boolean;
  sectionsArchived: string[];
  historyPath: string;
}

/** Extra context handed to a delegated merge. */
export interface MergeSignals {
  branch?: string;
  testStatus?: string;
  priorConflicts?: number;
}

export type MergeOperation = 'append' | 'replace';

export interface UpdateRequest {
  /** Artifact name (e.g. PROJECT-CONTEXT) or a relative .md path under context/. */
  target: string;
  content: string;
  intent: string;
  sessionId?: string;
  delegated?: boolean;
  operation?: MergeOperation;
  acknowledgeConflicts?: boolean;
  signals?: MergeSignals;
}

export interface DelegateReport {
  status: 'accepted' | 'rejected' | 'fallback';
  reason?: string;
}

export interface MergeResult {
  status: 'merged' | 'event_emitted';
  mode: PersistenceMode;
  auditId: string;
  target: string;
  targetPath: string;
  conflict: ConflictReport;
  acknowledged: boolean;
  merge: 'direct' | 'delegated' | null;
  delegate: DelegateReport | null;
  compaction: CompactionSummary;
  lineCount: number;
  /** Event file written in anchor mode. */
  eventPath?: string;
}

/** events/<date>/<stamp>-<id>-context_update.json. */
export interface ContextEvent {
  id: string;
  timestamp: string;
  type: 'context_update';
  session_id: string | null;
  payload: {
    target: string;
    intent: string;
    content: string;
    inbox_uuid: string;
  };
}
