/**
 * Transcript record definitions.
 */

/** Plain text exchanged between user and assistant. */
export interface TextRecord {
  type: 'text';
  role: string;
  content: string;
}

/** A tool invocation with redacted parameters. */
export interface ToolUseRecord {
  type: 'tool_use';
  id: string;
  name: string;
  params: Record<string, unknown>;
}

/** Output of one tool invocation, size-bounded. */
export interface ToolResultRecord {
  type: 'tool_result';
  toolUseId: string;
  output: string;
  truncated: boolean;
  originalLength: number;
  isError: boolean;
}

export type TranscriptRecord = TextRecord | ToolUseRecord | ToolResultRecord;

export interface ParseStats {
  lines: number;
  malformed: number;
  /** tool_result entries dropped because their invocation already had one. */
  duplicateResults: number;
}

export interface ParsedTranscript {
  records: TranscriptRecord[];
  stats: ParseStats;
}
