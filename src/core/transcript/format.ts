/**
 * Human-readable renderings of a parsed transcript.
 */

import type { TranscriptRecord } from '../../types/transcript.js';

export interface TranscriptMeta {
  sessionId: string;
  role: string;
  focus: string;
  createdAt: string;
  workingDir: string;
  description?: string;
}

const RULE = '='.repeat(80);

export function countRecords(records: TranscriptRecord[]): { messages: number; toolCalls: number } {
  let messages = 0;
  let toolCalls = 0;
  for (const record of records) {
    if (record.type === 'text') messages++;
    else if (record.type === 'tool_use') toolCalls++;
  }
  return { messages, toolCalls };
}

/**
 * One-line session summary.
 *
 * @example
 * Session: implementer focused on refactor-auth | Messages: 12 | Tool calls: 4
 */
export function buildSummary(records: TranscriptRecord[], meta: TranscriptMeta): string {
  const { messages, toolCalls } = countRecords(records);
  const parts = [
    `Session: ${meta.role} focused on ${meta.focus}`,
    `Messages: ${messages}`,
    `Tool calls: ${toolCalls}`,
  ];
  if (meta.description) {
    parts.push(`Description: ${meta.description}`);
  }
  return parts.join(' | ');
}

/**
 * Render records as a plain-text transcript with header and footer.
 */
export function formatTranscript(
  records: TranscriptRecord[],
  meta: TranscriptMeta,
  exportedAt: Date = new Date(),
): string {
  const lines: string[] = [
    RULE,
    'Session Export',
    `Session ID: ${meta.sessionId}`,
    `Role: ${meta.role}`,
    `Focus: ${meta.focus}`,
    `Started: ${meta.createdAt}`,
    `Exported: ${exportedAt.toISOString()}`,
  ];
  if (meta.description) lines.push(`Description: ${meta.description}`);
  lines.push(`Working Directory: ${meta.workingDir}`, RULE, '');

  for (const record of records) {
    switch (record.type) {
      case 'text':
        lines.push(`[${record.role}]`, record.content, '');
        break;
      case 'tool_use':
        lines.push(`[TOOL: ${record.name}]`, JSON.stringify(record.params, null, 2), '');
        break;
      case 'tool_result':
        lines.push(
          record.isError ? `[RESULT: ${record.toolUseId}] (error)` : `[RESULT: ${record.toolUseId}]`,
          record.output,
          '',
        );
        break;
    }
  }

  lines.push(RULE, `End of session (${records.length} records)`, RULE);
  return lines.join('\n');
}
