/**
 * Transcript parser: line-delimited agent activity log -> typed records.
 *
 * The raw log is never modified; callers parse the archived copy.
 */

import { z } from 'zod';
import type {
  ParsedTranscript,
  ParseStats,
  ToolResultRecord,
  TranscriptRecord,
} from '../../types/transcript.js';
import { redactParams } from './redact.js';

/** Tool output kept per result record. */
export const MAX_TOOL_OUTPUT_CHARS = 500;

const TextBlockSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

const ToolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: z.string(),
  name: z.string(),
  input: z.record(z.unknown()).optional(),
});

const ToolResultBlockSchema = z.object({
  type: z.literal('tool_result'),
  tool_use_id: z.string(),
  content: z.union([z.string(), z.array(z.unknown())]).optional(),
  is_error: z.boolean().optional(),
});

const BlockSchema = z.discriminatedUnion('type', [
  TextBlockSchema,
  ToolUseBlockSchema,
  ToolResultBlockSchema,
]);

type Block = z.infer<typeof BlockSchema>;

const MessageLineSchema = z.object({
  type: z.enum(['user', 'assistant']),
  message: z.object({
    role: z.string().optional(),
    content: z.union([z.string(), z.array(z.unknown())]),
  }),
});

/**
 * Flatten tool_result content (a string or a list of text blocks).
 */
function resultText(content: string | unknown[] | undefined): string {
  if (content === undefined) return '';
  if (typeof content === 'string') return content;
  return content
    .map((part) => {
      const parsed = TextBlockSchema.safeParse(part);
      return parsed.success ? parsed.data.text : '';
    })
    .filter((text) => text.length > 0)
    .join('\n');
}

/**
 * Bound tool output to MAX_TOOL_OUTPUT_CHARS.
 */
export function truncateOutput(output: string): Pick<ToolResultRecord, 'output' | 'truncated' | 'originalLength'> {
  if (output.length <= MAX_TOOL_OUTPUT_CHARS) {
    return { output, truncated: false, originalLength: output.length };
  }
  return {
    output: `${output.slice(0, MAX_TOOL_OUTPUT_CHARS)}\n...[truncated ${output.length - MAX_TOOL_OUTPUT_CHARS} chars]`,
    truncated: true,
    originalLength: output.length,
  };
}

class RecordCollector {
  readonly records: TranscriptRecord[] = [];
  private readonly answered = new Set<string>();
  duplicateResults = 0;

  add(block: Block, role: string): void {
    switch (block.type) {
      case 'text':
        if (block.text.trim().length > 0) {
          this.records.push({ type: 'text', role, content: block.text });
        }
        return;
      case 'tool_use':
        this.records.push({
          type: 'tool_use',
          id: block.id,
          name: block.name,
          params: redactParams(block.input ?? {}),
        });
        return;
      case 'tool_result':
        if (this.answered.has(block.tool_use_id)) {
          this.duplicateResults++;
          return;
        }
        this.answered.add(block.tool_use_id);
        this.records.push({
          type: 'tool_result',
          toolUseId: block.tool_use_id,
          ...truncateOutput(resultText(block.content)),
          isError: block.is_error ?? false,
        });
        return;
    }
  }
}

/**
 * Parse a raw transcript.
 *
 * Understands user/assistant lines whose message content is a string or a
 * block list, and bare tool_use / tool_result lines. Unparseable lines are
 * counted as malformed; other line types (summaries, system notices) are
 * skipped.
 */
export function parseTranscript(raw: string): ParsedTranscript {
  const collector = new RecordCollector();
  const stats: ParseStats = { lines: 0, malformed: 0, duplicateResults: 0 };

  for (const line of raw.split('\n')) {
    if (!line.trim()) continue;
    stats.lines++;

    let entry: unknown;
    try {
      entry = JSON.parse(line);
    } catch {
      stats.malformed++;
      continue;
    }
    if (entry === null || typeof entry !== 'object' || Array.isArray(entry)) {
      stats.malformed++;
      continue;
    }

    const message = MessageLineSchema.safeParse(entry);
    if (message.success) {
      const role = message.data.message.role ?? message.data.type;
      const content = message.data.message.content;
      if (typeof content === 'string') {
        collector.add({ type: 'text', text: content }, role);
        continue;
      }
      for (const part of content) {
        const block = BlockSchema.safeParse(part);
        if (block.success) collector.add(block.data, role);
      }
      continue;
    }

    const bare = BlockSchema.safeParse(entry);
    if (bare.success && bare.data.type !== 'text') {
      collector.add(bare.data, 'assistant');
    }
  }

  stats.duplicateResults = collector.duplicateResults;
  return { records: collector.records, stats };
}
