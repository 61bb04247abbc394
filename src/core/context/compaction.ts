/**
 * Compaction gate: keeps live artifacts under the line ceiling by moving
 * overflow, verbatim, into the append-only history artifact.
 *
 * Live content plus history is always a superset of what was accepted.
 */

import type { CompactionOptions, CompactionPlan } from '../../types/context.js';
import { ExitCode } from '../../types/exit-codes.js';
import { ShiftlogError } from '../errors.js';
import { getLogger } from '../logger.js';
import { fileSize, safeReadFile } from '../../store/atomic.js';
import { withLock } from '../../store/lock.js';
import type { GuardedWriter } from './persistence-mode.js';

const HISTORY_TITLE = '# PROJECT HISTORY\n';

/** Section names that are archived before anything else. */
const STALE_SECTION_RE = /ACHIEVEMENT|HISTORY|COMPLETED|OLD/i;

interface Section {
  name: string;
  start: number;
  /** Exclusive. */
  end: number;
}

/** Lines in a text, ignoring one trailing newline. */
export function countLines(text: string): number {
  if (text === '') return 0;
  return text.replace(/\n$/, '').split('\n').length;
}

function normalizeSectionName(name: string): string {
  return name.trim().toUpperCase().replace(/[\s-]+/g, '_');
}

function findSections(lines: string[]): Section[] {
  const sections: Section[] = [];
  lines.forEach((line, i) => {
    const m = /^##\s+(.+?)\s*$/.exec(line);
    if (!m?.[1]) return;
    const last = sections[sections.length - 1];
    if (last) last.end = i;
    sections.push({ name: m[1], start: i, end: lines.length });
  });
  return sections;
}

/**
 * Decide what to move out of `content` so it fits `maxLines`.
 *
 * Whole `##` sections go first: stale-looking optional sections, then other
 * optional sections, then required ones, all top-down. The last section is
 * never removed whole; if still over, its oldest body lines go, then leading
 * lines of whatever remains.
 */
export function planCompaction(content: string, options: CompactionOptions): CompactionPlan {
  const trailingNewline = content.endsWith('\n');
  const lines = content === '' ? [] : content.replace(/\n$/, '').split('\n');
  const linesBefore = lines.length;

  if (linesBefore <= options.maxLines) {
    return { needed: false, kept: content, archived: '', sectionsArchived: [], linesBefore, linesAfter: linesBefore };
  }

  const removed = new Array<boolean>(lines.length).fill(false);
  let remaining = linesBefore;
  const removeLine = (i: number): void => {
    if (!removed[i]) {
      removed[i] = true;
      remaining--;
    }
  };

  const sections = findSections(lines);
  const removable = sections.slice(0, -1);
  const required = new Set(options.requiredSections.map(normalizeSectionName));
  const isRequired = (s: Section): boolean => required.has(normalizeSectionName(s.name));
  const order = [
    ...removable.filter((s) => !isRequired(s) && STALE_SECTION_RE.test(s.name)),
    ...removable.filter((s) => !isRequired(s) && !STALE_SECTION_RE.test(s.name)),
    ...removable.filter(isRequired),
  ];

  const sectionsArchived: string[] = [];
  for (const section of order) {
    if (remaining <= options.maxLines) break;
    for (let i = section.start; i < section.end; i++) removeLine(i);
    sectionsArchived.push(section.name);
  }

  const last = sections[sections.length - 1];
  if (last) {
    for (let i = last.start + 1; i < last.end && remaining > options.maxLines; i++) removeLine(i);
  }
  for (let i = 0; i < lines.length && remaining > options.maxLines; i++) removeLine(i);

  const keptLines = lines.filter((_, i) => !removed[i]);
  const archivedLines = lines.filter((_, i) => removed[i]);
  const kept = keptLines.join('\n') + (trailingNewline && keptLines.length > 0 ? '\n' : '');

  // Sections were chosen out of document order; report them in document order.
  const position = new Map(sections.map((s) => [s.name, s.start] as const));
  sectionsArchived.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));

  return {
    needed: true,
    kept,
    archived: archivedLines.join('\n'),
    sectionsArchived,
    linesBefore,
    linesAfter: keptLines.length,
  };
}

/**
 * Appends archived text to the history artifact and proves it grew.
 */
export class CompactionGate {
  constructor(
    private readonly historyPath: string,
    private readonly writer: GuardedWriter,
  ) {}

  get path(): string {
    return this.historyPath;
  }

  async sizeOf(): Promise<number> {
    return fileSize(this.historyPath);
  }

  /**
   * Append `text` under an archival marker. Throws COMPACTION_UNVERIFIED
   * unless the history file is strictly larger afterwards.
   */
  async archive(text: string, source: string, now: Date = new Date()): Promise<number> {
    return withLock(this.historyPath, async () => {
      const before = await this.sizeOf();
      if ((await safeReadFile(this.historyPath)) === null) {
        await this.writer.write(this.historyPath, HISTORY_TITLE);
      }
      const block = `\n---\n<!-- archived from ${source} on ${now.toISOString()} -->\n${text}\n`;
      await this.writer.append(this.historyPath, block);
      await this.verifyGrowth(before);
      getLogger('compaction').info({ source, bytes: Buffer.byteLength(block) }, 'Archived to history');
      return this.sizeOf();
    });
  }

  /**
   * Throws COMPACTION_UNVERIFIED unless the history file is now larger than `before`.
   */
  async verifyGrowth(before: number): Promise<void> {
    const after = await this.sizeOf();
    if (after <= before) {
      throw new ShiftlogError(
        ExitCode.COMPACTION_UNVERIFIED,
        `History artifact did not grow (${before} -> ${after} bytes): ${this.historyPath}`,
      );
    }
  }

  /**
   * Plan and apply compaction for `content`. Returns the live content to write.
   */
  async apply(
    content: string,
    source: string,
    options: CompactionOptions,
    now: Date = new Date(),
  ): Promise<CompactionPlan> {
    const plan = planCompaction(content, options);
    if (plan.needed) {
      await this.archive(plan.archived, source, now);
    }
    return plan;
  }
}
