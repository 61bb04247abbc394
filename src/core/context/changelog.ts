/**
 * Project changelog (context/PROJECT-CHANGELOG.md), newest entry first.
 *
 * Entry format:
 *   ## 2026-01-01T12:00:00.000Z [PROJECT-CONTEXT] session:ses_20260101120000_a1b2c3
 *   **Record auth refactor decision**
 *   Appended content (4 lines)
 *   Sections: CURRENT_STATE, DECISIONS
 *
 * The Sections line is present only when the change touched `##` sections.
 */

import type { ChangelogEntry, RecentChange } from '../../types/context.js';
import { safeReadFile, atomicWrite } from '../../store/atomic.js';

const TITLE = '# PROJECT CHANGELOG';
const HEADING_RE = /^## (\S+) \[([^\]]+)\] session:(\S+)$/;
const INTENT_RE = /^\*\*(.*)\*\*$/;
const SECTIONS_PREFIX = 'Sections: ';

/** Session placeholder for changes made outside any session. */
export const NO_SESSION = 'none';

/** Strip newlines so each field stays on one line. */
function oneLine(text: string): string {
  return text.replace(/\s*\n\s*/g, ' ').trim();
}

export function formatChangelogEntry(entry: ChangelogEntry): string {
  const lines = [
    `## ${entry.timestamp} [${entry.target}] session:${entry.sessionId}`,
    `**${oneLine(entry.intent)}**`,
    oneLine(entry.description),
  ];
  const sections = (entry.sections ?? []).map(oneLine).filter((name) => name.length > 0);
  if (sections.length > 0) {
    lines.push(SECTIONS_PREFIX + sections.join(', '));
  }
  return lines.join('\n');
}

/**
 * Parse every well-formed entry. Unrecognised lines are ignored.
 */
export function parseChangelog(text: string): ChangelogEntry[] {
  const lines = text.split('\n');
  const entries: ChangelogEntry[] = [];
  for (let i = 0; i < lines.length; i++) {
    const heading = HEADING_RE.exec(lines[i] ?? '');
    if (!heading) continue;
    const intent = INTENT_RE.exec(lines[i + 1] ?? '');
    const next = lines[i + 2] ?? '';
    const entry: ChangelogEntry = {
      timestamp: heading[1] ?? '',
      target: heading[2] ?? '',
      sessionId: heading[3] ?? NO_SESSION,
      intent: intent?.[1] ?? '',
      description: intent && !next.startsWith('## ') ? next : '',
    };
    const sectionsLine = lines[i + 3] ?? '';
    if (entry.description && sectionsLine.startsWith(SECTIONS_PREFIX)) {
      entry.sections = sectionsLine.slice(SECTIONS_PREFIX.length).split(', ').filter((name) => name.length > 0);
    }
    entries.push(entry);
  }
  return entries;
}

export async function readChangelog(filePath: string): Promise<ChangelogEntry[]> {
  const text = await safeReadFile(filePath);
  return text === null ? [] : parseChangelog(text);
}

/**
 * Insert an entry directly below the title.
 */
export async function prependChangelogEntry(filePath: string, entry: ChangelogEntry): Promise<void> {
  const existing = await safeReadFile(filePath);
  const formatted = formatChangelogEntry(entry);
  if (existing === null || !existing.startsWith(TITLE)) {
    const rest = existing?.trim() ? `\n${existing.trimEnd()}\n` : '';
    await atomicWrite(filePath, `${TITLE}\n\n${formatted}\n${rest}`);
    return;
  }
  const body = existing.slice(TITLE.length).replace(/^\n+/, '');
  await atomicWrite(filePath, `${TITLE}\n\n${formatted}\n${body ? `\n${body}` : ''}`);
}

export function changelogToRecent(entries: ChangelogEntry[]): RecentChange[] {
  return entries.map((e) => {
    const change: RecentChange = { timestamp: e.timestamp, target: e.target, sessionId: e.sessionId };
    if (e.sections) change.sections = e.sections;
    return change;
  });
}
