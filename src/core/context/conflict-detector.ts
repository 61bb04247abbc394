/**
 * Advisory conflict detection for context updates.
 *
 * A change conflicts when it touched the same target, inside the window,
 * from a different session. Detection never blocks a write.
 */

import type { ConflictReport, RecentChange } from '../../types/context.js';

export interface ConflictQuery {
  recent: RecentChange[];
  target: string;
  /** Session making the new change; null for anonymous updates. */
  sessionId: string | null;
  newContent: string;
  windowMinutes: number;
  now: Date;
}

/**
 * Names of the `##` sections a piece of markdown touches.
 */
export function extractSectionNames(markdown: string): string[] {
  const names: string[] = [];
  for (const line of markdown.split('\n')) {
    const m = /^##\s+(.+?)\s*$/.exec(line);
    if (m?.[1]) names.push(m[1]);
  }
  return names;
}

export function detectConflicts(query: ConflictQuery): ConflictReport {
  const cutoff = query.now.getTime() - query.windowMinutes * 60_000;
  const conflicts = query.recent.filter((change) => {
    if (change.target !== query.target) return false;
    if (query.sessionId !== null && change.sessionId === query.sessionId) return false;
    const at = new Date(change.timestamp).getTime();
    return !isNaN(at) && at >= cutoff && at <= query.now.getTime();
  });

  const incoming = new Set(extractSectionNames(query.newContent).map((s) => s.toUpperCase()));
  const overlapping = new Set<string>();
  for (const change of conflicts) {
    const touched = change.sections
      ?? (change.content === undefined ? [] : extractSectionNames(change.content));
    for (const name of touched) {
      if (incoming.has(name.toUpperCase())) overlapping.add(name);
    }
  }

  return {
    hasConflict: conflicts.length > 0,
    conflicts,
    overlappingSections: [...overlapping],
  };
}
