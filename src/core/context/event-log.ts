/**
 * Anchor-mode event log: one immutable JSON file per intended change.
 *
 *   events/<YYYY-MM-DD>/<stamp>-<id>-context_update.json
 *
 * Snapshots are built from these by a separate synthesizer; this package
 * only appends.
 */

import { randomUUID } from 'node:crypto';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { ContextEvent, RecentChange } from '../../types/context.js';
import { atomicWriteJson } from '../../store/atomic.js';
import { readJsonAs } from '../../store/json.js';
import { isErrnoException } from '../errors.js';
import { getLogger } from '../logger.js';
import { NO_SESSION } from './changelog.js';

const ContextEventSchema: z.ZodType<ContextEvent> = z.object({
  id: z.string(),
  timestamp: z.string(),
  type: z.literal('context_update'),
  session_id: z.string().nullable(),
  payload: z.object({
    target: z.string(),
    intent: z.string(),
    content: z.string(),
    inbox_uuid: z.string(),
  }),
});

export interface EmitInput {
  sessionId: string | null;
  target: string;
  intent: string;
  content: string;
  inboxId: string;
}

/** Compact UTC stamp, sortable: 20260101T120000123Z */
function stamp(d: Date): string {
  return d.toISOString().replace(/[-:.]/g, '');
}

/**
 * Write one event. Returns the event and its file path.
 */
export async function emitContextEvent(
  eventsDir: string,
  input: EmitInput,
  now: Date = new Date(),
): Promise<{ event: ContextEvent; path: string }> {
  const event: ContextEvent = {
    id: randomUUID(),
    timestamp: now.toISOString(),
    type: 'context_update',
    session_id: input.sessionId,
    payload: {
      target: input.target,
      intent: input.intent,
      content: input.content,
      inbox_uuid: input.inboxId,
    },
  };
  const path = join(
    eventsDir,
    event.timestamp.slice(0, 10),
    `${stamp(now)}-${event.id}-context_update.json`,
  );
  await atomicWriteJson(path, event);
  return { event, path };
}

/**
 * Events written on or after `since`, oldest first.
 */
export async function readEventsSince(eventsDir: string, since: Date): Promise<ContextEvent[]> {
  let days: string[];
  try {
    days = await readdir(eventsDir);
  } catch (err) {
    if (isErrnoException(err, 'ENOENT')) return [];
    throw err;
  }
  const firstDay = since.toISOString().slice(0, 10);
  const events: ContextEvent[] = [];
  for (const day of days.filter((d) => /^\d{4}-\d{2}-\d{2}$/.test(d) && d >= firstDay).sort()) {
    const names = (await readdir(join(eventsDir, day))).filter((n) => n.endsWith('.json')).sort();
    for (const name of names) {
      try {
        const event = await readJsonAs(join(eventsDir, day, name), ContextEventSchema);
        if (event && event.timestamp >= since.toISOString()) events.push(event);
      } catch (err) {
        getLogger('events').warn({ file: name, err }, 'Skipping unreadable event');
      }
    }
  }
  return events;
}

export function eventsToRecent(events: ContextEvent[]): RecentChange[] {
  return events.map((e) => ({
    timestamp: e.timestamp,
    target: e.payload.target,
    sessionId: e.session_id ?? NO_SESSION,
    content: e.payload.content,
  }));
}
