/**
 * Per-session records under sessions/active/<id>/session.json.
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { SessionRecord } from '../../types/session.js';
import { atomicWriteJson } from '../../store/atomic.js';
import { readJsonAs } from '../../store/json.js';
import { isErrnoException, isShiftlogError } from '../errors.js';
import { getLogger } from '../logger.js';
import type { ContextLayout } from '../paths.js';
import { isValidSessionId } from './session-id.js';

export const SessionRecordSchema: z.ZodType<SessionRecord> = z.object({
  session_id: z.string(),
  focus: z.string(),
  role: z.string(),
  created_at: z.string(),
  working_dir: z.string(),
  is_anchor_mode: z.boolean(),
  transcript_path: z.string().nullable(),
  registry_linked: z.boolean(),
});

export function sessionDir(layout: ContextLayout, sessionId: string): string {
  return join(layout.activeDir, sessionId);
}

export function sessionFile(layout: ContextLayout, sessionId: string): string {
  return join(sessionDir(layout, sessionId), 'session.json');
}

export async function writeSessionRecord(layout: ContextLayout, record: SessionRecord): Promise<void> {
  await atomicWriteJson(sessionFile(layout, record.session_id), record);
}

/**
 * Read a session record. Null when missing; throws VALIDATION_ERROR when corrupt.
 */
export async function readSessionRecord(layout: ContextLayout, sessionId: string): Promise<SessionRecord | null> {
  return readJsonAs(sessionFile(layout, sessionId), SessionRecordSchema);
}

export interface ActiveSessions {
  records: SessionRecord[];
  /** Session directories whose session.json is missing or unreadable. */
  corrupt: string[];
}

/**
 * Every active session. Unreadable records are logged and reported, not thrown.
 */
export async function listActiveSessions(layout: ContextLayout): Promise<ActiveSessions> {
  let names: string[];
  try {
    names = await readdir(layout.activeDir);
  } catch (err) {
    if (isErrnoException(err, 'ENOENT')) return { records: [], corrupt: [] };
    throw err;
  }

  const result: ActiveSessions = { records: [], corrupt: [] };
  for (const name of names.filter(isValidSessionId).sort()) {
    try {
      const record = await readSessionRecord(layout, name);
      if (record) result.records.push(record);
      else result.corrupt.push(name);
    } catch (err) {
      if (!isShiftlogError(err)) throw err;
      getLogger('sessions').warn({ sessionId: name, err }, 'Skipping corrupt session file');
      result.corrupt.push(name);
    }
  }
  return result;
}
