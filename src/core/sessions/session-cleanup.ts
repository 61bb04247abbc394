/**
 * Reaping of abandoned sessions and trimming of old archives.
 *
 * Both sweeps only act on things older than a threshold, so they are
 * idempotent and safe to run alongside new clock-ins.
 */

import { readdir, rm, stat, rmdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { CleanupReport, SessionRecord } from '../../types/session.js';
import type { SessionConfig } from '../../types/config.js';
import { atomicWrite, safeReadFile } from '../../store/atomic.js';
import { isErrnoException, isShiftlogError } from '../errors.js';
import { getLogger } from '../logger.js';
import type { ContextLayout } from '../paths.js';
import { isValidSessionId } from './session-id.js';
import { readSessionRecord, sessionDir } from './session-store.js';
import type { SessionRegistry } from './session-registry.js';

const HOUR_MS = 60 * 60 * 1000;

async function listNames(dir: string): Promise<string[]> {
  try {
    return await readdir(dir);
  } catch (err) {
    if (isErrnoException(err, 'ENOENT')) return [];
    throw err;
  }
}

/** Creation time from session.json, or the directory mtime when unreadable. */
async function sessionStartedAt(layout: ContextLayout, sessionId: string): Promise<number> {
  let record: SessionRecord | null = null;
  try {
    record = await readSessionRecord(layout, sessionId);
  } catch (err) {
    if (!isShiftlogError(err)) throw err;
    getLogger('cleanup').debug({ sessionId, err }, 'Unreadable session file, using directory age');
  }
  const created = record ? new Date(record.created_at).getTime() : NaN;
  return isNaN(created) ? (await stat(sessionDir(layout, sessionId))).mtimeMs : created;
}

/**
 * Remove active sessions older than `staleAfterHours` and their registry entries.
 * Returns the reaped session ids.
 */
export async function reapStaleSessions(
  layout: ContextLayout,
  registry: SessionRegistry,
  options: { staleAfterHours: number; now: Date },
): Promise<string[]> {
  const log = getLogger('cleanup');
  const cutoff = options.now.getTime() - options.staleAfterHours * HOUR_MS;
  const reaped: string[] = [];

  for (const id of (await listNames(layout.activeDir)).filter(isValidSessionId).sort()) {
    let startedAt: number;
    try {
      startedAt = await sessionStartedAt(layout, id);
    } catch (err) {
      if (isErrnoException(err, 'ENOENT')) continue; // removed by a concurrent sweep
      throw err;
    }
    if (startedAt >= cutoff) continue;

    await rm(sessionDir(layout, id), { recursive: true, force: true });
    try {
      await registry.remove(id);
    } catch (err) {
      log.warn({ sessionId: id, err }, 'Failed to remove reaped session from registry');
    }
    reaped.push(id);
    log.info({ sessionId: id }, 'Reaped stale session');
  }
  return reaped;
}

/**
 * Delete archive files older than `retentionDays`, then empty day directories.
 * Returns the number of files deleted.
 */
export async function trimArchives(
  layout: ContextLayout,
  options: { retentionDays: number; now: Date },
): Promise<number> {
  const cutoff = options.now.getTime() - options.retentionDays * 24 * HOUR_MS;
  let deleted = 0;

  for (const day of (await listNames(layout.archiveDir)).sort()) {
    const dayDir = join(layout.archiveDir, day);
    const info = await stat(dayDir).catch(() => null);
    if (!info?.isDirectory()) continue;

    const names = await listNames(dayDir);
    let remaining = names.length;
    for (const name of names) {
      const file = join(dayDir, name);
      const fileInfo = await stat(file).catch(() => null);
      if (!fileInfo?.isFile() || fileInfo.mtimeMs >= cutoff) continue;
      await rm(file, { force: true });
      deleted++;
      remaining--;
    }
    if (remaining === 0) {
      await rmdir(dayDir).catch((err: unknown) => {
        getLogger('cleanup').debug({ dir: dayDir, err }, 'Archive directory not removed');
      });
    }
  }
  return deleted;
}

/**
 * Run both sweeps when `cleanupCadenceHours` has elapsed since the last run,
 * recorded in `last-cleanup`. Never throws; failures are logged.
 */
export async function runCleanupIfDue(
  layout: ContextLayout,
  registry: SessionRegistry,
  config: SessionConfig,
  now: Date,
): Promise<CleanupReport> {
  const log = getLogger('cleanup');
  const skipped: CleanupReport = { ran: false, reaped: [], trimmedArchives: 0 };

  try {
    const last = (await safeReadFile(layout.lastCleanupFile))?.trim();
    const lastMs = last ? new Date(last).getTime() : NaN;
    if (!isNaN(lastMs) && now.getTime() - lastMs < config.cleanupCadenceHours * HOUR_MS) {
      return skipped;
    }

    const reaped = await reapStaleSessions(layout, registry, { staleAfterHours: config.staleAfterHours, now });
    const trimmedArchives = await trimArchives(layout, { retentionDays: config.archiveRetentionDays, now });
    await atomicWrite(layout.lastCleanupFile, `${now.toISOString()}\n`);
    log.info({ reaped: reaped.length, trimmedArchives }, 'Cleanup complete');
    return { ran: true, reaped, trimmedArchives };
  } catch (err) {
    log.warn({ err }, 'Cleanup failed');
    return skipped;
  }
}
