/**
 * Persistence mode selection and the snapshot write guard.
 *
 * Anchor mode: snapshots/ exists. Snapshots are read-only here; updates
 * become events. Legacy mode: context/ artifacts are written directly.
 */

import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { ArtifactPath, PersistenceMode } from '../../types/session.js';
import { ExitCode } from '../../types/exit-codes.js';
import { ShiftlogError, isErrnoException } from '../errors.js';
import { getLogger } from '../logger.js';
import { contextLayout } from '../paths.js';
import { isContained } from '../security.js';
import { atomicWrite, atomicAppend } from '../../store/atomic.js';

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch (err) {
    if (isErrnoException(err, 'ENOENT') || isErrnoException(err, 'ENOTDIR')) return false;
    throw err;
  }
}

async function exists(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch (err) {
    if (isErrnoException(err, 'ENOENT') || isErrnoException(err, 'ENOTDIR')) return false;
    throw err;
  }
}

export async function detectPersistenceMode(contextRoot: string): Promise<PersistenceMode> {
  return (await isDirectory(contextLayout(contextRoot).snapshotsDir)) ? 'anchor' : 'legacy';
}

/**
 * Find a context file: snapshots/, then context/, then the project root.
 * Falls back to the context/ path (not existing) when found nowhere.
 */
export async function locateContextFile(
  contextRoot: string,
  projectRoot: string,
  fileName: string,
): Promise<ArtifactPath> {
  const layout = contextLayout(contextRoot);
  for (const dir of [layout.snapshotsDir, layout.contextDir, projectRoot]) {
    const path = join(dir, fileName);
    if (await exists(path)) return { path, exists: true };
  }
  return { path: join(layout.contextDir, fileName), exists: false };
}

/**
 * Throws SNAPSHOT_WRITE_BLOCKED for any path inside snapshots/.
 */
export function assertNotSnapshot(contextRoot: string, targetPath: string): void {
  const { snapshotsDir } = contextLayout(contextRoot);
  if (isContained(snapshotsDir, targetPath)) {
    getLogger('persistence').error({ targetPath }, 'Blocked write into snapshot directory');
    throw new ShiftlogError(
      ExitCode.SNAPSHOT_WRITE_BLOCKED,
      `Refusing to write into the read-only snapshot directory: ${targetPath}`,
      { fix: 'Anchor-mode updates must be emitted as events' },
    );
  }
}

/**
 * Writes under a context root, all checked against the snapshot guard.
 */
export class GuardedWriter {
  constructor(private readonly contextRoot: string) {}

  async write(filePath: string, data: string): Promise<void> {
    assertNotSnapshot(this.contextRoot, filePath);
    await atomicWrite(filePath, data);
  }

  async append(filePath: string, text: string): Promise<void> {
    assertNotSnapshot(this.contextRoot, filePath);
    await atomicAppend(filePath, text);
  }
}
