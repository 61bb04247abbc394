/**
 * Cross-project session registry (~/.shiftlog/sessions.registry.json).
 *
 * An explicit object handed to the session manager; every write is a
 * read-modify-write of the whole file under a lock, replaced atomically.
 */

import { z } from 'zod';
import type { RegistryEntry } from '../../types/session.js';
import { atomicWriteJson } from '../../store/atomic.js';
import { readJsonAs } from '../../store/json.js';
import { withLock } from '../../store/lock.js';
import { getGlobalRegistryPath } from '../paths.js';
import { getLogger } from '../logger.js';
import { isShiftlogError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

const RegistryEntrySchema: z.ZodType<RegistryEntry> = z.object({
  session_id: z.string(),
  focus: z.string(),
  created_at: z.string(),
  working_dir: z.string(),
  is_anchor_mode: z.boolean(),
});

const RegistryFileSchema = z.object({
  sessions: z.record(RegistryEntrySchema),
});

type RegistryFile = z.infer<typeof RegistryFileSchema>;

export class SessionRegistry {
  constructor(readonly filePath: string = getGlobalRegistryPath()) {}

  /** Read the file; a corrupt registry is logged and treated as empty. */
  private async load(): Promise<RegistryFile> {
    try {
      return (await readJsonAs(this.filePath, RegistryFileSchema)) ?? { sessions: {} };
    } catch (err) {
      if (!isShiftlogError(err, ExitCode.VALIDATION_ERROR)) throw err;
      getLogger('registry').warn({ file: this.filePath, err }, 'Corrupt session registry, starting empty');
      return { sessions: {} };
    }
  }

  private async mutate(fn: (file: RegistryFile) => void): Promise<void> {
    await withLock(this.filePath, async () => {
      const file = await this.load();
      fn(file);
      await atomicWriteJson(this.filePath, file);
    });
  }

  async register(entry: RegistryEntry): Promise<void> {
    await this.mutate((file) => {
      file.sessions[entry.session_id] = entry;
    });
  }

  /** Returns true when an entry was removed. */
  async remove(sessionId: string): Promise<boolean> {
    let removed = false;
    await this.mutate((file) => {
      removed = sessionId in file.sessions;
      delete file.sessions[sessionId];
    });
    return removed;
  }

  async get(sessionId: string): Promise<RegistryEntry | null> {
    return (await this.load()).sessions[sessionId] ?? null;
  }

  async list(workingDir?: string): Promise<RegistryEntry[]> {
    const entries = Object.values((await this.load()).sessions);
    return workingDir === undefined ? entries : entries.filter((e) => e.working_dir === workingDir);
  }
}
