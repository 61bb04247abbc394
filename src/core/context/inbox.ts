/**
 * Audit inbox: every update request is staged here before it is applied.
 *
 * Layout:
 *   inbox/pending/<uuid>.json     staged, not yet durable in the store
 *   inbox/processed/<uuid>.json   applied
 *   inbox/processed/index.json    list of processed ids (atomic replace)
 *
 * Entries move pending -> processed exactly once and are never deleted.
 */

import { randomUUID } from 'node:crypto';
import { readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { AuditEntry, InboxStatus, ProcessedIndex } from '../../types/context.js';
import { ExitCode } from '../../types/exit-codes.js';
import { ShiftlogError, isErrnoException } from '../errors.js';
import { getLogger } from '../logger.js';
import { contextLayout, type ContextLayout } from '../paths.js';
import { atomicWriteJson } from '../../store/atomic.js';
import { readJsonAs } from '../../store/json.js';
import { withLock } from '../../store/lock.js';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

const AuditEntrySchema: z.ZodType<AuditEntry> = z.object({
  id: z.string().regex(UUID_RE),
  timestamp: z.string(),
  target: z.string(),
  content: z.string(),
  status: z.enum(['pending', 'processed']),
  intent: z.string(),
  session_id: z.string().nullable(),
  processed_at: z.string().optional(),
});

const ProcessedIndexSchema: z.ZodType<ProcessedIndex> = z.object({
  entries: z.array(z.object({
    id: z.string(),
    target: z.string(),
    processed_at: z.string(),
  })),
});

export interface SubmitInput {
  target: string;
  content: string;
  intent: string;
  sessionId?: string | null;
}

function assertUuid(id: string): void {
  if (!UUID_RE.test(id)) {
    throw new ShiftlogError(ExitCode.INVALID_INPUT, `Invalid audit entry id: "${id}"`);
  }
}

async function countJson(dir: string, exclude?: string): Promise<number> {
  try {
    const names = await readdir(dir);
    return names.filter((n) => n.endsWith('.json') && n !== exclude).length;
  } catch (err) {
    if (isErrnoException(err, 'ENOENT')) return 0;
    throw err;
  }
}

export class AuditInbox {
  private readonly layout: ContextLayout;

  constructor(contextRoot: string, private readonly now: () => Date = () => new Date()) {
    this.layout = contextLayout(contextRoot);
  }

  private pendingPath(id: string): string {
    return join(this.layout.pendingDir, `${id}.json`);
  }

  private processedPath(id: string): string {
    return join(this.layout.processedDir, `${id}.json`);
  }

  /**
   * Stage a request. The entry is durable when this resolves.
   */
  async submit(input: SubmitInput): Promise<AuditEntry> {
    const entry: AuditEntry = {
      id: randomUUID(),
      timestamp: this.now().toISOString(),
      target: input.target,
      content: input.content,
      status: 'pending',
      intent: input.intent,
      session_id: input.sessionId ?? null,
    };
    await atomicWriteJson(this.pendingPath(entry.id), entry);
    getLogger('inbox').debug({ id: entry.id, target: entry.target }, 'Audit entry staged');
    return entry;
  }

  /**
   * Look an entry up in processed/, then pending/.
   */
  async get(id: string): Promise<AuditEntry | null> {
    assertUuid(id);
    return (await readJsonAs(this.processedPath(id), AuditEntrySchema))
      ?? (await readJsonAs(this.pendingPath(id), AuditEntrySchema));
  }

  /** Pending entries, oldest first. */
  async listPending(): Promise<AuditEntry[]> {
    let names: string[];
    try {
      names = await readdir(this.layout.pendingDir);
    } catch (err) {
      if (isErrnoException(err, 'ENOENT')) return [];
      throw err;
    }
    const entries: AuditEntry[] = [];
    for (const name of names.filter((n) => n.endsWith('.json'))) {
      const entry = await readJsonAs(join(this.layout.pendingDir, name), AuditEntrySchema);
      if (entry) entries.push(entry);
    }
    return entries.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  }

  /**
   * Move an entry to processed/ and record it in the index.
   * The index file lock makes this a single-writer section per project.
   */
  async markProcessed(id: string): Promise<AuditEntry> {
    assertUuid(id);
    return withLock(this.layout.processedIndex, async () => {
      if (await readJsonAs(this.processedPath(id), AuditEntrySchema)) {
        throw new ShiftlogError(
          ExitCode.AUDIT_ALREADY_PROCESSED,
          `Audit entry already processed: ${id}`,
        );
      }
      const pending = await readJsonAs(this.pendingPath(id), AuditEntrySchema);
      if (!pending) {
        throw new ShiftlogError(ExitCode.AUDIT_ENTRY_NOT_FOUND, `Audit entry not found: ${id}`);
      }

      const processedAt = this.now().toISOString();
      const processed: AuditEntry = { ...pending, status: 'processed', processed_at: processedAt };
      await atomicWriteJson(this.processedPath(id), processed);

      const index = (await readJsonAs(this.layout.processedIndex, ProcessedIndexSchema)) ?? { entries: [] };
      index.entries.push({ id, target: processed.target, processed_at: processedAt });
      await atomicWriteJson(this.layout.processedIndex, index);

      await rm(this.pendingPath(id), { force: true });
      getLogger('inbox').debug({ id }, 'Audit entry processed');
      return processed;
    });
  }

  async status(): Promise<InboxStatus> {
    return {
      pending: await countJson(this.layout.pendingDir),
      processed: await countJson(this.layout.processedDir, 'index.json'),
    };
  }
}
