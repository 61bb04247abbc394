/**
 * Tests for the audit inbox.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { AuditInbox } from '../inbox.js';
import { ExitCode } from '../../../types/exit-codes.js';

describe('AuditInbox', () => {
  let root: string;
  let inbox: AuditInbox;
  const now = () => new Date('2026-02-01T10:00:00.000Z');

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'shiftlog-inbox-'));
    inbox = new AuditInbox(root, now);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('stages an entry as pending', async () => {
    const entry = await inbox.submit({ target: 'PROJECT-CONTEXT', content: 'x', intent: 'note', sessionId: null });

    expect(entry).toEqual({
      id: entry.id,
      timestamp: '2026-02-01T10:00:00.000Z',
      target: 'PROJECT-CONTEXT',
      content: 'x',
      status: 'pending',
      intent: 'note',
      session_id: null,
    });
    expect(await readdir(join(root, 'inbox', 'pending'))).toEqual([`${entry.id}.json`]);
    expect(await inbox.status()).toEqual({ pending: 1, processed: 0 });
    expect(await inbox.listPending()).toEqual([entry]);
  });

  it('moves an entry to processed exactly once', async () => {
    const entry = await inbox.submit({ target: 'PROJECT-CONTEXT', content: 'x', intent: 'note' });

    const processed = await inbox.markProcessed(entry.id);
    expect(processed.status).toBe('processed');
    expect(processed.processed_at).toBe('2026-02-01T10:00:00.000Z');
    expect(await inbox.get(entry.id)).toEqual(processed);
    expect(await inbox.status()).toEqual({ pending: 0, processed: 1 });

    const index: unknown = JSON.parse(await readFile(join(root, 'inbox', 'processed', 'index.json'), 'utf8'));
    expect(index).toEqual({
      entries: [{ id: entry.id, target: 'PROJECT-CONTEXT', processed_at: '2026-02-01T10:00:00.000Z' }],
    });

    await expect(inbox.markProcessed(entry.id)).rejects.toMatchObject({
      code: ExitCode.AUDIT_ALREADY_PROCESSED,
    });
    expect(await inbox.status()).toEqual({ pending: 0, processed: 1 });
    expect((await inbox.get(entry.id))?.status).toBe('processed');
  });

  it('never returns a processed entry to pending', async () => {
    const entries = await Promise.all(
      ['A', 'B', 'C'].map((t) => inbox.submit({ target: t, content: t, intent: 'bulk' })),
    );
    const results = await Promise.allSettled(entries.map((e) => inbox.markProcessed(e.id)));
    expect(results.every((r) => r.status === 'fulfilled')).toBe(true);

    // A second round on the same ids fails for every one of them.
    const again = await Promise.allSettled(entries.map((e) => inbox.markProcessed(e.id)));
    expect(again.map((r) => r.status)).toEqual(['rejected', 'rejected', 'rejected']);
    expect(await inbox.listPending()).toEqual([]);
    expect(await inbox.status()).toEqual({ pending: 0, processed: 3 });
  });

  it('reports unknown and malformed ids', async () => {
    await expect(inbox.markProcessed('00000000-0000-4000-8000-000000000000')).rejects.toMatchObject({
      code: ExitCode.AUDIT_ENTRY_NOT_FOUND,
    });
    await expect(inbox.get('../../etc/passwd')).rejects.toMatchObject({ code: ExitCode.INVALID_INPUT });
    expect(await inbox.get('00000000-0000-4000-8000-000000000000')).toBeNull();
  });
});
