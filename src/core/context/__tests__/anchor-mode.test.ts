/**
 * Anchor mode: updates become events and snapshots/ is never written.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile, readFile, readdir, stat, realpath } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ContextMergeEngine } from '../merge-engine.js';
import { getDefaultConfig } from '../../config.js';
import { isContained } from '../../security.js';

const recorder = vi.hoisted(() => ({ paths: [] as string[] }));

vi.mock('../../../store/atomic.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../store/atomic.js')>();
  return {
    ...actual,
    atomicWrite: vi.fn(async (filePath: string, data: string) => {
      recorder.paths.push(filePath);
      return actual.atomicWrite(filePath, data);
    }),
    atomicWriteJson: vi.fn(async (filePath: string, data: unknown) => {
      recorder.paths.push(filePath);
      return actual.atomicWriteJson(filePath, data);
    }),
    atomicAppend: vi.fn(async (filePath: string, text: string) => {
      recorder.paths.push(filePath);
      return actual.atomicAppend(filePath, text);
    }),
  };
});

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    mkdir: vi.fn(async (...args: Parameters<typeof actual.mkdir>) => {
      recorder.paths.push(String(args[0]));
      return actual.mkdir(...args);
    }),
  };
});

async function treeHash(dir: string): Promise<string> {
  const hash = createHash('sha256');
  const walk = async (current: string): Promise<void> => {
    for (const name of (await readdir(current)).sort()) {
      const full = join(current, name);
      const info = await stat(full);
      hash.update(`${full}:${info.mtimeMs}\n`);
      if (info.isDirectory()) await walk(full);
      else hash.update(await readFile(full));
    }
  };
  await walk(dir);
  return hash.digest('hex');
}

describe('ContextMergeEngine (anchor mode)', () => {
  let tempDir: string;
  let root: string;
  let snapshots: string;

  beforeEach(async () => {
    tempDir = await realpath(await mkdtemp(join(tmpdir(), 'shiftlog-anchor-')));
    root = join(tempDir, '.shiftlog');
    snapshots = join(root, 'snapshots');
    await mkdir(join(snapshots, 'notes'), { recursive: true });
    await writeFile(join(snapshots, 'PROJECT-CONTEXT.md'), '# PROJECT-CONTEXT\n\nsnapshot body\n');
    await writeFile(join(snapshots, 'notes', 'DECISIONS.md'), '# notes/DECISIONS\n');
    recorder.paths.length = 0;
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('emits an event and leaves snapshots untouched', async () => {
    const before = await treeHash(snapshots);
    const engine = new ContextMergeEngine({
      contextRoot: root,
      config: getDefaultConfig(),
      now: () => new Date('2026-03-04T05:06:07.089Z'),
    });

    const result = await engine.update({
      target: 'PROJECT-CONTEXT',
      content: '## CURRENT_STATE\nshipping\n',
      intent: 'progress',
      sessionId: 'ses_20260304050000_abcdef',
    });

    expect(result).toMatchObject({
      status: 'event_emitted',
      mode: 'anchor',
      target: 'PROJECT-CONTEXT',
      targetPath: join(snapshots, 'PROJECT-CONTEXT.md'),
      merge: null,
      delegate: null,
      lineCount: 2,
      compaction: { performed: false, sectionsArchived: [] },
    });
    const eventPath = result.eventPath ?? '';
    expect(eventPath.startsWith(join(root, 'events', '2026-03-04', '20260304T050607089Z-'))).toBe(true);
    expect(eventPath.endsWith('-context_update.json')).toBe(true);
    expect(await readFile(eventPath, 'utf8')).toContain('"inbox_uuid": "' + result.auditId + '"');

    expect(await treeHash(snapshots)).toBe(before);
    expect(recorder.paths.length).toBeGreaterThan(0);
    expect(recorder.paths.filter((p) => isContained(snapshots, p))).toEqual([]);

    expect((await engine.auditInbox.get(result.auditId))?.status).toBe('processed');
    await expect(stat(join(root, 'context', 'PROJECT-CHANGELOG.md'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('flags an earlier event from another session', async () => {
    let clock = new Date('2026-03-04T05:00:00.000Z');
    const engine = new ContextMergeEngine({ contextRoot: root, config: getDefaultConfig(), now: () => clock });

    await engine.update({
      target: 'notes/DECISIONS.md',
      content: '## Storage\nfiles',
      intent: 'a',
      sessionId: 'ses_20260304050000_aaaaaa',
    });
    clock = new Date('2026-03-04T05:10:00.000Z');
    const result = await engine.update({
      target: 'notes/DECISIONS.md',
      content: '## Storage\nsqlite',
      intent: 'b',
      sessionId: 'ses_20260304050500_bbbbbb',
    });

    expect(result.conflict).toEqual({
      hasConflict: true,
      conflicts: [{
        timestamp: '2026-03-04T05:00:00.000Z',
        target: 'notes/DECISIONS',
        sessionId: 'ses_20260304050000_aaaaaa',
        content: '## Storage\nfiles',
      }],
      overlappingSections: ['Storage'],
    });
    expect(await readFile(join(snapshots, 'notes', 'DECISIONS.md'), 'utf8')).toBe('# notes/DECISIONS\n');
    expect(await engine.auditInbox.status()).toEqual({ pending: 0, processed: 2 });
  });
});
