import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { withLock } from '../lock.js';
import { ExitCode } from '../../types/exit-codes.js';

describe('withLock', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'shiftlog-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('locks a file that does not exist yet and releases it', async () => {
    const target = join(tempDir, 'nested', 'artifact.md');
    const held = await withLock(target, async () => (await stat(`${target}.lock`)).isDirectory());
    expect(held).toBe(true);
    await expect(stat(`${target}.lock`)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('fails with LOCK_TIMEOUT when the lock is held and retries are exhausted', async () => {
    const target = join(tempDir, 'artifact.md');
    const gate: { open?: () => void } = {};
    const holder = withLock(target, () => new Promise<void>((resolve) => {
      gate.open = resolve;
    }));
    await vi.waitFor(() => expect(gate.open).toBeDefined());

    try {
      await expect(withLock(target, async () => 'second', { retries: 0 })).rejects.toMatchObject({
        code: ExitCode.LOCK_TIMEOUT,
        kind: 'transient',
      });
    } finally {
      gate.open?.();
      await holder;
    }
  });

  it('serializes sections on one file', async () => {
    const target = join(tempDir, 'artifact.md');
    const order: string[] = [];
    const section = (name: string) => withLock(target, async () => {
      order.push(`${name}:start`);
      await new Promise((r) => setTimeout(r, 20));
      order.push(`${name}:end`);
    });

    await Promise.all([section('a'), section('b')]);

    expect(order).toHaveLength(4);
    expect(order[1]).toBe(order[0]?.replace('start', 'end'));
  });

  it('releases the lock when the section throws', async () => {
    const target = join(tempDir, 'artifact.md');
    await expect(withLock(target, async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    await expect(stat(`${target}.lock`)).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
