/**
 * Tests for JSON reads with schema validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { z } from 'zod';
import { readJson, readJsonAs } from '../json.js';
import { ExitCode } from '../../types/exit-codes.js';

const Point = z.object({ x: z.number(), y: z.number() });

describe('readJson', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'shiftlog-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('returns null for a missing file', async () => {
    expect(await readJson(join(tempDir, 'missing.json'))).toBeNull();
  });

  it('parses valid JSON', async () => {
    const filePath = join(tempDir, 'a.json');
    await writeFile(filePath, '{"a":[1,2]}');
    expect(await readJson(filePath)).toEqual({ a: [1, 2] });
  });

  it('throws VALIDATION_ERROR for invalid JSON', async () => {
    const filePath = join(tempDir, 'bad.json');
    await writeFile(filePath, '{not json');
    await expect(readJson(filePath)).rejects.toMatchObject({ code: ExitCode.VALIDATION_ERROR });
  });
});

describe('readJsonAs', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'shiftlog-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('returns typed data when the shape matches', async () => {
    const filePath = join(tempDir, 'p.json');
    await writeFile(filePath, '{"x":1,"y":2}');
    const point = await readJsonAs(filePath, Point);
    expect(point).toEqual({ x: 1, y: 2 });
  });

  it('throws VALIDATION_ERROR with issues when the shape is wrong', async () => {
    const filePath = join(tempDir, 'p.json');
    await writeFile(filePath, '{"x":"one","y":2}');
    await expect(readJsonAs(filePath, Point)).rejects.toMatchObject({
      code: ExitCode.VALIDATION_ERROR,
      details: { issues: [expect.stringContaining('x:')] },
    });
  });

  it('returns null for a missing file', async () => {
    expect(await readJsonAs(join(tempDir, 'none.json'), Point)).toBeNull();
  });
});
