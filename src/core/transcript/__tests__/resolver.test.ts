/**
 * Tests for the transcript locator chain.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile, realpath, symlink, utimes } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  encodeProjectPath,
  hintLocator,
  legacyLocator,
  metadataLocator,
  overrideLocator,
  resolveTranscript,
  temporalLocator,
  type ResolverOptions,
  type TranscriptLocator,
  type TranscriptQuery,
} from '../resolver.js';

const SESSION = 'ses_20260101120000_a1b2c3';
const line = (id: string) => `${JSON.stringify({ type: 'user', message: { content: `session ${id}` } })}\n`;

describe('resolveTranscript', () => {
  let tempDir: string;
  let root: string;
  let project: string;
  let query: TranscriptQuery;
  let options: ResolverOptions;

  async function age(path: string, minutes: number): Promise<void> {
    const when = new Date(Date.now() - minutes * 60_000);
    await utimes(path, when, when);
  }

  beforeEach(async () => {
    tempDir = await realpath(await mkdtemp(join(tmpdir(), 'shiftlog-resolver-')));
    root = join(tempDir, 'transcripts');
    project = join(tempDir, 'work', 'app');
    await mkdir(root, { recursive: true });
    await mkdir(project, { recursive: true });
    query = {
      sessionId: SESSION,
      projectRoot: project,
      createdAt: new Date(Date.now() - 30 * 60_000).toISOString(),
      hint: null,
    };
    options = { root, toleranceMinutes: 10, maxAgeHours: 24, maxProjectsScan: 50, overrideDir: null };
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('returns null when nothing matches', async () => {
    expect(await resolveTranscript(query, options)).toBeNull();
  });

  it('prefers the clock-in hint', async () => {
    const dir = join(root, 'p1');
    await mkdir(dir);
    await writeFile(join(dir, 'hinted.jsonl'), 'no id here\n');
    await writeFile(join(dir, 'mentions.jsonl'), line(SESSION));

    const result = await resolveTranscript({ ...query, hint: join(dir, 'hinted.jsonl') }, options);
    expect(result).toEqual({ path: join(dir, 'hinted.jsonl'), locator: 'hint' });
  });

  it('rejects a hint outside the transcripts root and falls through', async () => {
    const outside = join(tempDir, 'elsewhere.jsonl');
    await writeFile(outside, line(SESSION));
    const dir = join(root, 'p1');
    await mkdir(dir);
    await writeFile(join(dir, 'real.jsonl'), line(SESSION));

    const result = await resolveTranscript({ ...query, hint: outside }, options);
    expect(result).toEqual({ path: join(dir, 'real.jsonl'), locator: 'temporal' });
  });

  it('rejects a hint that escapes through a symlink', async () => {
    const outside = join(tempDir, 'secret.jsonl');
    await writeFile(outside, line(SESSION));
    await symlink(outside, join(root, 'link.jsonl'));

    expect(await resolveTranscript({ ...query, hint: join(root, 'link.jsonl') }, options, [hintLocator])).toBeNull();
  });

  describe('temporal', () => {
    it('picks the newest recent file mentioning the session', async () => {
      const a = join(root, 'p1');
      const b = join(root, 'p2');
      await mkdir(a);
      await mkdir(b);
      await writeFile(join(a, 'older.jsonl'), line(SESSION));
      await writeFile(join(b, 'newer.jsonl'), line(SESSION));
      await writeFile(join(b, 'other.jsonl'), line('ses_20260101120000_ffffff'));
      await age(join(a, 'older.jsonl'), 20);
      await age(join(b, 'newer.jsonl'), 5);

      expect(await temporalLocator.locate(query, options)).toEqual({ path: join(b, 'newer.jsonl'), allowedRoot: root });
    });

    it('ignores files modified before the session started minus tolerance', async () => {
      const a = join(root, 'p1');
      await mkdir(a);
      await writeFile(join(a, 'stale.jsonl'), line(SESSION));
      await age(join(a, 'stale.jsonl'), 45);

      expect(await temporalLocator.locate(query, options)).toBeNull();
    });
  });

  it('finds a project folder through project_config.json', async () => {
    const dir = join(root, 'opaque-name');
    await mkdir(dir);
    await writeFile(join(dir, 'project_config.json'), JSON.stringify({ rootPath: project }));
    await writeFile(join(dir, 'a.jsonl'), 'x\n');
    await writeFile(join(dir, 'b.jsonl'), 'y\n');
    await age(join(dir, 'a.jsonl'), 10);

    expect(await metadataLocator.locate(query, options)).toEqual({ path: join(dir, 'b.jsonl'), allowedRoot: root });
    expect(await metadataLocator.locate(query, { ...options, maxProjectsScan: 0 })).toBeNull();
  });

  describe('override', () => {
    it('searches the override directory recursively', async () => {
      const override = join(tempDir, 'exports');
      await mkdir(join(override, 'deep', 'er'), { recursive: true });
      await writeFile(join(override, 'deep', 'er', 'x.jsonl'), line(SESSION));

      const result = await resolveTranscript(query, { ...options, overrideDir: override });
      expect(result).toEqual({ path: join(override, 'deep', 'er', 'x.jsonl'), locator: 'override' });
    });

    it('skips files that resolve outside it', async () => {
      const override = join(tempDir, 'exports');
      await mkdir(override);
      const outside = join(tempDir, 'outside.jsonl');
      await writeFile(outside, line(SESSION));
      await symlink(outside, join(override, 'escape.jsonl'));

      expect(await overrideLocator.locate(query, { ...options, overrideDir: override })).toBeNull();
    });

    it('is skipped when unset or missing', async () => {
      expect(await overrideLocator.locate(query, options)).toBeNull();
      expect(await overrideLocator.locate(query, { ...options, overrideDir: join(tempDir, 'none') })).toBeNull();
    });
  });

  it('falls back to the folder named after the project path', async () => {
    expect(encodeProjectPath('/home/dev/app')).toBe('-home-dev-app');
    const dir = join(root, encodeProjectPath(project));
    await mkdir(dir);
    await writeFile(join(dir, 'x.jsonl'), 'unrelated\n');

    const result = await resolveTranscript(query, options);
    expect(result).toEqual({ path: join(dir, 'x.jsonl'), locator: 'legacy' });
  });

  it('accepts the legacy folder without the leading dash', async () => {
    const dir = join(root, encodeProjectPath(project).replace(/^-+/, ''));
    await mkdir(dir);
    await writeFile(join(dir, 'x.jsonl'), 'unrelated\n');

    expect(await legacyLocator.locate(query, options)).toEqual({ path: join(dir, 'x.jsonl'), allowedRoot: root });
  });

  it('runs locators in order and skips unreadable candidates', async () => {
    const calls: string[] = [];
    const existing = join(root, 'found.jsonl');
    await writeFile(existing, 'x\n');
    const fake = (name: string, path: string | null): TranscriptLocator => ({
      name,
      async locate() {
        calls.push(name);
        return path ? { path, allowedRoot: root } : null;
      },
    });

    const result = await resolveTranscript(query, options, [
      fake('empty', null),
      fake('missing', join(root, 'gone.jsonl')),
      fake('good', existing),
      fake('never', existing),
    ]);
    expect(result).toEqual({ path: existing, locator: 'good' });
    expect(calls).toEqual(['empty', 'missing', 'good']);
  });
});
