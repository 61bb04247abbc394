/**
 * Transcript resolution: an ordered chain of locators.
 *
 * Each locator proposes a candidate path and the root it must stay inside.
 * The first candidate that passes the containment check and is readable wins.
 */

import { readdir, readFile, stat, access, realpath } from 'node:fs/promises';
import { constants } from 'node:fs';
import type { Dirent } from 'node:fs';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { getLogger } from '../logger.js';
import { assertContained, isContained } from '../security.js';
import { isShiftlogError } from '../errors.js';

/** What is known about the session whose transcript is wanted. */
export interface TranscriptQuery {
  sessionId: string;
  projectRoot: string;
  createdAt: string;
  /** Path recorded at clock-in. */
  hint: string | null;
}

export interface ResolverOptions {
  /** Per-project transcript folders live below this directory. */
  root: string;
  toleranceMinutes: number;
  maxAgeHours: number;
  maxProjectsScan: number;
  /** Escape-hatch directory, searched recursively. */
  overrideDir: string | null;
  now?: () => Date;
}

export interface TranscriptCandidate {
  path: string;
  allowedRoot: string;
}

export interface TranscriptLocator {
  name: string;
  locate(query: TranscriptQuery, options: ResolverOptions): Promise<TranscriptCandidate | null>;
}

export interface ResolvedTranscript {
  path: string;
  locator: string;
}

const ProjectConfigSchema = z.object({ rootPath: z.string() });

async function listDirs(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory())
      .map((e) => join(dir, e.name))
      .sort();
  } catch (err) {
    getLogger('transcript').debug({ dir, err }, 'Directory not listable');
    return [];
  }
}

async function listJsonl(dir: string): Promise<Array<{ path: string; mtimeMs: number }>> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err) {
    getLogger('transcript').debug({ dir, err }, 'Directory not listable');
    return [];
  }
  const files: Array<{ path: string; mtimeMs: number }> = [];
  for (const name of names.filter((n) => n.endsWith('.jsonl'))) {
    const path = join(dir, name);
    try {
      const info = await stat(path);
      if (info.isFile()) files.push({ path, mtimeMs: info.mtimeMs });
    } catch (err) {
      getLogger('transcript').warn({ path, err }, 'Skipping unreadable transcript');
    }
  }
  return files;
}

function newest(files: Array<{ path: string; mtimeMs: number }>): string | null {
  let best: { path: string; mtimeMs: number } | null = null;
  for (const f of files) {
    if (!best || f.mtimeMs > best.mtimeMs) best = f;
  }
  return best ? best.path : null;
}

async function mentions(path: string, needle: string): Promise<boolean> {
  try {
    return (await readFile(path, 'utf8')).includes(needle);
  } catch (err) {
    getLogger('transcript').warn({ path, err }, 'Skipping unreadable transcript');
    return false;
  }
}

/** The path recorded at clock-in. */
export const hintLocator: TranscriptLocator = {
  name: 'hint',
  async locate(query, options) {
    if (!query.hint) return null;
    return { path: query.hint, allowedRoot: options.overrideDir ?? options.root };
  },
};

/** Recently modified transcripts that mention the session id. */
export const temporalLocator: TranscriptLocator = {
  name: 'temporal',
  async locate(query, options) {
    const now = (options.now ?? (() => new Date()))().getTime();
    const started = new Date(query.createdAt).getTime();
    const ageCutoff = now - options.maxAgeHours * 3_600_000;
    const startCutoff = isNaN(started) ? ageCutoff : started - options.toleranceMinutes * 60_000;
    const cutoff = Math.max(ageCutoff, startCutoff);

    const matches: Array<{ path: string; mtimeMs: number }> = [];
    for (const dir of await listDirs(options.root)) {
      for (const file of await listJsonl(dir)) {
        if (file.mtimeMs < cutoff) continue;
        if (await mentions(file.path, query.sessionId)) matches.push(file);
      }
    }
    const path = newest(matches);
    return path ? { path, allowedRoot: options.root } : null;
  },
};

/** Project folders whose project_config.json names this project root. */
export const metadataLocator: TranscriptLocator = {
  name: 'metadata',
  async locate(query, options) {
    const projectRoot = resolve(query.projectRoot);
    const dirs = await listDirs(options.root);
    if (dirs.length > options.maxProjectsScan) {
      getLogger('transcript').debug({ count: dirs.length, limit: options.maxProjectsScan }, 'Metadata scan limited');
    }
    for (const dir of dirs.slice(0, options.maxProjectsScan)) {
      let raw: string;
      try {
        raw = await readFile(join(dir, 'project_config.json'), 'utf8');
      } catch {
        continue;
      }
      let config: z.infer<typeof ProjectConfigSchema>;
      try {
        config = ProjectConfigSchema.parse(JSON.parse(raw));
      } catch (err) {
        getLogger('transcript').warn({ dir, err }, 'Ignoring unreadable project_config.json');
        continue;
      }
      if (resolve(config.rootPath) !== projectRoot) continue;
      const path = newest(await listJsonl(dir));
      return path ? { path, allowedRoot: options.root } : null;
    }
    return null;
  },
};

async function walkJsonl(dir: string, out: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    getLogger('transcript').debug({ dir, err }, 'Directory not listable');
    return;
  }
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) await walkJsonl(path, out);
    else if (entry.name.endsWith('.jsonl')) out.push(path);
  }
}

/** SHIFTLOG_TRANSCRIPT_DIR, searched recursively for the session id. */
export const overrideLocator: TranscriptLocator = {
  name: 'override',
  async locate(query, options) {
    if (!options.overrideDir) return null;
    let root: string;
    try {
      root = await realpath(options.overrideDir);
    } catch (err) {
      getLogger('transcript').warn({ dir: options.overrideDir, err }, 'Transcript override directory missing');
      return null;
    }
    const files: string[] = [];
    await walkJsonl(root, files);
    for (const file of files.sort()) {
      const real = await realpath(file).catch(() => null);
      if (!real || !isContained(root, real)) {
        getLogger('transcript').warn({ file }, 'Skipping transcript outside override directory');
        continue;
      }
      if (await mentions(file, query.sessionId)) {
        return { path: file, allowedRoot: root };
      }
    }
    return null;
  },
};

/**
 * Folder name derived from the project path ("/" becomes "-").
 */
export function encodeProjectPath(projectRoot: string): string {
  return resolve(projectRoot).replace(/[\\/]/g, '-');
}

/** Deterministic folder derived from the project path. */
export const legacyLocator: TranscriptLocator = {
  name: 'legacy',
  async locate(query, options) {
    const encoded = encodeProjectPath(query.projectRoot);
    for (const name of [encoded, encoded.replace(/^-+/, '')]) {
      const path = newest(await listJsonl(join(options.root, name)));
      if (path) return { path, allowedRoot: options.root };
    }
    return null;
  },
};

export const DEFAULT_LOCATORS: readonly TranscriptLocator[] = [
  hintLocator,
  temporalLocator,
  metadataLocator,
  overrideLocator,
  legacyLocator,
];

async function isReadable(path: string): Promise<boolean> {
  try {
    await access(path, constants.R_OK);
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Run the locator chain. Returns null when no locator yields a contained,
 * readable transcript.
 */
export async function resolveTranscript(
  query: TranscriptQuery,
  options: ResolverOptions,
  locators: readonly TranscriptLocator[] = DEFAULT_LOCATORS,
): Promise<ResolvedTranscript | null> {
  for (const locator of locators) {
    const candidate = await locator.locate(query, options);
    if (!candidate) {
      getLogger('transcript').debug({ locator: locator.name, sessionId: query.sessionId }, 'No candidate');
      continue;
    }
    let path: string;
    try {
      path = await assertContained(candidate.allowedRoot, candidate.path, 'transcript');
    } catch (err) {
      if (isShiftlogError(err)) {
        getLogger('transcript').warn({ locator: locator.name, candidate: candidate.path }, 'Transcript candidate rejected');
        continue;
      }
      throw err;
    }
    if (!(await isReadable(path))) {
      getLogger('transcript').debug({ locator: locator.name, path }, 'Transcript candidate not readable');
      continue;
    }
    getLogger('transcript').info({ locator: locator.name, path, sessionId: query.sessionId }, 'Transcript resolved');
    return { path, locator: locator.name };
  }
  return null;
}
