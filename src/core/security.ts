/**
 * Input sanitization and path containment.
 *
 * Lexical checks run before any filesystem access; realpath checks run
 * before a resolved path is read or written.
 */

import { realpath, lstat, readlink } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { resolve, normalize, relative, isAbsolute, dirname, sep } from 'node:path';
import { ShiftlogError, isErrnoException } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { isValidSessionId } from './sessions/session-id.js';
import { getLogger } from './logger.js';

/** Upper-case artifact names such as PROJECT-CONTEXT. */
const TARGET_NAME_PATTERN = /^[A-Z0-9][A-Z0-9_-]*$/;

function traversal(message: string, details?: Record<string, unknown>): ShiftlogError {
  getLogger('security').warn({ ...details }, message);
  return new ShiftlogError(ExitCode.PATH_TRAVERSAL, message, { details });
}

/**
 * Validate a session id before it is used to build a path.
 */
export function sanitizeSessionId(id: string): string {
  const trimmed = id.trim();
  if (!isValidSessionId(trimmed)) {
    getLogger('security').warn({ sessionId: id }, 'Rejected session id');
    throw new ShiftlogError(
      ExitCode.SESSION_ID_INVALID,
      `Invalid session id: "${id}"`,
      { fix: 'Session ids look like ses_20260101120000_a1b2c3' },
    );
  }
  return trimmed;
}

/**
 * Validate a working directory: absolute, no `..` segments, no NUL.
 */
export function sanitizeWorkingDir(dir: string): string {
  if (dir.includes('\0')) {
    throw traversal('Working directory contains null bytes', { dir });
  }
  if (!isAbsolute(dir)) {
    throw traversal(`Working directory must be absolute: "${dir}"`, { dir });
  }
  if (dir.split(/[\\/]/).includes('..')) {
    throw traversal(`Working directory contains "..": "${dir}"`, { dir });
  }
  return normalize(dir);
}

/** One path segment of a relative target. */
const TARGET_SEGMENT_PATTERN = /^[A-Za-z0-9._-]+$/;

/**
 * Security half of target validation: no NUL, backslash, absolute part or
 * `..` segment, and every segment drawn from `[A-Za-z0-9._-]`. Runs before
 * the request is staged. Touches no filesystem.
 */
export function assertSafeTarget(target: string): void {
  const trimmed = target.trim();
  if (trimmed.includes('\0') || trimmed.includes('\\')) {
    throw traversal(`Target contains forbidden characters: ${JSON.stringify(target)}`, { target });
  }
  const segments = trimmed.split('/');
  if (isAbsolute(trimmed) || segments.includes('..')) {
    throw traversal(`Path traversal detected: "${target}" escapes the context directory`, { target });
  }
  if (trimmed.length > 0 && !segments.every((part) => TARGET_SEGMENT_PATTERN.test(part))) {
    throw traversal(`Target contains forbidden characters: ${JSON.stringify(target)}`, { target });
  }
}

/**
 * Validate a context update target and return its path relative to the
 * context directory.
 *
 * Accepts an artifact name (`PROJECT-CONTEXT`) or a relative `.md` path.
 * Security failures raise PATH_TRAVERSAL; an empty or non-markdown target
 * raises INVALID_INPUT.
 */
export function sanitizeTarget(target: string): string {
  assertSafeTarget(target);
  const trimmed = target.trim();
  if (trimmed.length === 0) {
    throw new ShiftlogError(ExitCode.INVALID_INPUT, 'Target cannot be empty');
  }
  if (TARGET_NAME_PATTERN.test(trimmed)) {
    return `${trimmed}.md`;
  }
  if (!trimmed.endsWith('.md')) {
    throw new ShiftlogError(
      ExitCode.INVALID_INPUT,
      `Target must be an artifact name or a .md path: "${target}"`,
      { fix: 'Use a name like PROJECT-CONTEXT or a path like notes/DECISIONS.md' },
    );
  }
  return normalize(trimmed);
}

/**
 * Whether `candidate` equals `root` or lies beneath it, lexically.
 */
export function isContained(root: string, candidate: string): boolean {
  const rel = relative(resolve(root), resolve(candidate));
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

/**
 * Resolve symlinks in `p`. For a path that does not exist yet, its nearest
 * existing ancestor is resolved and the remainder appended.
 */
export async function realpathOrNearest(p: string): Promise<string> {
  const absolute = resolve(p);
  try {
    return await realpath(absolute);
  } catch (err) {
    if (!isErrnoException(err, 'ENOENT')) throw err;
    const parent = dirname(absolute);
    if (parent === absolute) return absolute;
    const base = await realpathOrNearest(parent);
    return base + sep + relative(parent, absolute);
  }
}

/**
 * Resolve `candidate` and check it lies inside `root` after symlinks are
 * followed. Returns the resolved path.
 */
export async function assertContained(root: string, candidate: string, label = 'path'): Promise<string> {
  const [realRoot, realCandidate] = await Promise.all([
    realpathOrNearest(root),
    realpathOrNearest(candidate),
  ]);
  if (!isContained(realRoot, realCandidate)) {
    throw traversal(`Path traversal detected: ${label} "${candidate}" resolves outside "${root}"`, {
      root,
      candidate,
      resolved: realCandidate,
    });
  }
  return realCandidate;
}

/**
 * Follow a symlink exactly one hop.
 *
 * Returns `link` unchanged when it is not a symlink, or null when nothing
 * exists there. A link whose target is itself a symlink is refused.
 */
export async function resolveOneHop(link: string): Promise<string | null> {
  let info: Stats;
  try {
    info = await lstat(link);
  } catch (err) {
    if (isErrnoException(err, 'ENOENT')) return null;
    throw err;
  }
  if (!info.isSymbolicLink()) return link;

  const target = resolve(dirname(link), await readlink(link));
  let targetInfo: Stats;
  try {
    targetInfo = await lstat(target);
  } catch (err) {
    if (isErrnoException(err, 'ENOENT')) {
      throw new ShiftlogError(ExitCode.CONTEXT_ROOT_UNWRITABLE, `Symlink target does not exist: ${target}`, {
        fix: `Remove or repair the symlink at ${link}`,
        cause: err,
      });
    }
    throw err;
  }
  if (targetInfo.isSymbolicLink()) {
    getLogger('security').warn({ link, target }, 'Refused chained symlink');
    throw new ShiftlogError(ExitCode.SYMLINK_CHAIN, `Symlink chain refused: ${link} -> ${target}`, {
      fix: 'Point the link directly at a real directory',
    });
  }
  return target;
}
