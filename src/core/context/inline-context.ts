/**
 * State vector and negative constraints offered at clock-in.
 *
 * A file that passes validation is inlined when it is smaller than
 * INLINE_LIMIT_BYTES and referenced by path otherwise. A file that fails
 * validation is reported with its errors and never inlined.
 */

import { readFile } from 'node:fs/promises';
import type { ArtifactPath, InlineContext } from '../../types/session.js';
import { isErrnoException } from '../errors.js';
import { getLogger } from '../logger.js';
import { extractSectionNames } from './conflict-detector.js';

export const INLINE_LIMIT_BYTES = 1024;

export const STATE_VECTOR_SECTIONS = ['IDENTITY', 'AUTHORITY', 'QUALITY', 'FOCUS', 'SIGNALS'] as const;

/** Returns validation errors; empty when valid. */
export type ContextValidator = (content: string) => string[];

export function validateStateVector(content: string): string[] {
  const present = new Set(extractSectionNames(content).map((name) => name.toUpperCase()));
  return STATE_VECTOR_SECTIONS
    .filter((section) => !present.has(section))
    .map((section) => `Missing section: ${section}`);
}

/**
 * Every `##` section is one anti-pattern and needs a body.
 */
export function validateContextNegatives(content: string): string[] {
  const errors: string[] = [];
  let current: string | null = null;
  let body = 0;
  const close = (): void => {
    if (current !== null && body === 0) errors.push(`Anti-pattern has no body: ${current}`);
  };
  for (const line of content.split('\n')) {
    const heading = /^##\s+(.+?)\s*$/.exec(line);
    if (heading?.[1]) {
      close();
      current = heading[1];
      body = 0;
    } else if (current !== null && line.trim().length > 0 && !line.startsWith('#')) {
      body++;
    }
  }
  close();
  if (current === null) errors.push('No anti-pattern sections');
  return errors;
}

export async function loadInlineContext(
  located: ArtifactPath,
  validate: ContextValidator,
): Promise<InlineContext | null> {
  if (!located.exists) return null;
  const log = getLogger('clock-in');
  const { path } = located;

  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (err) {
    if (isErrnoException(err, 'ENOENT')) return null;
    if (!(err instanceof Error)) throw err;
    log.warn({ path, err }, 'Context file unreadable');
    return { status: 'invalid', path, errors: [`Unreadable: ${err.message}`] };
  }

  const errors = validate(content);
  if (errors.length > 0) {
    log.warn({ path, errors }, 'Context file failed validation');
    return { status: 'invalid', path, errors };
  }
  if (Buffer.byteLength(content, 'utf8') < INLINE_LIMIT_BYTES) {
    return { status: 'inline', path, content };
  }
  log.info({ path }, 'Context file over the inline limit; returning its path');
  return { status: 'path', path };
}
