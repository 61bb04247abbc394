/**
 * Atomic file write operations using write-file-atomic.
 * Ensures writes are crash-safe: temp file -> rename.
 */

import writeFileAtomic from 'write-file-atomic';
import { readFile, mkdir, copyFile, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ShiftlogError, isErrnoException } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Write data to a file atomically.
 * Creates parent directories if they don't exist.
 */
export async function atomicWrite(
  filePath: string,
  data: string,
  options?: { mode?: number; encoding?: BufferEncoding },
): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, data, {
      encoding: options?.encoding ?? 'utf8',
      mode: options?.mode,
    });
  } catch (err) {
    throw new ShiftlogError(
      ExitCode.FILE_ERROR,
      `Atomic write failed: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Read a file and return its contents.
 * Returns null if the file does not exist.
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (isErrnoException(err, 'ENOENT')) {
      return null;
    }
    throw new ShiftlogError(
      ExitCode.FILE_ERROR,
      `Failed to read: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Write JSON data atomically with consistent formatting.
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options?: { indent?: number },
): Promise<void> {
  const json = JSON.stringify(data, null, options?.indent ?? 2) + '\n';
  await atomicWrite(filePath, json);
}

/**
 * Append text to a file by rewriting it atomically.
 * Readers never observe a half-written tail.
 */
export async function atomicAppend(filePath: string, text: string): Promise<void> {
  const existing = await safeReadFile(filePath);
  await atomicWrite(filePath, (existing ?? '') + text);
}

/**
 * Size of a file in bytes, or 0 when it does not exist.
 */
export async function fileSize(filePath: string): Promise<number> {
  try {
    return (await stat(filePath)).size;
  } catch (err) {
    if (isErrnoException(err, 'ENOENT')) return 0;
    throw new ShiftlogError(
      ExitCode.FILE_ERROR,
      `Failed to stat: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Copy a file byte-for-byte and confirm the copy has the source's size.
 * Returns the number of bytes copied.
 */
export async function copyVerbatim(source: string, dest: string): Promise<number> {
  try {
    await mkdir(dirname(dest), { recursive: true });
    await copyFile(source, dest);
    const [from, to] = await Promise.all([stat(source), stat(dest)]);
    if (from.size !== to.size) {
      throw new Error(`size mismatch: ${from.size} != ${to.size}`);
    }
    return to.size;
  } catch (err) {
    throw new ShiftlogError(
      ExitCode.ARCHIVE_FAILED,
      `Verbatim copy failed: ${source} -> ${dest}`,
      { cause: err },
    );
  }
}
