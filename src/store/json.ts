/**
 * JSON reads with schema validation.
 * This is the data access layer for shiftlog's JSON records.
 */

import type { ZodTypeAny, output } from 'zod';
import { safeReadFile } from './atomic.js';
import { ShiftlogError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (err) {
    throw new ShiftlogError(
      ExitCode.VALIDATION_ERROR,
      `Invalid JSON in: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Read a JSON file and validate it against a zod schema.
 * Returns null if the file does not exist; throws on invalid JSON or shape.
 */
export async function readJsonAs<S extends ZodTypeAny>(
  filePath: string,
  schema: S,
): Promise<output<S> | null> {
  const data = await readJson(filePath);
  if (data === null) return null;

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ShiftlogError(
      ExitCode.VALIDATION_ERROR,
      `Unexpected structure in: ${filePath}`,
      { details: { issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) } },
    );
  }
  const result: output<S> = parsed.data;
  return result;
}
