/**
 * Session ID generation and validation.
 *
 * Format: ses_{YYYYMMDDHHmmss}_{6hex}
 *   - Human-readable, sortable by timestamp
 *   - 3 random bytes keep ids from one second apart
 */

import { randomBytes } from 'node:crypto';

/** Pattern for ses_{14digits}_{6hex} */
const SESSION_ID_RE = /^ses_\d{14}_[0-9a-f]{6}$/;

/**
 * Generate a session ID.
 *
 * Example: ses_20260227171900_a1b2c3
 */
export function generateSessionId(now: Date = new Date()): string {
  const ts = now.toISOString()
    .replace(/[-:T]/g, '')
    .substring(0, 14); // YYYYMMDDHHmmss
  const hex = randomBytes(3).toString('hex');
  return `ses_${ts}_${hex}`;
}

/**
 * Check if a string is a valid session ID.
 */
export function isValidSessionId(id: string): boolean {
  return SESSION_ID_RE.test(id);
}

/**
 * Extract the creation timestamp embedded in a session ID.
 * Returns null if the ID is not valid.
 */
export function extractSessionTimestamp(id: string): Date | null {
  if (!SESSION_ID_RE.test(id)) return null;
  const ts = id.substring(4, 18);
  const d = new Date(
    `${ts.substring(0, 4)}-${ts.substring(4, 6)}-${ts.substring(6, 8)}` +
    `T${ts.substring(8, 10)}:${ts.substring(10, 12)}:${ts.substring(12, 14)}Z`,
  );
  return isNaN(d.getTime()) ? null : d;
}
