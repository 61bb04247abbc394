/**
 * Focus-conflict check at clock-in. Advisory only.
 */

import type { FocusConflict, SessionRecord } from '../../types/session.js';

export function normalizeFocus(focus: string): string {
  return focus.trim().toLowerCase();
}

/**
 * First active session (oldest first) holding the same focus, or null.
 */
export function findFocusConflict(
  active: SessionRecord[],
  focus: string,
  excludeSessionId?: string,
): FocusConflict | null {
  const wanted = normalizeFocus(focus);
  const match = [...active]
    .sort((a, b) => a.created_at.localeCompare(b.created_at))
    .find((s) => s.session_id !== excludeSessionId && normalizeFocus(s.focus) === wanted);
  if (!match) return null;
  return {
    sessionId: match.session_id,
    focus: match.focus,
    createdAt: match.created_at,
    workingDir: match.working_dir,
  };
}
