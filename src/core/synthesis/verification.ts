/**
 * Gates applied to delegate output before it is trusted.
 */

import type { SynthesisArtifact, SynthesisResponse } from '../../types/synthesis.js';

export type GateResult =
  | { ok: true; content: string }
  | { ok: false; reason: string };

function pickArtifact(
  response: SynthesisResponse,
  type: string,
  fallbackToFirst: boolean,
): SynthesisArtifact | undefined {
  return response.artifacts.find((a) => a.type === type)
    ?? (fallbackToFirst ? response.artifacts[0] : undefined);
}

/**
 * Clock-out gate: a `session_summary` (or first) artifact of at least
 * `minChars`, and no compaction claim.
 */
export function verifySessionSummary(response: SynthesisResponse, minChars: number): GateResult {
  if (response.compaction_performed) {
    return { ok: false, reason: 'session compression must not claim compaction' };
  }
  const artifact = pickArtifact(response, 'session_summary', true);
  if (!artifact) {
    return { ok: false, reason: 'no artifacts returned' };
  }
  const content = artifact.content.trim();
  if (content.length < minChars) {
    return { ok: false, reason: `summary too short (${content.length} < ${minChars} chars), likely truncated` };
  }
  return { ok: true, content };
}

/**
 * Merge gate: a `context_update` artifact of at least `minChars`.
 */
export function selectContextUpdate(response: SynthesisResponse, minChars: number): GateResult {
  const artifact = pickArtifact(response, 'context_update', false);
  if (!artifact) {
    return { ok: false, reason: 'no context_update artifact' };
  }
  if (artifact.content.trim().length < minChars) {
    return {
      ok: false,
      reason: `context_update too short (${artifact.content.trim().length} < ${minChars} chars), likely truncated`,
    };
  }
  return { ok: true, content: artifact.content };
}

/** The history artifact a compaction claim must come with. */
export function historyArchive(response: SynthesisResponse): string | null {
  const artifact = pickArtifact(response, 'history_archive', false);
  return artifact && artifact.content.trim().length > 0 ? artifact.content : null;
}
