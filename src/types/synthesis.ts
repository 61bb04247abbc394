/**
 * Contract of the external synthesis collaborator.
 */

import type { MergeSignals } from './context.js';

export interface SessionCompressionRequest {
  task: 'session_compression';
  sessionId: string;
  focus: string;
  role: string;
  summary: string;
  transcript: string;
}

export interface ContextMergeRequest {
  task: 'context_merge';
  target: string;
  intent: string;
  currentContent: string;
  newContent: string;
  signals: MergeSignals;
}

export type SynthesisRequest = SessionCompressionRequest | ContextMergeRequest;

export interface SynthesisArtifact {
  type: string;
  content: string;
}

/** Validated delegate response. */
export interface SynthesisResponse {
  summary: string;
  artifacts: SynthesisArtifact[];
  compaction_performed: boolean;
}

export type SynthesisFailureKind = 'timeout' | 'error' | 'invalid';

export type SynthesisOutcome =
  | { ok: true; data: SynthesisResponse }
  | { ok: false; kind: SynthesisFailureKind; reason: string };

/**
 * Anything able to synthesize: a subprocess bridge, an HTTP client, a test fake.
 * Implementations should honour the abort signal.
 */
export interface SynthesisDelegate {
  synthesize(request: SynthesisRequest, signal: AbortSignal): Promise<unknown>;
}
