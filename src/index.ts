/**
 * shiftlog - session clock-in/clock-out and shared context synchronization
 * for agents working on one project.
 */

// Types
export * from './types/index.js';

// Core
export { ShiftlogError, isShiftlogError } from './core/errors.js';
export { loadConfig, getConfigValue, getDefaultConfig, validateConfig } from './core/config.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';
export { contextLayout, getShiftlogHome, getGlobalRegistryPath } from './core/paths.js';
export type { ContextLayout } from './core/paths.js';
export { resolveContextRoot } from './core/context-root.js';
export { assertSafeTarget, sanitizeSessionId, sanitizeTarget, sanitizeWorkingDir, resolveOneHop } from './core/security.js';

// Sessions
export { SessionManager, focusSlug } from './core/sessions/session-manager.js';
export type { SessionManagerOptions } from './core/sessions/session-manager.js';
export { SessionRegistry } from './core/sessions/session-registry.js';
export { generateSessionId, isValidSessionId } from './core/sessions/session-id.js';
export { reapStaleSessions, trimArchives, runCleanupIfDue } from './core/sessions/session-cleanup.js';

// Transcripts
export {
  resolveTranscript,
  DEFAULT_LOCATORS,
  hintLocator,
  temporalLocator,
  metadataLocator,
  overrideLocator,
  legacyLocator,
} from './core/transcript/resolver.js';
export type { TranscriptLocator, ResolverOptions, TranscriptQuery } from './core/transcript/resolver.js';
export { parseTranscript, MAX_TOOL_OUTPUT_CHARS } from './core/transcript/parser.js';
export { formatTranscript, buildSummary } from './core/transcript/format.js';
export { redactParams, redactString } from './core/transcript/redact.js';

// Context
export { ContextMergeEngine } from './core/context/merge-engine.js';
export type { MergeEngineOptions } from './core/context/merge-engine.js';
export { AuditInbox } from './core/context/inbox.js';
export { detectConflicts } from './core/context/conflict-detector.js';
export { planCompaction, CompactionGate } from './core/context/compaction.js';
export { detectPersistenceMode, locateContextFile, GuardedWriter } from './core/context/persistence-mode.js';
export { loadInlineContext, validateStateVector, validateContextNegatives } from './core/context/inline-context.js';
export { readChangelog } from './core/context/changelog.js';
export { readEventsSince } from './core/context/event-log.js';

// Synthesis
export { runSynthesis, parseSynthesisResponse } from './core/synthesis/delegate.js';
