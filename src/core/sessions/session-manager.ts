/**
 * Session manager: clock-in and clock-out.
 *
 * Clock-in resolves the context root, sweeps stale sessions on a cadence,
 * checks focus overlap and records the session. Clock-out archives the raw
 * transcript before anything reads it, then derives a readable transcript,
 * an optional synthesized summary and a context update.
 */

import { readFile, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { ShiftlogConfig } from '../../types/config.js';
import type { MergeResult } from '../../types/context.js';
import type {
  ClockInOptions,
  ClockInResult,
  ClockOutOptions,
  ClockOutResult,
  DegradedStage,
  SessionRecord,
  SynthesisStatus,
} from '../../types/session.js';
import type { SynthesisDelegate } from '../../types/synthesis.js';
import type { TranscriptRecord } from '../../types/transcript.js';
import { ExitCode } from '../../types/exit-codes.js';
import { loadConfig } from '../config.js';
import { resolveContextRoot } from '../context-root.js';
import { ShiftlogError, isShiftlogError } from '../errors.js';
import { getLogger, initLogger } from '../logger.js';
import { contextLayout, getTranscriptOverrideDir, type ContextLayout } from '../paths.js';
import { assertContained, sanitizeSessionId, sanitizeWorkingDir } from '../security.js';
import { atomicWrite, copyVerbatim } from '../../store/atomic.js';
import { ContextMergeEngine } from '../context/merge-engine.js';
import {
  loadInlineContext,
  validateContextNegatives,
  validateStateVector,
} from '../context/inline-context.js';
import { detectPersistenceMode, locateContextFile } from '../context/persistence-mode.js';
import { runSynthesis } from '../synthesis/delegate.js';
import { verifySessionSummary } from '../synthesis/verification.js';
import { buildSummary, formatTranscript, type TranscriptMeta } from '../transcript/format.js';
import { parseTranscript } from '../transcript/parser.js';
import {
  DEFAULT_LOCATORS,
  resolveTranscript,
  type TranscriptLocator,
} from '../transcript/resolver.js';
import { findFocusConflict } from './focus.js';
import { runCleanupIfDue } from './session-cleanup.js';
import { generateSessionId } from './session-id.js';
import type { SessionRegistry } from './session-registry.js';
import {
  listActiveSessions,
  readSessionRecord,
  sessionDir,
  writeSessionRecord,
} from './session-store.js';

export const CONTEXT_FILES = {
  projectContext: 'PROJECT-CONTEXT.md',
  checklist: 'PROJECT-CHECKLIST.md',
  roadmap: 'PROJECT-ROADMAP.md',
  stateVector: 'CURRENT-STATE.md',
  negatives: 'CONTEXT-NEGATIVES.md',
} as const;

const DEFAULT_ROLE = 'agent';

export interface SessionManagerOptions {
  registry: SessionRegistry;
  /** Fixed config; loaded per project (global < project < env) when omitted. */
  config?: ShiftlogConfig;
  delegate?: SynthesisDelegate | null;
  /** Transcript escape-hatch directory; defaults to SHIFTLOG_TRANSCRIPT_DIR. */
  transcriptOverrideDir?: string | null;
  locators?: readonly TranscriptLocator[];
  /** Start the rotating file logger under the context root. Default true. */
  initLogging?: boolean;
  now?: () => Date;
}

interface SynthesisInput {
  config: ShiftlogConfig;
  layout: ContextLayout;
  record: SessionRecord;
  summary: string;
  readable: string;
  summaryPath: string;
}

/** File-name friendly focus. */
export function focusSlug(focus: string): string {
  const slug = focus.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '').slice(0, 40);
  return slug || 'general';
}

export class SessionManager {
  private readonly registry: SessionRegistry;
  private readonly delegate: SynthesisDelegate | null;
  private readonly now: () => Date;

  constructor(private readonly options: SessionManagerOptions) {
    this.registry = options.registry;
    this.delegate = options.delegate ?? null;
    this.now = options.now ?? (() => new Date());
  }

  private async open(projectRoot: string): Promise<{ config: ShiftlogConfig; layout: ContextLayout }> {
    const config = this.options.config ?? await loadConfig(projectRoot);
    const root = await resolveContextRoot(projectRoot, config.context.allowedRoots);
    if (this.options.initLogging ?? true) {
      initLogger(root, config.logging);
    }
    return { config, layout: contextLayout(root) };
  }

  /**
   * Start a session. Fails only when no verified state can be offered:
   * invalid input, an unwritable or disallowed context root.
   */
  async clockIn(options: ClockInOptions): Promise<ClockInResult> {
    const projectRoot = sanitizeWorkingDir(options.workingDir);
    const focus = options.focus.trim();
    if (!focus) {
      throw new ShiftlogError(ExitCode.INVALID_INPUT, 'Focus cannot be empty');
    }

    const { config, layout } = await this.open(projectRoot);
    const log = getLogger('clock-in');
    const now = this.now();

    const cleanup = await runCleanupIfDue(layout, this.registry, config.session, now);

    const active = await listActiveSessions(layout);
    const conflict = findFocusConflict(active.records, focus);
    if (conflict) {
      log.warn({ focus, otherSession: conflict.sessionId }, 'Focus already held by another active session');
    }

    const mode = await detectPersistenceMode(layout.root);
    const sessionId = generateSessionId(now);

    const record: SessionRecord = {
      session_id: sessionId,
      focus,
      role: options.role?.trim() || DEFAULT_ROLE,
      created_at: now.toISOString(),
      working_dir: projectRoot,
      is_anchor_mode: mode === 'anchor',
      transcript_path: options.transcriptPath ?? null,
      registry_linked: false,
    };
    await writeSessionRecord(layout, record);

    try {
      await this.registry.register({
        session_id: sessionId,
        focus,
        created_at: record.created_at,
        working_dir: projectRoot,
        is_anchor_mode: record.is_anchor_mode,
      });
      await writeSessionRecord(layout, { ...record, registry_linked: true });
    } catch (err) {
      log.warn({ sessionId, err }, 'Session registry unavailable; continuing unlinked');
    }

    const locate = (file: string) => locateContextFile(layout.root, projectRoot, file);
    const result: ClockInResult = {
      sessionId,
      sessionDir: sessionDir(layout, sessionId),
      contextRoot: layout.root,
      mode,
      contextPaths: {
        projectContext: await locate(CONTEXT_FILES.projectContext),
        checklist: await locate(CONTEXT_FILES.checklist),
        roadmap: await locate(CONTEXT_FILES.roadmap),
      },
      stateVector: await loadInlineContext(await locate(CONTEXT_FILES.stateVector), validateStateVector),
      negativeConstraints: await loadInlineContext(
        await locate(CONTEXT_FILES.negatives),
        validateContextNegatives,
      ),
      conflict,
      cleanup,
    };
    log.info({ sessionId, focus, mode, conflict: conflict !== null }, 'Clocked in');
    return result;
  }

  /**
   * End a session. After the raw transcript is archived, later failures
   * degrade the result to `partial` instead of failing.
   */
  async clockOut(options: ClockOutOptions): Promise<ClockOutResult> {
    const sessionId = sanitizeSessionId(options.sessionId);
    const projectRoot = options.workingDir
      ? sanitizeWorkingDir(options.workingDir)
      : (await this.registry.get(sessionId))?.working_dir;
    if (!projectRoot) {
      throw new ShiftlogError(ExitCode.SESSION_NOT_FOUND, `Unknown session: ${sessionId}`, {
        fix: 'Pass the project working directory explicitly',
      });
    }

    const { config, layout } = await this.open(projectRoot);
    const log = getLogger('clock-out');
    const now = this.now();

    const record = await this.loadSessionRecord(layout, sessionId);
    if (!record) {
      throw new ShiftlogError(ExitCode.SESSION_NOT_FOUND, `No active session ${sessionId} in ${projectRoot}`);
    }

    const transcript = await resolveTranscript(
      {
        sessionId,
        projectRoot,
        createdAt: record.created_at,
        hint: record.transcript_path,
      },
      {
        root: config.transcripts.root,
        toleranceMinutes: config.transcripts.toleranceMinutes,
        maxAgeHours: config.transcripts.maxAgeHours,
        maxProjectsScan: config.transcripts.maxProjectsScan,
        overrideDir: this.options.transcriptOverrideDir !== undefined
          ? this.options.transcriptOverrideDir
          : getTranscriptOverrideDir(),
        now: this.now,
      },
      this.options.locators ?? DEFAULT_LOCATORS,
    );
    if (!transcript) {
      throw new ShiftlogError(
        ExitCode.TRANSCRIPT_UNRESOLVABLE,
        `No transcript found for session ${sessionId}`,
        { fix: 'Set SHIFTLOG_TRANSCRIPT_DIR or pass transcriptPath at clock-in' },
      );
    }

    // Raw preservation comes before any parsing.
    const day = now.toISOString().slice(0, 10);
    const dayDir = join(layout.archiveDir, day);
    const rawArchivePath = await assertContained(
      layout.archiveDir,
      join(dayDir, `${sessionId}-raw.jsonl`),
      'archive',
    );
    const bytes = await copyVerbatim(transcript.path, rawArchivePath);
    log.info({ sessionId, rawArchivePath, bytes, locator: transcript.locator }, 'Raw transcript archived');

    const degraded: DegradedStage[] = [];
    let records: TranscriptRecord[] = [];
    try {
      const parsed = parseTranscript(await readFile(rawArchivePath, 'utf8'));
      records = parsed.records;
      if (parsed.stats.malformed > 0) {
        log.warn({ sessionId, malformed: parsed.stats.malformed }, 'Transcript had malformed lines');
      }
    } catch (err) {
      log.error({ sessionId, err }, 'Transcript parse failed; raw archive kept');
      degraded.push('parse');
    }

    const meta: TranscriptMeta = {
      sessionId,
      role: record.role,
      focus: record.focus,
      createdAt: record.created_at,
      workingDir: record.working_dir,
      description: options.description,
    };
    const summary = buildSummary(records, meta);
    const baseName = `${day}-${focusSlug(record.focus)}-${sessionId}`;
    const readable = formatTranscript(records, meta, now);

    let transcriptPath: string | null = join(dayDir, `${baseName}.txt`);
    try {
      await atomicWrite(transcriptPath, readable);
    } catch (err) {
      log.error({ sessionId, err }, 'Readable transcript not written');
      degraded.push('readable');
      transcriptPath = null;
    }

    const synthesized = await this.synthesize(
      { config, layout, record, summary, readable, summaryPath: join(dayDir, `${baseName}.summary.md`) },
      degraded,
    );

    // Archive confirmed on disk before the session is torn down.
    await stat(rawArchivePath);
    await rm(sessionDir(layout, sessionId), { recursive: true, force: true });
    try {
      await this.registry.remove(sessionId);
    } catch (err) {
      log.warn({ sessionId, err }, 'Failed to remove session from registry');
      degraded.push('registry');
    }

    const result: ClockOutResult = {
      sessionId,
      status: degraded.length === 0 ? 'complete' : 'partial',
      rawArchivePath,
      transcriptPath,
      summaryPath: synthesized.summaryPath,
      summary,
      recordCount: records.length,
      synthesis: synthesized.status,
      contextUpdate: synthesized.contextUpdate,
      degraded,
    };
    log.info({ sessionId, status: result.status, synthesis: result.synthesis, degraded }, 'Clocked out');
    return result;
  }

  /**
   * The session record, rebuilt from the registry entry when session.json
   * is corrupt. The rebuilt record has the default role and no transcript
   * hint.
   */
  private async loadSessionRecord(layout: ContextLayout, sessionId: string): Promise<SessionRecord | null> {
    try {
      return await readSessionRecord(layout, sessionId);
    } catch (err) {
      if (!isShiftlogError(err, ExitCode.VALIDATION_ERROR)) throw err;
      const entry = await this.registry.get(sessionId);
      getLogger('clock-out').warn({ sessionId, err, fromRegistry: entry !== null }, 'Corrupt session file');
      if (!entry) {
        throw new ShiftlogError(
          ExitCode.SESSION_NOT_FOUND,
          `Session file for ${sessionId} is corrupt and the registry has no entry for it`,
          { fix: `Remove ${sessionDir(layout, sessionId)} and clock in again`, cause: err },
        );
      }
      return {
        session_id: entry.session_id,
        focus: entry.focus,
        role: DEFAULT_ROLE,
        created_at: entry.created_at,
        working_dir: entry.working_dir,
        is_anchor_mode: entry.is_anchor_mode,
        transcript_path: null,
        registry_linked: true,
      };
    }
  }

  private async synthesize(
    input: SynthesisInput,
    degraded: DegradedStage[],
  ): Promise<{ status: SynthesisStatus; summaryPath: string | null; contextUpdate: MergeResult | null }> {
    const { config, layout, record, summary, readable, summaryPath } = input;
    if (!this.delegate || !config.synthesis.enabled) {
      return { status: 'skipped', summaryPath: null, contextUpdate: null };
    }

    const log = getLogger('clock-out');
    const outcome = await runSynthesis(this.delegate, {
      task: 'session_compression',
      sessionId: record.session_id,
      focus: record.focus,
      role: record.role,
      summary,
      transcript: readable,
    }, config.synthesis.timeoutMs);

    const verified = outcome.ok
      ? verifySessionSummary(outcome.data, config.synthesis.minContentChars)
      : { ok: false as const, reason: `${outcome.kind}: ${outcome.reason}` };
    if (!verified.ok) {
      log.warn({ sessionId: record.session_id, reason: verified.reason }, 'Synthesis unavailable; keeping raw summary');
      degraded.push('synthesis');
      return { status: 'fallback', summaryPath: null, contextUpdate: null };
    }

    try {
      await atomicWrite(summaryPath, `${verified.content}\n`);
    } catch (err) {
      log.error({ sessionId: record.session_id, err }, 'Session summary not written');
      degraded.push('synthesis');
      return { status: 'fallback', summaryPath: null, contextUpdate: null };
    }

    let contextUpdate: MergeResult | null = null;
    try {
      const engine = new ContextMergeEngine({
        contextRoot: layout.root,
        config,
        delegate: this.delegate,
        now: this.now,
      });
      contextUpdate = await engine.update({
        target: 'PROJECT-CONTEXT',
        content: `## SESSION ${record.session_id} (${record.focus})\n\n${verified.content}`,
        intent: `Session summary: ${record.focus}`,
        sessionId: record.session_id,
        operation: 'append',
      });
    } catch (err) {
      log.error({ sessionId: record.session_id, err }, 'Context update from session summary failed');
      degraded.push('context_update');
    }
    return { status: 'applied', summaryPath, contextUpdate };
  }
}
