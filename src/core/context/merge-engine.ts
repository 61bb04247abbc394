/**
 * Context merge engine: the single write path into the context store.
 *
 *   RECEIVED -> STAGED -> CONFLICT_CHECKED -> MERGED | EVENT_EMITTED
 *            -> COMPACTED? -> ARCHIVED
 *
 * Any failure after staging leaves the audit entry pending (REJECTED).
 */

import { stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { join, normalize } from 'node:path';
import type { ShiftlogConfig } from '../../types/config.js';
import type {
  ConflictReport,
  DelegateReport,
  MergeResult,
  UpdateRequest,
} from '../../types/context.js';
import type { SynthesisDelegate } from '../../types/synthesis.js';
import { ExitCode } from '../../types/exit-codes.js';
import { ShiftlogError, isErrnoException, isShiftlogError } from '../errors.js';
import { getLogger } from '../logger.js';
import { contextLayout, type ContextLayout } from '../paths.js';
import { assertContained, assertSafeTarget, sanitizeTarget } from '../security.js';
import { safeReadFile } from '../../store/atomic.js';
import { withLock } from '../../store/lock.js';
import { runSynthesis } from '../synthesis/delegate.js';
import { historyArchive, selectContextUpdate } from '../synthesis/verification.js';
import { AuditInbox } from './inbox.js';
import { NO_SESSION, changelogToRecent, prependChangelogEntry, readChangelog } from './changelog.js';
import { detectConflicts, extractSectionNames } from './conflict-detector.js';
import { CompactionGate, countLines } from './compaction.js';
import { emitContextEvent, eventsToRecent, readEventsSince } from './event-log.js';
import { GuardedWriter, detectPersistenceMode } from './persistence-mode.js';

/** Artifacts the engine maintains itself. */
const RESERVED_TARGETS = new Set(['PROJECT-HISTORY', 'PROJECT-CHANGELOG']);

export interface MergeEngineOptions {
  contextRoot: string;
  config: ShiftlogConfig;
  delegate?: SynthesisDelegate | null;
  now?: () => Date;
}

interface MergeOutcome {
  content: string;
  merge: 'direct' | 'delegated';
  delegate: DelegateReport | null;
}

export class ContextMergeEngine {
  private readonly layout: ContextLayout;
  private readonly config: ShiftlogConfig;
  private readonly delegate: SynthesisDelegate | null;
  private readonly now: () => Date;
  private readonly inbox: AuditInbox;
  private readonly writer: GuardedWriter;
  private readonly gate: CompactionGate;

  constructor(options: MergeEngineOptions) {
    this.layout = contextLayout(options.contextRoot);
    this.config = options.config;
    this.delegate = options.delegate ?? null;
    this.now = options.now ?? (() => new Date());
    this.inbox = new AuditInbox(options.contextRoot, this.now);
    this.writer = new GuardedWriter(options.contextRoot);
    this.gate = new CompactionGate(this.layout.historyFile, this.writer);
  }

  get auditInbox(): AuditInbox {
    return this.inbox;
  }

  /**
   * Apply one update. The target passes the traversal check before anything
   * touches the filesystem; the audit entry is staged before it is validated
   * further, so a rejected request still leaves a pending record.
   */
  async update(request: UpdateRequest): Promise<MergeResult> {
    const log = getLogger('merge');
    assertSafeTarget(request.target);

    const entry = await this.inbox.submit({
      target: stagedTarget(request.target),
      content: request.content,
      intent: request.intent,
      sessionId: request.sessionId ?? null,
    });

    try {
      const relative = sanitizeTarget(request.target);
      const target = relative.replace(/\.md$/, '');
      if (RESERVED_TARGETS.has(target)) {
        throw new ShiftlogError(ExitCode.INVALID_INPUT, `${target} is maintained by the engine and cannot be updated directly`);
      }
      const mode = await detectPersistenceMode(this.layout.root);
      const result = mode === 'anchor'
        ? await this.emitEvent(request, target, relative, entry.id)
        : await this.mergeDirect(request, target, relative, entry.id);
      await this.inbox.markProcessed(entry.id);
      log.info(
        { auditId: entry.id, target, mode, status: result.status, conflict: result.conflict.hasConflict },
        'Context update applied',
      );
      return result;
    } catch (err) {
      log.error({ auditId: entry.id, target: entry.target, err }, 'Context update rejected; audit entry left pending');
      throw err;
    }
  }

  private conflictWindowStart(): Date {
    return new Date(this.now().getTime() - this.config.context.conflictWindowMinutes * 60_000);
  }

  private reportConflict(report: ConflictReport, request: UpdateRequest, target: string): boolean {
    const acknowledged = request.acknowledgeConflicts ?? false;
    if (report.hasConflict && !acknowledged) {
      getLogger('merge').warn(
        { target, sessions: report.conflicts.map((c) => c.sessionId), sections: report.overlappingSections },
        'Concurrent update detected',
      );
    }
    return acknowledged;
  }

  private async emitEvent(
    request: UpdateRequest,
    target: string,
    relative: string,
    auditId: string,
  ): Promise<MergeResult> {
    const now = this.now();
    const recent = eventsToRecent(await readEventsSince(this.layout.eventsDir, this.conflictWindowStart()));
    const conflict = detectConflicts({
      recent,
      target,
      sessionId: request.sessionId ?? null,
      newContent: request.content,
      windowMinutes: this.config.context.conflictWindowMinutes,
      now,
    });
    const acknowledged = this.reportConflict(conflict, request, target);

    const { path } = await emitContextEvent(this.layout.eventsDir, {
      sessionId: request.sessionId ?? null,
      target,
      intent: request.intent,
      content: request.content,
      inboxId: auditId,
    }, now);

    return {
      status: 'event_emitted',
      mode: 'anchor',
      auditId,
      target,
      targetPath: join(this.layout.snapshotsDir, relative),
      conflict,
      acknowledged,
      merge: null,
      delegate: null,
      compaction: { performed: false, sectionsArchived: [], historyPath: this.gate.path },
      lineCount: countLines(request.content),
      eventPath: path,
    };
  }

  private async mergeDirect(
    request: UpdateRequest,
    target: string,
    relative: string,
    auditId: string,
  ): Promise<MergeResult> {
    const targetPath = await assertContained(
      this.layout.contextDir,
      join(this.layout.contextDir, relative),
      'target',
    );
    await assertRegularFileOrAbsent(targetPath, target);

    return withLock(targetPath, async () => {
      const now = this.now();
      const current = (await safeReadFile(targetPath)) ?? `# ${target}\n`;
      const recent = changelogToRecent(await readChangelog(this.layout.changelogFile));
      const conflict = detectConflicts({
        recent,
        target,
        sessionId: request.sessionId ?? null,
        newContent: request.content,
        windowMinutes: this.config.context.conflictWindowMinutes,
        now,
      });
      const acknowledged = this.reportConflict(conflict, request, target);

      const merged: MergeOutcome = request.delegated
        ? await this.delegatedMerge(request, target, current, conflict, now)
        : { content: await this.directMerge(request, target, current, now), merge: 'direct', delegate: null };

      const plan = await this.gate.apply(merged.content, target, {
        maxLines: this.config.context.maxLines,
        requiredSections: this.config.context.requiredSections,
      }, now);
      await this.writer.write(targetPath, plan.kept);

      await withLock(this.layout.changelogFile, () =>
        prependChangelogEntry(this.layout.changelogFile, {
          timestamp: now.toISOString(),
          target,
          sessionId: request.sessionId ?? NO_SESSION,
          intent: request.intent,
          description: describeChange(request, merged, plan.linesAfter, plan.sectionsArchived),
          sections: extractSectionNames(request.content),
        }),
      );

      return {
        status: 'merged',
        mode: 'legacy',
        auditId,
        target,
        targetPath,
        conflict,
        acknowledged,
        merge: merged.merge,
        delegate: merged.delegate,
        compaction: {
          performed: plan.needed,
          sectionsArchived: plan.sectionsArchived,
          historyPath: this.gate.path,
        },
        lineCount: plan.linesAfter,
      };
    });
  }

  private async directMerge(
    request: UpdateRequest,
    target: string,
    current: string,
    now: Date,
  ): Promise<string> {
    const incoming = request.content.trim();
    if ((request.operation ?? 'append') === 'replace') {
      if (current.trim().length > 0) {
        await this.gate.archive(current.trimEnd(), `${target} (replaced)`, now);
      }
      return `${incoming}\n`;
    }
    return `${current.trimEnd()}\n\n${incoming}\n`;
  }

  /**
   * Falls back to a direct merge when the delegate is missing, fails, or
   * fails a gate. The reason is carried on the result.
   */
  private async delegatedMerge(
    request: UpdateRequest,
    target: string,
    current: string,
    conflict: ConflictReport,
    now: Date,
  ): Promise<MergeOutcome> {
    const log = getLogger('merge');
    const fallback = async (report: DelegateReport): Promise<MergeOutcome> => ({
      content: await this.directMerge(request, target, current, now),
      merge: 'direct',
      delegate: report,
    });

    if (!this.delegate) {
      return fallback({ status: 'fallback', reason: 'no synthesis delegate configured' });
    }

    const historyBefore = await this.gate.sizeOf();
    const outcome = await runSynthesis(this.delegate, {
      task: 'context_merge',
      target,
      intent: request.intent,
      currentContent: current,
      newContent: request.content,
      signals: { ...request.signals, priorConflicts: conflict.conflicts.length },
    }, this.config.synthesis.timeoutMs);

    if (!outcome.ok) {
      return fallback({ status: 'fallback', reason: `${outcome.kind}: ${outcome.reason}` });
    }

    const update = selectContextUpdate(outcome.data, this.config.synthesis.minContentChars);
    if (!update.ok) {
      log.warn({ target, reason: update.reason }, 'Delegate output failed the merge gate');
      return fallback({ status: 'fallback', reason: update.reason });
    }

    if (outcome.data.compaction_performed) {
      const archived = historyArchive(outcome.data);
      if (archived !== null) {
        await this.gate.archive(archived, `${target} (delegated compaction)`, now);
      }
      try {
        await this.gate.verifyGrowth(historyBefore);
      } catch (err) {
        if (!isShiftlogError(err, ExitCode.COMPACTION_UNVERIFIED)) throw err;
        log.error({ target, err }, 'Delegate claimed compaction without a history write; using direct merge');
        return fallback({ status: 'rejected', reason: 'compaction claimed but history artifact did not grow' });
      }
    }

    return { content: update.content, merge: 'delegated', delegate: { status: 'accepted' } };
  }
}

/**
 * A target that exists as anything but a regular file cannot be merged into.
 */
async function assertRegularFileOrAbsent(targetPath: string, target: string): Promise<void> {
  let info: Stats;
  try {
    info = await stat(targetPath);
  } catch (err) {
    if (isErrnoException(err, 'ENOENT')) return;
    throw err;
  }
  if (!info.isFile()) {
    throw new ShiftlogError(ExitCode.TARGET_UNRESOLVABLE, `Target ${target} is not a regular file: ${targetPath}`, {
      fix: `Move the entry at ${targetPath} out of the context directory`,
      details: { target, targetPath },
    });
  }
}

/** Target name as recorded in the audit entry, before validation. */
function stagedTarget(raw: string): string {
  const trimmed = raw.trim();
  return trimmed.length === 0 ? '' : normalize(trimmed).replace(/\.md$/, '');
}

function describeChange(
  request: UpdateRequest,
  merged: MergeOutcome,
  lines: number,
  archivedSections: string[],
): string {
  const verb = merged.merge === 'delegated'
    ? 'Delegated merge'
    : (request.operation ?? 'append') === 'replace' ? 'Replaced content' : 'Appended content';
  const archived = archivedSections.length > 0
    ? `; archived ${archivedSections.join(', ')} to history`
    : '';
  return `${verb} (${lines} lines)${archived}`;
}
