/**
 * Path resolution for shiftlog.
 *
 * Environment variables:
 *   SHIFTLOG_HOME            - Global directory (default: ~/.shiftlog)
 *   SHIFTLOG_DIR             - Per-project context root name (default: .shiftlog)
 *   SHIFTLOG_TRANSCRIPT_DIR  - Escape-hatch transcript directory
 */

import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the global shiftlog home directory.
 * Respects SHIFTLOG_HOME env var, defaults to ~/.shiftlog.
 */
export function getShiftlogHome(): string {
  return process.env['SHIFTLOG_HOME'] ?? join(homedir(), '.shiftlog');
}

/**
 * Name of the per-project context root directory.
 */
export function getContextRootName(): string {
  return process.env['SHIFTLOG_DIR'] ?? '.shiftlog';
}

/**
 * Unresolved context root for a project (may be a symlink).
 */
export function getContextRootLink(projectRoot: string): string {
  return join(projectRoot, getContextRootName());
}

/**
 * Get the global config file path.
 */
export function getGlobalConfigPath(): string {
  return join(getShiftlogHome(), 'config.json');
}

/**
 * Get the cross-project session registry path.
 */
export function getGlobalRegistryPath(): string {
  return join(getShiftlogHome(), 'sessions.registry.json');
}

/**
 * Transcript override directory, or null when unset.
 */
export function getTranscriptOverrideDir(): string | null {
  const dir = process.env['SHIFTLOG_TRANSCRIPT_DIR'];
  return dir ? expandHome(dir) : null;
}

/**
 * Expand a leading tilde to the user's home directory.
 */
export function expandHome(p: string): string {
  if (p === '~') return homedir();
  if (p.startsWith('~/')) return resolve(homedir(), p.slice(2));
  return p;
}

/** Fixed layout below a resolved context root. */
export interface ContextLayout {
  root: string;
  configFile: string;
  lastCleanupFile: string;
  logsDir: string;
  sessionsDir: string;
  activeDir: string;
  archiveDir: string;
  contextDir: string;
  snapshotsDir: string;
  eventsDir: string;
  inboxDir: string;
  pendingDir: string;
  processedDir: string;
  processedIndex: string;
  historyFile: string;
  changelogFile: string;
}

/**
 * Build the directory layout for a resolved context root.
 */
export function contextLayout(root: string): ContextLayout {
  const sessionsDir = join(root, 'sessions');
  const contextDir = join(root, 'context');
  const inboxDir = join(root, 'inbox');
  const processedDir = join(inboxDir, 'processed');
  return {
    root,
    configFile: join(root, 'config.json'),
    lastCleanupFile: join(root, 'last-cleanup'),
    logsDir: join(root, 'logs'),
    sessionsDir,
    activeDir: join(sessionsDir, 'active'),
    archiveDir: join(sessionsDir, 'archive'),
    contextDir,
    snapshotsDir: join(root, 'snapshots'),
    eventsDir: join(root, 'events'),
    inboxDir,
    pendingDir: join(inboxDir, 'pending'),
    processedDir,
    processedIndex: join(processedDir, 'index.json'),
    historyFile: join(contextDir, 'PROJECT-HISTORY.md'),
    changelogFile: join(contextDir, 'PROJECT-CHANGELOG.md'),
  };
}
