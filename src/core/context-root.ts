/**
 * Resolution of a project's context root (<project>/.shiftlog).
 *
 * The root may be a symlink, followed exactly once. Its target must lie
 * inside the project, the global home, or a configured allowed root.
 */

import { access, mkdir, realpath, stat } from 'node:fs/promises';
import { constants } from 'node:fs';
import { ShiftlogError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { getLogger } from './logger.js';
import { contextLayout, getContextRootLink, getShiftlogHome } from './paths.js';
import { isContained, realpathOrNearest, resolveOneHop } from './security.js';

function unwritable(message: string, cause?: unknown): ShiftlogError {
  return new ShiftlogError(ExitCode.CONTEXT_ROOT_UNWRITABLE, message, {
    fix: 'Check permissions on the project directory and its .shiftlog entry',
    cause,
  });
}

/**
 * Resolve, create and check the context root. Returns its real path.
 */
export async function resolveContextRoot(projectRoot: string, allowedRoots: string[] = []): Promise<string> {
  const projectInfo = await stat(projectRoot).catch(() => null);
  if (!projectInfo?.isDirectory()) {
    throw unwritable(`Project root is not a directory: ${projectRoot}`);
  }

  const link = getContextRootLink(projectRoot);
  const target = (await resolveOneHop(link)) ?? link;

  if (target !== link) {
    const real = await realpathOrNearest(target);
    const roots = await Promise.all(
      [projectRoot, getShiftlogHome(), ...allowedRoots].map((r) => realpathOrNearest(r)),
    );
    if (!roots.some((root) => isContained(root, real))) {
      getLogger('context-root').warn({ link, target: real }, 'Context root symlink points outside allowed roots');
      throw new ShiftlogError(
        ExitCode.PATH_TRAVERSAL,
        `Context root ${link} points outside the allowed roots: ${real}`,
        { fix: 'Add the target to context.allowedRoots in the global config' },
      );
    }
  }

  const layout = contextLayout(target);
  try {
    await mkdir(layout.activeDir, { recursive: true });
    await mkdir(layout.archiveDir, { recursive: true });
    await mkdir(layout.contextDir, { recursive: true });
    await access(target, constants.W_OK);
  } catch (err) {
    throw unwritable(`Context root is not writable: ${target}`, err);
  }
  return realpath(target);
}
