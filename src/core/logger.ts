/**
 * Process-wide pino logger.
 *
 * initLogger points the root logger at `<contextRoot>/<logging.filePath>`
 * through a pino-roll transport, which runs in a worker thread. Pointing it
 * at another root flushes the current logger and ends its transport first,
 * so at most one worker is alive. Subsystems log through getLogger; before
 * initLogger it hands out a stderr logger at warn.
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { LoggingConfig } from '../types/config.js';

type Transport = ReturnType<typeof pino.transport>;

interface RootLogger {
  logger: pino.Logger;
  transport: Transport;
  logDir: string;
}

let root: RootLogger | null = null;

const formatters = {
  level: (label: string) => ({ level: label.toUpperCase() }),
};

/**
 * Bytes in the size notation pino-roll takes ('10m', '1g', '500k').
 */
export function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

/**
 * Point the root logger at a context root. A no-op when it already writes
 * there.
 */
export function initLogger(contextRoot: string, config: LoggingConfig): pino.Logger {
  const dest = join(contextRoot, config.filePath);
  const logDir = dirname(dest);
  if (root && root.logDir === logDir) {
    return root.logger;
  }
  closeLogger();
  mkdirSync(logDir, { recursive: true });

  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      mkdir: true,
      limit: {
        count: config.maxFiles,
        removeOtherLogFiles: true,
      },
    },
  });
  const logger = pino(
    { level: config.level, formatters, timestamp: pino.stdTimeFunctions.isoTime },
    transport,
  );
  root = { logger, transport, logDir };
  return logger;
}

/**
 * Child logger bound to a subsystem ('clock-out', 'merge', 'inbox').
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!root) {
    return pino(
      { level: 'warn', formatters, timestamp: pino.stdTimeFunctions.isoTime },
      pino.destination(2),
    ).child({ subsystem });
  }
  return root.logger.child({ subsystem });
}

/**
 * Flush the root logger and end its transport worker.
 */
export function closeLogger(): void {
  if (!root) return;
  root.logger.flush();
  root.transport.end();
  root = null;
}
