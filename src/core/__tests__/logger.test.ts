import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { bytesToSizeString, closeLogger, getLogger, initLogger } from '../logger.js';
import type { LoggingConfig } from '../../types/config.js';

interface FakeTransport {
  file: string;
  ended: boolean;
  write: () => boolean;
  end: () => void;
}

const transports = vi.hoisted(() => {
  const opened: FakeTransport[] = [];
  return opened;
});

// Stand-in transports: record what was opened and ended, write nowhere.
vi.mock('pino', async (importOriginal) => {
  const actual = await importOriginal<{ default: typeof import('pino') }>();
  const real = actual.default;
  const transport = (options: { options?: { file?: string } }): FakeTransport => {
    const stream: FakeTransport = {
      file: options.options?.file ?? '',
      ended: false,
      write: () => true,
      end() {
        stream.ended = true;
      },
    };
    transports.push(stream);
    return stream;
  };
  const wrapped = Object.assign((...args: Parameters<typeof real>) => real(...args), real, { transport });
  return { ...actual, default: wrapped };
});

const config: LoggingConfig = { level: 'info', filePath: 'logs/shiftlog.log', maxFileSize: 1024 * 1024, maxFiles: 3 };

describe('logger', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'shiftlog-logger-'));
    transports.length = 0;
  });

  afterEach(async () => {
    closeLogger();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('formats rotation sizes for pino-roll', () => {
    expect(bytesToSizeString(512)).toBe('512');
    expect(bytesToSizeString(2048)).toBe('2k');
    expect(bytesToSizeString(10 * 1024 * 1024)).toBe('10m');
    expect(bytesToSizeString(3 * 1024 * 1024 * 1024 + 5)).toBe('3g');
  });

  it('hands out a warn-level stderr logger before initialization', () => {
    const log = getLogger('merge');
    expect(log.level).toBe('warn');
    expect(log.bindings()).toEqual({ subsystem: 'merge' });
  });

  it('reuses the transport for the same root', async () => {
    const rootA = join(tempDir, 'a');
    const first = initLogger(rootA, config);
    expect(initLogger(rootA, config)).toBe(first);
    expect(transports).toHaveLength(1);
    expect((await stat(join(rootA, 'logs'))).isDirectory()).toBe(true);
    expect(getLogger('merge').level).toBe('info');
  });

  it('ends the previous transport when switching roots', () => {
    initLogger(join(tempDir, 'a'), config);
    initLogger(join(tempDir, 'b'), config);

    expect(transports.map((t) => [t.file, t.ended])).toEqual([
      [join(tempDir, 'a', 'logs', 'shiftlog.log'), true],
      [join(tempDir, 'b', 'logs', 'shiftlog.log'), false],
    ]);
  });

  it('ends the transport on close and falls back to stderr', () => {
    initLogger(join(tempDir, 'a'), config);
    closeLogger();

    expect(transports[0]?.ended).toBe(true);
    expect(getLogger('merge').level).toBe('warn');
  });
});
