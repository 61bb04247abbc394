/**
 * Configuration engine.
 *
 * Resolution priority: Environment vars > Project config > Global config > Defaults
 */

import { z } from 'zod';
import { join } from 'node:path';
import { homedir } from 'node:os';
import type { ConfigSource, ResolvedValue, ShiftlogConfig } from '../types/config.js';
import { readJson } from '../store/json.js';
import { ShiftlogError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { expandHome, getContextRootLink, getGlobalConfigPath } from './paths.js';

/** Default configuration values. */
const DEFAULTS: ShiftlogConfig = {
  version: '1.0.0',
  session: {
    staleAfterHours: 24,
    cleanupCadenceHours: 24,
    archiveRetentionDays: 30,
  },
  context: {
    maxLines: 200,
    requiredSections: [
      'IDENTITY',
      'ARCHITECTURE',
      'CURRENT_STATE',
      'DEVELOPMENT_GUIDELINES',
      'QUICK_REFERENCES',
      'CONTEXT_LIFECYCLE',
    ],
    conflictWindowMinutes: 30,
    allowedRoots: [],
  },
  transcripts: {
    root: join(homedir(), '.claude', 'projects'),
    toleranceMinutes: 10,
    maxAgeHours: 24,
    maxProjectsScan: 50,
  },
  synthesis: {
    enabled: false,
    timeoutMs: 30_000,
    minContentChars: 300,
  },
  logging: {
    level: 'info',
    filePath: 'logs/shiftlog.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

const positiveInt = z.number().int().positive();

/** Shape every merged config must have before it reaches the core. */
const ShiftlogConfigSchema: z.ZodType<ShiftlogConfig> = z.object({
  version: z.string(),
  session: z.object({
    staleAfterHours: z.number().positive(),
    cleanupCadenceHours: z.number().nonnegative(),
    archiveRetentionDays: z.number().positive(),
  }),
  context: z.object({
    maxLines: positiveInt,
    requiredSections: z.array(z.string().min(1)),
    conflictWindowMinutes: z.number().nonnegative(),
    allowedRoots: z.array(z.string().min(1)),
  }),
  transcripts: z.object({
    root: z.string().min(1),
    toleranceMinutes: z.number().nonnegative(),
    maxAgeHours: z.number().positive(),
    maxProjectsScan: positiveInt,
  }),
  synthesis: z.object({
    enabled: z.boolean(),
    timeoutMs: positiveInt,
    minContentChars: z.number().int().nonnegative(),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: positiveInt,
    maxFiles: positiveInt,
  }),
});

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  SHIFTLOG_SESSION_STALE_AFTER_HOURS: 'session.staleAfterHours',
  SHIFTLOG_SESSION_CLEANUP_CADENCE_HOURS: 'session.cleanupCadenceHours',
  SHIFTLOG_SESSION_ARCHIVE_RETENTION_DAYS: 'session.archiveRetentionDays',
  SHIFTLOG_CONTEXT_MAX_LINES: 'context.maxLines',
  SHIFTLOG_CONTEXT_CONFLICT_WINDOW_MINUTES: 'context.conflictWindowMinutes',
  SHIFTLOG_TRANSCRIPTS_ROOT: 'transcripts.root',
  SHIFTLOG_TRANSCRIPTS_TOLERANCE_MINUTES: 'transcripts.toleranceMinutes',
  SHIFTLOG_SYNTHESIS_ENABLED: 'synthesis.enabled',
  SHIFTLOG_SYNTHESIS_TIMEOUT_MS: 'synthesis.timeoutMs',
  SHIFTLOG_LOG_LEVEL: 'logging.level',
  SHIFTLOG_LOG_FILE: 'logging.filePath',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    result[key] = isRecord(sourceVal) && isRecord(targetVal)
      ? deepMerge(targetVal, sourceVal)
      : sourceVal;
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

async function readConfigLayer(filePath: string): Promise<Record<string, unknown> | null> {
  const data = await readJson(filePath);
  if (data === null) return null;
  if (!isRecord(data)) {
    throw new ShiftlogError(ExitCode.CONFIG_ERROR, `Config must be a JSON object: ${filePath}`);
  }
  return data;
}

/** Project config path for a project root. */
export function getProjectConfigPath(projectRoot: string): string {
  return join(getContextRootLink(projectRoot), 'config.json');
}

/** A deep copy of the built-in defaults. */
export function getDefaultConfig(): ShiftlogConfig {
  return structuredClone(DEFAULTS);
}

/**
 * Validate a merged config object, throwing CONFIG_ERROR with the zod issues.
 */
export function validateConfig(data: unknown): ShiftlogConfig {
  const parsed = ShiftlogConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ShiftlogError(ExitCode.CONFIG_ERROR, 'Invalid configuration', {
      fix: 'Check .shiftlog/config.json and SHIFTLOG_* environment variables',
      details: {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      },
    });
  }
  const config = parsed.data;
  config.transcripts.root = expandHome(config.transcripts.root);
  config.context.allowedRoots = config.context.allowedRoots.map(expandHome);
  return config;
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < project config < environment vars
 */
export async function loadConfig(projectRoot?: string): Promise<ShiftlogConfig> {
  let merged: Record<string, unknown> = { ...getDefaultConfig() };

  const globalConfig = await readConfigLayer(getGlobalConfigPath());
  if (globalConfig) {
    merged = deepMerge(merged, globalConfig);
  }

  if (projectRoot) {
    const projectConfig = await readConfigLayer(getProjectConfigPath(projectRoot));
    if (projectConfig) {
      merged = deepMerge(merged, projectConfig);
    }
  }

  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseEnvValue(envValue));
    }
  }

  return validateConfig(merged);
}

/**
 * Get a single config value with source tracking.
 */
export async function getConfigValue(
  path: string,
  projectRoot?: string,
): Promise<ResolvedValue<unknown>> {
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseEnvValue(envValue), source: 'env' };
    }
  }

  const layers: Array<[ConfigSource, string | null]> = [
    ['project', projectRoot ? getProjectConfigPath(projectRoot) : null],
    ['global', getGlobalConfigPath()],
  ];
  for (const [source, filePath] of layers) {
    if (!filePath) continue;
    const layer = await readConfigLayer(filePath);
    const val = layer ? getNestedValue(layer, path) : undefined;
    if (val !== undefined) {
      return { value: val, source };
    }
  }

  return { value: getNestedValue({ ...getDefaultConfig() }, path), source: 'default' };
}
