/**
 * Redaction of credentials in tool parameters before they are persisted.
 */

export const REDACTED = '[REDACTED]';

/** Parameter names whose values are always dropped. */
const SENSITIVE_KEY_RE =
  /api[_-]?key|access[_-]?key|private[_-]?key|^key$|token|secret|passw(?:or)?d|^auth|authorization|credential|cookie/i;

/** Credentials embedded in otherwise harmless strings (shell commands, headers). */
const VALUE_PATTERNS: Array<[RegExp, string]> = [
  [/\bBearer\s+[A-Za-z0-9._~+/-]+=*/g, `Bearer ${REDACTED}`],
  [/\bsk-[A-Za-z0-9_-]{8,}/g, REDACTED],
  [/\b([A-Z][A-Z0-9_]*(?:KEY|TOKEN|SECRET|PASSWORD))=("[^"]*"|'[^']*'|\S+)/g, `$1=${REDACTED}`],
];

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_RE.test(key);
}

/**
 * Replace credential-looking substrings in a string.
 */
export function redactString(value: string): string {
  let out = value;
  for (const [pattern, replacement] of VALUE_PATTERNS) {
    out = out.replace(pattern, replacement);
  }
  return out;
}

/**
 * Redact a value recursively. Objects and arrays are copied, never mutated.
 */
export function redactValue(value: unknown): unknown {
  if (typeof value === 'string') return redactString(value);
  if (Array.isArray(value)) return value.map(redactValue);
  if (value !== null && typeof value === 'object') {
    return redactParams(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

/**
 * Redact a tool invocation's parameter object.
 */
export function redactParams(params: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    out[key] = isSensitiveKey(key) ? REDACTED : redactValue(value);
  }
  return out;
}
