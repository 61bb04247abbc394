/**
 * Calls to the external synthesis collaborator, bounded by a timeout and
 * turned into a tagged outcome. Never throws.
 */

import { z } from 'zod';
import type {
  SynthesisDelegate,
  SynthesisOutcome,
  SynthesisRequest,
  SynthesisResponse,
} from '../../types/synthesis.js';
import { getLogger } from '../logger.js';

const SynthesisResponseSchema: z.ZodType<SynthesisResponse> = z.object({
  summary: z.string(),
  artifacts: z.array(z.object({
    type: z.string(),
    content: z.string(),
  })),
  compaction_performed: z.boolean(),
});

class DelegateTimeout extends Error {
  constructor(ms: number) {
    super(`Delegate did not answer within ${ms}ms`);
    this.name = 'DelegateTimeout';
  }
}

/**
 * Validate a raw delegate answer.
 */
export function parseSynthesisResponse(raw: unknown): SynthesisOutcome {
  const parsed = SynthesisResponseSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      kind: 'invalid',
      reason: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
    };
  }
  return { ok: true, data: parsed.data };
}

/**
 * Run one synthesis request. The delegate's signal is aborted on timeout.
 */
export async function runSynthesis(
  delegate: SynthesisDelegate,
  request: SynthesisRequest,
  timeoutMs: number,
): Promise<SynthesisOutcome> {
  const log = getLogger('synthesis');
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new DelegateTimeout(timeoutMs);
      reject(err);
      controller.abort(err);
    }, timeoutMs);
  });

  try {
    const raw = await Promise.race([delegate.synthesize(request, controller.signal), timeout]);
    const outcome = parseSynthesisResponse(raw);
    if (!outcome.ok) {
      log.warn({ task: request.task, reason: outcome.reason }, 'Delegate returned an invalid response');
    }
    return outcome;
  } catch (err) {
    // A delegate that rejects on abort may settle before the timer's rejection is seen.
    if (err instanceof DelegateTimeout || controller.signal.aborted) {
      log.warn({ task: request.task, timeoutMs }, 'Delegate timed out');
      return { ok: false, kind: 'timeout', reason: `Delegate did not answer within ${timeoutMs}ms` };
    }
    const reason = err instanceof Error ? err.message : String(err);
    log.warn({ task: request.task, err }, 'Delegate failed');
    return { ok: false, kind: 'error', reason };
  } finally {
    clearTimeout(timer);
  }
}
