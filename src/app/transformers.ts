// src/app/transformers.ts
import { describeError } from '../core/errors';
import { logDebug, logWarn } from '../core/logger';
import type { RequestContext, Utterances } from './types';

export type TransformResult = {
  utterances?: Utterances;
  context?: RequestContext;
};

/**
 * Rewrites transcripts and/or tags the request context (e.g. a detected
 * language). Returned context keys are merged into the live context.
 */
export interface UtteranceTransformer {
  readonly name: string;
  transform(
    utterances: Utterances,
    context: RequestContext
  ): TransformResult | Promise<TransformResult>;
}

/**
 * Runs the chain in order. A transformer that throws, or returns an empty
 * transcript list, is skipped and the previous data carries on.
 */
export async function runTransformers(
  chain: readonly UtteranceTransformer[],
  utterances: Utterances,
  context: RequestContext
): Promise<Utterances> {
  let current = utterances;
  for (const t of chain) {
    try {
      const out = await t.transform([...current], { ...context });
      if (out.utterances && out.utterances.length > 0) {
        if (JSON.stringify(out.utterances) !== JSON.stringify(current)) {
          logDebug('transform.utterances', { transformer: t.name, from: current, to: out.utterances });
        }
        current = out.utterances;
      }
      if (out.context) Object.assign(context, out.context);
    } catch (e) {
      logWarn('transform.failed', { transformer: t.name, ...describeError(e) });
    }
  }
  return current;
}
