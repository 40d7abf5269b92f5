// src/app/lang.ts
import { logInfo, logWarn } from '../core/logger';
import type { RequestContext } from './types';

/** Context keys consulted in this order: speech stage, request, transformers. */
export const LANG_KEYS = ['stt_lang', 'request_lang', 'detected_lang'] as const;

export function validLangs(defaultLang: string, secondary: readonly string[]): Set<string> {
  return new Set([defaultLang, ...secondary].map((l) => l.toLowerCase()));
}

export function resolveLang(
  context: RequestContext,
  valid: ReadonlySet<string>,
  defaultLang: string
): string {
  for (const key of LANG_KEYS) {
    if (!(key in context)) continue;
    const v = context[key];
    const l = typeof v === 'string' ? v.toLowerCase() : '';
    if (l && valid.has(l)) {
      if (l !== defaultLang.toLowerCase()) logInfo('lang.replaced', { key, lang: l, defaultLang });
      return l;
    }
    logWarn('lang.ignored', { key, value: v, valid: [...valid] });
  }
  return defaultLang.toLowerCase();
}
