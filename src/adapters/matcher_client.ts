// src/adapters/matcher_client.ts
// Remote keyword / statistical / question-answering engines over HTTP.
// Each engine answers POST {base}/{engine} with {utterances, lang}.

import fetch, { Response } from 'node-fetch';
import { z } from 'zod';
import { MatcherError } from '../core/errors';
import { logDebug } from '../core/logger';
import type { Match, Matcher, Utterances } from '../app/types';
import type { StatisticalEngine, StatisticalIntent } from '../handlers/statistical_matcher';

export type MatcherClientOptions = {
  baseUrl: string;
  token?: string;
  timeoutMs: number;
};

const DataSchema = z.record(z.unknown()).default({});

const KeywordReplySchema = z.object({
  match: z
    .object({ intent: z.string().min(1), skill_id: z.string().nullish(), data: DataSchema })
    .nullable(),
});

const StatisticalReplySchema = z.object({
  intent: z
    .object({
      name: z.string().min(1),
      skill_id: z.string().nullish(),
      conf: z.number().min(0).max(1),
      data: DataSchema,
    })
    .nullable(),
});

const QaReplySchema = z.object({
  match: z
    .object({ skill_id: z.string().min(1), intent: z.string().nullish(), data: DataSchema })
    .nullable(),
});

export class MatcherClient {
  constructor(private readonly opts: MatcherClientOptions) {}

  private headers(): Record<string, string> {
    const h: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.opts.token) h.Authorization = `Bearer ${this.opts.token}`;
    return h;
  }

  private async ok(res: Response, engine: string) {
    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new MatcherError(engine, `http ${res.status} ${res.statusText} ${text}`.trim(), res.status);
    }
    return res;
  }

  private async post<T>(
    engine: string,
    body: { utterances: Utterances; lang: string },
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const url = `${this.opts.baseUrl.replace(/\/+$/, '')}/${engine}`;
    logDebug('matcher.request', { engine, url });
    const res = await fetch(url, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify(body),
      timeout: this.opts.timeoutMs,
    });
    await this.ok(res, engine);
    const parsed = schema.safeParse(await res.json());
    if (!parsed.success) {
      throw new MatcherError(engine, 'malformed reply: ' + parsed.error.issues.map((i) => i.message).join(', '));
    }
    return parsed.data;
  }

  keyword(): Matcher {
    return {
      name: 'keyword',
      attempt: async (utterances, lang): Promise<Match | null> => {
        const { match } = await this.post('keyword', { utterances, lang }, KeywordReplySchema);
        if (!match) return null;
        return { kind: 'Keyword', intent: match.intent, data: match.data, skillId: match.skill_id ?? null };
      },
    };
  }

  commonQa(): Matcher {
    return {
      name: 'common_qa',
      attempt: async (utterances, lang): Promise<Match | null> => {
        const { match } = await this.post('qa', { utterances, lang }, QaReplySchema);
        if (!match) return null;
        return { kind: 'CommonQuery', intent: match.intent ?? null, data: match.data, skillId: match.skill_id };
      },
    };
  }

  statistical(): StatisticalEngine {
    return {
      calcIntent: async (utterances, lang): Promise<StatisticalIntent | null> => {
        const { intent } = await this.post('statistical', { utterances, lang }, StatisticalReplySchema);
        if (!intent) return null;
        return { name: intent.name, skillId: intent.skill_id ?? null, conf: intent.conf, data: intent.data };
      },
    };
  }
}
