// src/webhooks/utterance_webhook.ts
import { Router, Request, Response } from 'express';
import { Message } from '../bus/message';
import { describeError } from '../core/errors';
import { logError, logInfo } from '../core/logger';
import { ROUTER_EVENTS, type UtteranceRouter } from '../app/utterance_router';
import type { ActiveSkillsRepo } from '../repos/active_skills_repo';
import type { FallbackRegistry } from '../repos/fallback_registry';
import { eventOf, validateEvent } from '../middleware/validateEvent';

export type WebhookDeps = {
  router: UtteranceRouter;
  registry: FallbackRegistry;
  activeSkills: ActiveSkillsRepo;
};

export function createUtteranceWebhook(deps: WebhookDeps) {
  const router = Router();

  router.post('/utterance', validateEvent(), async (_req: Request, res: Response) => {
    const event = eventOf(res);
    const requestId = String(res.locals.requestId || '');
    const context: Record<string, unknown> = { ...event.context, source: 'http', request_id: requestId };
    if (event.lang && context.request_lang === undefined) context.request_lang = event.lang;

    logInfo('webhook.utterance.in', { requestId, utterances: event.utterances });
    try {
      const result = await deps.router.routeMessage(
        new Message(ROUTER_EVENTS.utterance, { utterances: event.utterances }, context)
      );
      return res.status(200).json({
        match: result.match,
        lang: result.lang,
        elapsed_ms: Math.round(result.elapsedMs),
      });
    } catch (e) {
      logError('webhook.utterance.failed', { requestId, ...describeError(e) });
      return res.status(500).json({ error: 'routing_failed' });
    }
  });

  router.get('/fallbacks', (_req: Request, res: Response) => {
    res.json({
      fallbacks: deps.registry.snapshot().map((r) => ({
        skill_id: r.skillId,
        priority: r.priority,
        allowed: deps.registry.isAllowed(r.skillId),
      })),
    });
  });

  router.get('/skills/active', (_req: Request, res: Response) => {
    res.json({
      skills: deps.activeSkills.list().map((s) => ({
        skill_id: s.skillId,
        activated_at: new Date(s.activatedAt).toISOString(),
      })),
    });
  });

  return router;
}
