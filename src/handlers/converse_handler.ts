// src/handlers/converse_handler.ts
// Stage 1: every active skill, most recent first, may claim the utterance
// before any matcher runs.

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { Message, MessageBus } from '../bus/message';
import { logError, logInfo } from '../core/logger';
import type { Match, Matcher, Utterances } from '../app/types';
import type { ActiveSkillsRepo } from '../repos/active_skills_repo';

export const CONVERSE_EVENTS = {
  request: 'skill.converse.request',
  response: 'skill.converse.response',
} as const;

const ConverseReplySchema = z.object({
  result: z.boolean().optional(),
  error: z.string().optional(),
});

export class ConverseMatcher implements Matcher {
  readonly name = 'converse';

  constructor(
    private readonly bus: MessageBus,
    private readonly activeSkills: ActiveSkillsRepo,
    private readonly opts: { timeoutMs: number }
  ) {}

  async attempt(utterances: Utterances, lang: string, message: Message): Promise<Match | null> {
    for (const { skillId } of this.activeSkills.list()) {
      const req = message.reply(
        CONVERSE_EVENTS.request,
        { skill_id: skillId, utterances, lang },
        { correlation_id: randomUUID() }
      );
      const res = await this.bus.waitForResponse(req, {
        replyType: CONVERSE_EVENTS.response,
        timeoutMs: this.opts.timeoutMs,
      });
      if (!res) continue;

      const parsed = ConverseReplySchema.safeParse(res.data);
      if (!parsed.success) {
        logError('converse.reply_invalid', { skillId, issues: parsed.error.issues });
        continue;
      }
      if (parsed.data.error !== undefined) {
        logError('converse.skill_error', { skillId, error: parsed.data.error });
        continue;
      }
      if (parsed.data.result) {
        logInfo('converse.handled', { skillId });
        return { kind: 'Converse', intent: null, data: {}, skillId };
      }
    }
    return null;
  }
}
