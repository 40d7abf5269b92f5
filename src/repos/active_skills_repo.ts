// src/repos/active_skills_repo.ts
// Skills that get first refusal on the next utterance (converse stage).
// Most recently activated first.

import { Message, type MessageBus } from '../bus/message';
import { logInfo, logWarn } from '../core/logger';

export type ActiveSkill = { skillId: string; activatedAt: number };

export type ActiveSkillsOptions = {
  timeoutMinutes: number;
  maxActive: number;
  now?: () => number;
};

export const ACTIVE_SKILL_EVENTS = {
  activated: 'skills.activated',
  deactivated: 'skills.deactivated',
} as const;

export class ActiveSkillsRepo {
  private entries: ActiveSkill[] = [];
  private readonly now: () => number;

  constructor(private readonly opts: ActiveSkillsOptions, private readonly bus?: MessageBus) {
    this.now = opts.now ?? Date.now;
  }

  /**
   * `caller` is the attributed sender of the request; when set it must be
   * the skill itself. The router passes no caller for a match winner.
   */
  activate(skillId: string, caller?: string): boolean {
    if (caller !== undefined && caller !== skillId) {
      logWarn('active_skills.forged_activation', { skillId, caller });
      return false;
    }
    const wasActive = this.isActive(skillId);
    this.entries = [
      { skillId, activatedAt: this.now() },
      ...this.entries.filter((e) => e.skillId !== skillId),
    ].slice(0, this.opts.maxActive);
    if (!wasActive) {
      logInfo('active_skills.activated', { skillId });
      this.bus?.emit(new Message(ACTIVE_SKILL_EVENTS.activated, { skill_id: skillId }));
    }
    return true;
  }

  deactivate(skillId: string, caller?: string): boolean {
    if (caller !== undefined && caller !== skillId) {
      logWarn('active_skills.forged_deactivation', { skillId, caller });
      return false;
    }
    if (!this.isActive(skillId)) return false;
    this.entries = this.entries.filter((e) => e.skillId !== skillId);
    logInfo('active_skills.deactivated', { skillId });
    this.bus?.emit(new Message(ACTIVE_SKILL_EVENTS.deactivated, { skill_id: skillId }));
    return true;
  }

  list(): ActiveSkill[] {
    this.prune();
    return this.entries.map((e) => ({ ...e }));
  }

  isActive(skillId: string): boolean {
    return this.list().some((e) => e.skillId === skillId);
  }

  private prune() {
    const cutoff = this.now() - this.opts.timeoutMinutes * 60_000;
    this.entries = this.entries.filter((e) => e.activatedAt > cutoff);
  }
}
