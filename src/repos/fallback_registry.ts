// src/repos/fallback_registry.ts
// Handler id -> priority table behind an accessor boundary. Every read and
// mutation is one synchronous critical section: nothing here awaits, so no
// other routing call can observe a half-applied change.

import type { FallbackMode } from '../core/config';
import { logInfo } from '../core/logger';
import { DEFAULT_FALLBACK_PRIORITY, inBand, type PriorityBand } from '../app/types';

export type FallbackRegistration = { skillId: string; priority: number };

export type RegistryPolicy = {
  overrides: Record<string, number>;
  mode: FallbackMode;
  blacklist: string[];
  whitelist: string[];
};

export class FallbackRegistry {
  private table = new Map<string, number>();
  private readonly policy: RegistryPolicy;

  constructor(policy: Partial<RegistryPolicy> = {}) {
    this.policy = {
      overrides: policy.overrides ?? {},
      mode: policy.mode ?? 'accept_all',
      blacklist: policy.blacklist ?? [],
      whitelist: policy.whitelist ?? [],
    };
  }

  /** A missing or zero priority sits in no band, so it takes the default. */
  register(skillId: string, priority?: number | null): number {
    const reported = priority || DEFAULT_FALLBACK_PRIORITY;
    const override = this.policy.overrides[skillId];
    const effective = override ?? reported;
    if (override !== undefined && override !== reported) {
      logInfo('fallback.priority_forced', { skillId, from: reported, to: override });
    }
    this.table.set(skillId, effective);
    return effective;
  }

  /** No-op when absent. */
  deregister(skillId: string): boolean {
    return this.table.delete(skillId);
  }

  priorityOf(skillId: string): number | undefined {
    return this.table.get(skillId);
  }

  has(skillId: string): boolean {
    return this.table.has(skillId);
  }

  /** Access-control gate, independent of priority. */
  isAllowed(skillId: string): boolean {
    const { mode, blacklist, whitelist } = this.policy;
    if (mode === 'blacklist' && blacklist.includes(skillId)) return false;
    if (mode === 'whitelist' && !whitelist.includes(skillId)) return false;
    return true;
  }

  /** Copy of the table in registration order. */
  snapshot(): FallbackRegistration[] {
    return [...this.table].map(([skillId, priority]) => ({ skillId, priority }));
  }

  /** Allowed registrations whose priority falls in `band`. */
  inBand(band: PriorityBand): FallbackRegistration[] {
    return this.snapshot().filter((r) => inBand(r.priority, band) && this.isAllowed(r.skillId));
  }

  get size(): number {
    return this.table.size;
  }
}
