import { Injectable } from '@nestjs/common';
import type { CharacterState, JobTier } from '../../db/types/index.js';
import { JOB_TIER } from '../../db/types/index.js';

export const XP_PER_LEVEL = 100;
export const LEVEL_UP_POOL_BONUS = 10;
export const LEVEL_UP_STAT_BONUS = 2;
export const JOB_LEVEL_STEP = 5;
export const JOB_POOL_BONUS = 20;
export const JOB_STAT_BONUS = 5;

@Injectable()
export class ProgressionService {
  /**
   * Threshold is level × 100 and is subtracted on each level-up, so a single
   * large grant can cross several levels. Returns the levels gained.
   */
  gainExperience(c: CharacterState, amount: number): number {
    c.experience += Math.max(0, amount);
    let gained = 0;
    while (c.experience >= c.level * XP_PER_LEVEL) {
      c.experience -= c.level * XP_PER_LEVEL;
      c.level += 1;
      c.maxHealth += LEVEL_UP_POOL_BONUS;
      c.maxStamina += LEVEL_UP_POOL_BONUS;
      c.maxFocus += LEVEL_UP_POOL_BONUS;
      c.baseAttack += LEVEL_UP_STAT_BONUS;
      c.baseDefense += LEVEL_UP_STAT_BONUS;
      gained++;
    }
    return gained;
  }

  /** Level required for the next tier, or null at the last one */
  nextJobRequirement(c: CharacterState): number | null {
    const idx = JOB_TIER.indexOf(c.job);
    if (idx < 0 || idx >= JOB_TIER.length - 1) return null;
    return (idx + 1) * JOB_LEVEL_STEP;
  }

  nextJob(c: CharacterState): JobTier | null {
    const idx = JOB_TIER.indexOf(c.job);
    if (idx < 0 || idx >= JOB_TIER.length - 1) return null;
    return JOB_TIER[idx + 1];
  }

  advanceJob(c: CharacterState): boolean {
    const required = this.nextJobRequirement(c);
    const next = this.nextJob(c);
    if (required === null || next === null || c.level < required) return false;

    c.job = next;
    c.maxHealth += JOB_POOL_BONUS;
    c.maxStamina += JOB_POOL_BONUS;
    c.maxFocus += JOB_POOL_BONUS;
    c.baseAttack += JOB_STAT_BONUS;
    c.baseDefense += JOB_STAT_BONUS;
    return true;
  }
}
