import { Injectable } from '@nestjs/common';
import type {
  CharacterState,
  EnemyState,
  Event,
  ItemInstance,
  JobTier,
} from '../../db/types/index.js';
import type { RandomSource } from '../rng/rng.service.js';
import { CharacterService } from '../character/character.service.js';
import { ProgressionService } from '../character/progression.service.js';

export const MONEY_ROLL_MIN = 10;
export const MONEY_ROLL_MAX = 50;

export interface VictoryRewards {
  experience: number;
  levelsGained: number;
  level: number;
  jobsAdvanced: JobTier[];
  loot: ItemInstance[];
  money: number;
}

export interface VictoryResult {
  rewards: VictoryRewards;
  events: Event[];
}

@Injectable()
export class RewardsService {
  constructor(
    private readonly characterService: CharacterService,
    private readonly progressionService: ProgressionService,
  ) {}

  /**
   * Spoils of a won encounter. One draw: range(10, 50) for money.
   * The enemy's loot moves into the inventory and is cleared from the enemy.
   */
  applyVictory(c: CharacterState, e: EnemyState, rng: RandomSource): VictoryResult {
    const events: Event[] = [];
    const push = (kind: Event['kind'], key: string, text: string, data: Record<string, unknown>) => {
      events.push({ id: `reward_${key}_${events.length}`, kind, text, tags: ['REWARD', kind], data });
    };

    const levelsGained = this.progressionService.gainExperience(c, e.experienceReward);
    push('PROGRESSION', 'exp', `You gain ${e.experienceReward} experience.`, {
      experience: e.experienceReward,
    });
    if (levelsGained > 0) {
      push('PROGRESSION', 'level', `You reach level ${c.level}.`, { level: c.level, levelsGained });
    }

    // one attempt per level-up; a big jump may clear several gates
    const jobsAdvanced: JobTier[] = [];
    for (let i = 0; i < levelsGained; i++) {
      if (!this.progressionService.advanceJob(c)) break;
      jobsAdvanced.push(c.job);
      push('PROGRESSION', 'job', `You are now a ${c.job}.`, { job: c.job });
    }

    const loot = e.loot;
    e.loot = [];
    for (const item of loot) {
      this.characterService.addItem(c, item);
      push('LOOT', 'loot', `You take ${item.name}.`, { itemId: item.itemId, instanceId: item.instanceId });
    }

    const money = rng.range(MONEY_ROLL_MIN, MONEY_ROLL_MAX) + Math.floor(e.experienceReward / 2);
    c.money += money;
    push('GOLD', 'money', `You collect ${money} coins.`, { money });

    return {
      rewards: {
        experience: e.experienceReward,
        levelsGained,
        level: c.level,
        jobsAdvanced,
        loot,
        money,
      },
      events,
    };
  }
}
