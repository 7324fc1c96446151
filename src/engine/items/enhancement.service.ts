import { Injectable } from '@nestjs/common';
import type { EnhanceResult, ItemInstance } from '../../db/types/index.js';
import type { RandomSource } from '../rng/rng.service.js';

export const CURSED_PREFIX = 'Cursed ';
export const CURSED_EFFECT = "Gnaws at the wearer's mind";

const BASE_SUCCESS_RATE = 80;
const RATE_DROP_PER_LEVEL = 15;
const PLAIN_FAIL_BAND = 10;
const DAMAGE_BAND = 10;
const DAMAGE_DURABILITY_LOSS = 30;

@Injectable()
export class EnhancementService {
  /** May be zero or negative: from +6 on every attempt fails */
  successRate(item: ItemInstance): number {
    return BASE_SUCCESS_RATE - RATE_DROP_PER_LEVEL * item.enhancementLevel;
  }

  canEnhance(item: ItemInstance): boolean {
    return (
      (item.category === 'WEAPON' || item.category === 'ARMOR') &&
      item.durability > 0
    );
  }

  /**
   * d100 against the success rate. Above it, bands of 10:
   * plain fail → durability -30 → destroyed/cursed (second d100, 50/50).
   * A DESTROYED item is left at durability 0; removing it from inventory and
   * equip slots is the caller's job.
   */
  enhance(item: ItemInstance, rng: RandomSource): EnhanceResult {
    const rate = this.successRate(item);
    const roll = rng.range(1, 100);

    if (roll <= rate) {
      item.enhancementLevel += 1;
      item.power = Math.trunc(item.power * 1.2);
      item.defense = Math.trunc(item.defense * 1.2);
      return { success: true, outcome: 'NORMAL' };
    }

    if (roll <= rate + PLAIN_FAIL_BAND) {
      return { success: false, outcome: 'NORMAL' };
    }

    if (roll <= rate + PLAIN_FAIL_BAND + DAMAGE_BAND) {
      item.durability = Math.max(0, item.durability - DAMAGE_DURABILITY_LOSS);
      return { success: false, outcome: 'DAMAGED' };
    }

    if (rng.range(1, 100) <= 50) {
      item.durability = 0;
      return { success: false, outcome: 'DESTROYED' };
    }

    item.name = `${CURSED_PREFIX}${item.name}`;
    item.specialEffect = CURSED_EFFECT;
    item.power = Math.trunc(item.power * 1.5);
    item.defense = Math.trunc(item.defense * 0.5);
    return { success: false, outcome: 'CURSED' };
  }
}
