import { Injectable } from '@nestjs/common';
import type { RandomSource } from '../rng/rng.service.js';

export const ATTACK_VARIANCE_MIN = -5;
export const ATTACK_VARIANCE_MAX = 10;
export const AMBUSH_MULT = 2;
export const STRONG_ATTACK_MULT = 1.5;

export interface DamageRoll {
  damage: number;
  variance: number;
}

// Raw (pre-defense) damage numbers; mitigation happens in the target's takeDamage
@Injectable()
export class DamageService {
  /** One draw: range(-5, 10) */
  rollAttack(totalAttack: number, rng: RandomSource): DamageRoll {
    const variance = rng.range(ATTACK_VARIANCE_MIN, ATTACK_VARIANCE_MAX);
    return { damage: totalAttack + variance, variance };
  }

  skill(totalAttack: number, multiplier: number): number {
    return Math.floor(totalAttack * multiplier);
  }

  ambush(totalAttack: number): number {
    return totalAttack * AMBUSH_MULT;
  }

  strongAttack(baseDamage: number): number {
    return Math.trunc(baseDamage * STRONG_ATTACK_MULT);
  }
}
