import { Injectable } from '@nestjs/common';
import type { EnemyState, ItemInstance } from '../../db/types/index.js';
import type { EnemyDefinition } from '../../content/content.types.js';
import type { RandomSource } from '../rng/rng.service.js';

export const RAGE_HEALTH_RATIO = 0.3;
export const RAGE_ATTACK_MULT = 1.5;
export const RAGE_DAMAGE_MULT = 1.3;
export const AGGRESSIVE_DAMAGE_MULT = 1.2;
export const DEFENSIVE_DAMAGE_MULT = 0.8;

export interface EnemyHit {
  effective: number;
  rageTriggered: boolean;
}

@Injectable()
export class EnemyService {
  create(def: EnemyDefinition, loot: ItemInstance[]): EnemyState {
    return {
      enemyId: def.enemyId,
      name: def.name,
      maxHealth: def.health,
      health: def.health,
      attack: def.attack,
      defense: def.defense,
      experienceReward: def.experienceReward,
      loot,
      actionPool: [...def.actionPool],
      rageMode: false,
      stance: 'NORMAL',
    };
  }

  /** Flat reduction by defense, then the rage check */
  takeDamage(e: EnemyState, amount: number): EnemyHit {
    const effective = Math.max(0, amount - e.defense);
    e.health = Math.max(0, e.health - effective);
    return { effective, rageTriggered: this.checkRage(e) };
  }

  /** Unmitigated health loss (traps). Shares the rage latch with takeDamage. */
  loseHealth(e: EnemyState, amount: number): EnemyHit {
    const effective = Math.min(e.health, Math.max(0, amount));
    e.health -= effective;
    return { effective, rageTriggered: this.checkRage(e) };
  }

  isAlive(e: EnemyState): boolean {
    return e.health > 0;
  }

  /**
   * One draw: range(-5, 5). Truncated after each multiplier,
   * rage first, then stance.
   */
  getAttackDamage(e: EnemyState, rng: RandomSource): number {
    let damage = e.attack + rng.range(-5, 5);
    if (e.rageMode) damage = Math.trunc(damage * RAGE_DAMAGE_MULT);
    if (e.stance === 'AGGRESSIVE') damage = Math.trunc(damage * AGGRESSIVE_DAMAGE_MULT);
    else if (e.stance === 'DEFENSIVE') damage = Math.trunc(damage * DEFENSIVE_DAMAGE_MULT);
    return damage;
  }

  // one-way: attack is boosted once and never recomputed
  private checkRage(e: EnemyState): boolean {
    if (e.rageMode || e.health > e.maxHealth * RAGE_HEALTH_RATIO) return false;
    e.rageMode = true;
    e.attack = Math.trunc(e.attack * RAGE_ATTACK_MULT);
    return true;
  }
}
