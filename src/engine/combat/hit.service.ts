import { Injectable } from '@nestjs/common';
import type { CharacterState } from '../../db/types/index.js';
import type { RandomSource } from '../rng/rng.service.js';
import { CharacterService } from '../character/character.service.js';

export interface RollResult {
  success: boolean;
  roll: number;
  chance: number;
}

function d100(rng: RandomSource, chance: number): RollResult {
  const roll = rng.range(1, 100);
  return { success: roll <= chance, roll, chance };
}

@Injectable()
export class HitService {
  constructor(private readonly characterService: CharacterService) {}

  /**
   * 70 + focus/10 − fatigue/20, where fatigue = 100 − stamina.
   * Read after the attack's stamina is paid.
   */
  attackChance(c: CharacterState): number {
    return 70 + Math.floor(c.focus / 10) - Math.floor((100 - c.stamina) / 20);
  }

  ambushChance(c: CharacterState): number {
    return 50 + c.level * 2;
  }

  rollAttack(c: CharacterState, rng: RandomSource): RollResult {
    return d100(rng, this.attackChance(c));
  }

  rollAmbush(c: CharacterState, rng: RandomSource): RollResult {
    return d100(rng, this.ambushChance(c));
  }

  /** Player evades the whole enemy turn */
  rollDodge(c: CharacterState, rng: RandomSource): RollResult {
    return d100(rng, this.characterService.dodgeChance(c));
  }
}
