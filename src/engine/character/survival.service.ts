import { Injectable } from '@nestjs/common';
import type { CharacterState, Rejection } from '../../db/types/index.js';
import { CharacterService } from './character.service.js';
import { StatusService } from '../status/status.service.js';

export const SURVIVAL_OPTION = ['HERBS', 'TRAP', 'SHELTER'] as const;
export type SurvivalOption = (typeof SURVIVAL_OPTION)[number];

export const HERB_HEAL = 30;
export const HERB_STAMINA = 20;
export const TRAP_TURNS = 5;
export const TRAP_CHANCE = 30;
export const SHELTER_SANITY = 10;

export type SurvivalResult =
  | { done: true; option: SurvivalOption; text: string }
  | { done: false; rejection: Rejection };

/** War orphans' field craft, used between encounters */
@Injectable()
export class SurvivalService {
  constructor(
    private readonly characterService: CharacterService,
    private readonly statusService: StatusService,
  ) {}

  apply(c: CharacterState, option: SurvivalOption): SurvivalResult {
    if (c.origin !== 'WAR_ORPHAN') {
      return {
        done: false,
        rejection: { code: 'INVALID_ACTION', message: 'Only a war orphan knows these tricks.' },
      };
    }

    switch (option) {
      case 'HERBS': {
        const healed = this.characterService.heal(c, HERB_HEAL);
        const before = c.stamina;
        c.stamina = Math.min(c.maxStamina, c.stamina + HERB_STAMINA);
        return {
          done: true,
          option,
          text: `Medicinal herbs restore ${healed} health and ${c.stamina - before} stamina.`,
        };
      }
      case 'TRAP':
        // springs at the start of a later encounter, see CombatService.open
        c.buffs = this.statusService.add(c.buffs, 'TRAP', TRAP_TURNS, TRAP_CHANCE);
        return { done: true, option, text: 'You set a cunning trap.' };
      case 'SHELTER':
        this.characterService.rest(c);
        this.characterService.rest(c);
        this.characterService.adjustSanity(c, SHELTER_SANITY);
        return { done: true, option, text: 'A safe hideout lets you rest twice over.' };
    }
  }
}
