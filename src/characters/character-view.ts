import type { CharacterState } from '../db/types/index.js';
import type { CharacterService } from '../engine/character/character.service.js';
import type { ProgressionService } from '../engine/character/progression.service.js';
import { XP_PER_LEVEL } from '../engine/character/progression.service.js';

export interface CharacterView {
  character: CharacterState;
  derived: {
    totalAttack: number;
    totalDefense: number;
    dodgeChance: number;
    experienceToNextLevel: number;
    nextJobLevel: number | null;
  };
  inEncounter: boolean;
}

export function buildCharacterView(
  c: CharacterState,
  inEncounter: boolean,
  characters: CharacterService,
  progression: ProgressionService,
): CharacterView {
  return {
    character: c,
    derived: {
      totalAttack: characters.totalAttack(c),
      totalDefense: characters.totalDefense(c),
      dodgeChance: characters.dodgeChance(c),
      experienceToNextLevel: c.level * XP_PER_LEVEL - c.experience,
      nextJobLevel: progression.nextJobRequirement(c),
    },
    inEncounter,
  };
}
