import type { Faction, JobTier, Origin, StatusKind } from './enums.js';
import type { ItemInstance } from './item.js';
import type { SkillDefinition } from './skill.js';

export type StatusEffect = {
  kind: StatusKind;
  turns: number; // remaining rounds
  magnitude: number;
};

export type FactionAffinity = Record<Faction, number>;

export interface CharacterState {
  name: string;
  origin: Origin;
  job: JobTier;
  factionAffinity: FactionAffinity;

  health: number;
  maxHealth: number;
  stamina: number;
  maxStamina: number;
  focus: number;
  maxFocus: number;
  defense: number; // flat damage reduction in takeDamage
  sanity: number; // 0~100

  baseAttack: number;
  baseDefense: number;

  money: number;
  experience: number;
  level: number;

  inventory: ItemInstance[];
  equippedWeaponId: string | null; // instanceId in inventory
  equippedArmorId: string | null;
  skills: SkillDefinition[];

  cursed: boolean;
  nightmares: string[];
  buffs: StatusEffect[];
  debuffs: StatusEffect[];
}

export const BASE_POOL = 100;
export const BASE_FLAT_DEFENSE = 10;
export const MAX_SANITY = 100;
