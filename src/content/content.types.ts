// Catalog seed data types (dynasty_v1 JSON)

import type {
  EnemyAction,
  FactionAffinity,
  ItemDefinition,
  Origin,
  SkillDefinition,
} from '../db/types/index.js';

export type { ItemDefinition, SkillDefinition };

export type OriginDefinition = {
  origin: Origin;
  label: string;
  description: string;
  baseAttack: number;
  baseDefense: number;
  money: number;
  factionAffinity: FactionAffinity;
  startingItems: string[]; // itemIds; weapon/armor are equipped on creation
  startingSkills: string[];
  maxStaminaBonus: number;
};

export type EnemyDefinition = {
  enemyId: string;
  name: string;
  description: string;
  health: number;
  attack: number;
  defense: number;
  experienceReward: number;
  loot: string[]; // itemIds granted verbatim on victory
  actionPool: EnemyAction[];
};
