import { z } from 'zod';
import {
  ENEMY_ACTION,
  ITEM_CATEGORY,
  ORIGIN,
} from '../db/types/index.js';

export const ItemUseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('HEAL'), amount: z.number().int().positive() }),
  z.object({
    type: z.literal('POISON'),
    turns: z.number().int().positive(),
    magnitude: z.number().int().nonnegative(),
  }),
]);

export const ItemDefinitionSchema = z.object({
  itemId: z.string().min(1),
  name: z.string().min(1),
  category: z.enum(ITEM_CATEGORY),
  description: z.string(),
  power: z.number().int().nonnegative(),
  defense: z.number().int().nonnegative(),
  specialEffect: z.string(),
  use: ItemUseSchema.optional(),
});

export const SkillDefinitionSchema = z.object({
  skillId: z.string().min(1),
  name: z.string().min(1),
  damageMultiplier: z.number().min(1),
  staminaCost: z.number().int().nonnegative(),
  focusCost: z.number().int().nonnegative(),
  description: z.string(),
  minLevel: z.number().int().positive().optional(),
  price: z.number().int().nonnegative().optional(),
});

export const FactionAffinitySchema = z.object({
  PALACE: z.number().int().min(0).max(100),
  CULT: z.number().int().min(0).max(100),
  SHADOW_GUILD: z.number().int().min(0).max(100),
  PEOPLE_ALLIANCE: z.number().int().min(0).max(100),
  FOREIGNER_UNION: z.number().int().min(0).max(100),
});

export const OriginDefinitionSchema = z.object({
  origin: z.enum(ORIGIN),
  label: z.string(),
  description: z.string(),
  baseAttack: z.number().int().nonnegative(),
  baseDefense: z.number().int().nonnegative(),
  money: z.number().int().nonnegative(),
  factionAffinity: FactionAffinitySchema,
  startingItems: z.array(z.string()),
  startingSkills: z.array(z.string()),
  maxStaminaBonus: z.number().int().nonnegative().default(0),
});

export const EnemyDefinitionSchema = z.object({
  enemyId: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  health: z.number().int().positive(),
  attack: z.number().int().nonnegative(),
  defense: z.number().int().nonnegative(),
  experienceReward: z.number().int().nonnegative(),
  loot: z.array(z.string()),
  actionPool: z.array(z.enum(ENEMY_ACTION)),
});

export const CatalogSchemas = {
  items: z.array(ItemDefinitionSchema),
  skills: z.array(SkillDefinitionSchema),
  enemies: z.array(EnemyDefinitionSchema),
  origins: z.array(OriginDefinitionSchema),
};
