import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import {
  COMBAT_OUTCOME,
  ENEMY_ACTION,
  ITEM_CATEGORY,
  JOB_TIER,
  ORIGIN,
  PLAYER_ACTION,
  STANCE,
  STATUS_KIND,
  type CharacterState,
  type CombatSnapshot,
} from '../db/types/index.js';
import {
  FactionAffinitySchema,
  ItemUseSchema,
  SkillDefinitionSchema,
} from '../content/content.schemas.js';
import { InternalError } from '../common/errors/game-errors.js';

const int = z.number().int();

export const StatusEffectSchema = z.object({
  kind: z.enum(STATUS_KIND),
  turns: int,
  magnitude: int,
});

export const ItemInstanceSchema = z.object({
  instanceId: z.string().min(1),
  itemId: z.string().min(1),
  name: z.string(),
  category: z.enum(ITEM_CATEGORY),
  description: z.string(),
  power: int,
  defense: int,
  specialEffect: z.string(),
  use: ItemUseSchema.optional(),
  enhancementLevel: int.nonnegative(),
  durability: int.min(0).max(100),
});

export const CharacterStateSchema = z.object({
  name: z.string().min(1),
  origin: z.enum(ORIGIN),
  job: z.enum(JOB_TIER),
  factionAffinity: FactionAffinitySchema,
  health: int.nonnegative(),
  maxHealth: int.positive(),
  stamina: int.nonnegative(),
  maxStamina: int.positive(),
  focus: int.nonnegative(),
  maxFocus: int.positive(),
  defense: int,
  sanity: int.min(0).max(100),
  baseAttack: int,
  baseDefense: int,
  money: int.nonnegative(),
  experience: int.nonnegative(),
  level: int.positive(),
  inventory: z.array(ItemInstanceSchema),
  equippedWeaponId: z.string().nullable(),
  equippedArmorId: z.string().nullable(),
  skills: z.array(SkillDefinitionSchema),
  cursed: z.boolean(),
  nightmares: z.array(z.string()),
  buffs: z.array(StatusEffectSchema),
  debuffs: z.array(StatusEffectSchema),
});

export const EnemyStateSchema = z.object({
  enemyId: z.string().min(1),
  name: z.string(),
  maxHealth: int.positive(),
  health: int.nonnegative(),
  attack: int,
  defense: int,
  experienceReward: int.nonnegative(),
  loot: z.array(ItemInstanceSchema),
  actionPool: z.array(z.enum(ENEMY_ACTION)),
  rageMode: z.boolean(),
  stance: z.enum(STANCE),
});

export const CombatSnapshotSchema = z.object({
  enemy: EnemyStateSchema,
  turnCount: int.nonnegative(),
  playerActed: z.boolean(),
  playerLastAction: z.enum(PLAYER_ACTION).nullable(),
  active: z.boolean(),
  outcome: z.enum(COMBAT_OUTCOME),
  rageAnnounced: z.boolean(),
  rng: z.object({ seed: z.string().min(1), cursor: int.nonnegative() }),
});

/** jsonb columns in and out of the save_slots table */
@Injectable()
export class SaveCodec {
  decodeCharacter(raw: unknown): CharacterState {
    const result = CharacterStateSchema.safeParse(raw);
    if (!result.success) {
      throw new InternalError('Corrupt character save', { issues: result.error.issues.map((i) => i.path.join('.')) });
    }
    return result.data;
  }

  decodeEncounter(raw: unknown): CombatSnapshot | null {
    if (raw === null || raw === undefined) return null;
    const result = CombatSnapshotSchema.safeParse(raw);
    if (!result.success) {
      throw new InternalError('Corrupt encounter save', { issues: result.error.issues.map((i) => i.path.join('.')) });
    }
    return result.data;
  }

  /** Deep copy through JSON, the same shape the database stores */
  encodeCharacter(c: CharacterState): CharacterState {
    return this.decodeCharacter(JSON.parse(JSON.stringify(c)));
  }

  encodeEncounter(snapshot: CombatSnapshot | null): CombatSnapshot | null {
    return this.decodeEncounter(snapshot === null ? null : JSON.parse(JSON.stringify(snapshot)));
  }
}
