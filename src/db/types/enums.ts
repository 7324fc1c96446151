// Canonical enums shared by engine, saves and API

export const ORIGIN = ['FALLEN_NOBLE', 'BANDIT_OUTCAST', 'WAR_ORPHAN'] as const;
export type Origin = (typeof ORIGIN)[number];

export const FACTION = [
  'PALACE',
  'CULT',
  'SHADOW_GUILD',
  'PEOPLE_ALLIANCE',
  'FOREIGNER_UNION',
] as const;
export type Faction = (typeof FACTION)[number];

// Ordered: index drives the level gate for advancement
export const JOB_TIER = [
  'WANDERER',
  'WARRIOR_APPRENTICE',
  'WARRIOR',
  'BLADE_MASTER',
  'SWORD_DEMON',
] as const;
export type JobTier = (typeof JOB_TIER)[number];

export const ITEM_CATEGORY = ['WEAPON', 'ARMOR', 'SPECIAL', 'STORY'] as const;
export type ItemCategory = (typeof ITEM_CATEGORY)[number];

export const EQUIP_SLOT = ['WEAPON', 'ARMOR'] as const;
export type EquipSlot = (typeof EQUIP_SLOT)[number];

export const ENHANCE_OUTCOME = ['NORMAL', 'DAMAGED', 'DESTROYED', 'CURSED'] as const;
export type EnhanceOutcome = (typeof ENHANCE_OUTCOME)[number];

export const STATUS_KIND = ['DODGE', 'DEFENSE', 'POISON', 'TRAP'] as const;
export type StatusKind = (typeof STATUS_KIND)[number];

export const ENEMY_ACTION = [
  'ATTACK',
  'STRONG_ATTACK',
  'FEINT',
  'DEFEND',
  'TAUNT',
] as const;
export type EnemyAction = (typeof ENEMY_ACTION)[number];

export const STANCE = ['NORMAL', 'DEFENSIVE', 'AGGRESSIVE'] as const;
export type Stance = (typeof STANCE)[number];

export const PLAYER_ACTION = [
  'ATTACK',
  'DODGE',
  'DEFEND',
  'AMBUSH',
  'SKILL',
  'ITEM',
] as const;
export type PlayerActionType = (typeof PLAYER_ACTION)[number];

export const COMBAT_OUTCOME = ['ONGOING', 'VICTORY', 'DEATH'] as const;
export type CombatOutcome = (typeof COMBAT_OUTCOME)[number];

export const REJECTION_CODE = ['INSUFFICIENT_RESOURCE', 'INVALID_ACTION'] as const;
export type RejectionCode = (typeof REJECTION_CODE)[number];

export const EVENT_KIND = [
  'BATTLE',
  'DAMAGE',
  'STATUS',
  'EQUIPMENT',
  'LOOT',
  'GOLD',
  'PROGRESSION',
  'SYSTEM',
] as const;
export type EventKind = (typeof EVENT_KIND)[number];
