import type { EnhanceOutcome, ItemCategory } from './enums.js';

export type ItemUse =
  | { type: 'HEAL'; amount: number }
  | { type: 'POISON'; turns: number; magnitude: number };

/** Catalog template, keyed by itemId */
export interface ItemDefinition {
  itemId: string;
  name: string;
  category: ItemCategory;
  description: string;
  power: number;
  defense: number;
  specialEffect: string;
  use?: ItemUse;
}

/**
 * Owned copy of a template. name/power/defense/specialEffect diverge from the
 * template through enhancement, so they are carried on the instance.
 */
export interface ItemInstance {
  instanceId: string;
  itemId: string;
  name: string;
  category: ItemCategory;
  description: string;
  power: number;
  defense: number;
  specialEffect: string;
  use?: ItemUse;
  enhancementLevel: number;
  durability: number; // 0~100
}

export interface EnhanceResult {
  success: boolean;
  outcome: EnhanceOutcome;
}
