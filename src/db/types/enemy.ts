import type { EnemyAction, Stance } from './enums.js';
import type { ItemInstance } from './item.js';

export interface EnemyState {
  enemyId: string;
  name: string;
  maxHealth: number;
  health: number;
  attack: number;
  defense: number;
  experienceReward: number;
  loot: ItemInstance[];
  actionPool: EnemyAction[];
  rageMode: boolean; // one-way latch
  stance: Stance;
}
