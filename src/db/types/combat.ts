import type {
  CombatOutcome,
  EnemyAction,
  PlayerActionType,
  RejectionCode,
} from './enums.js';
import type { CharacterState } from './character.js';
import type { EnemyState } from './enemy.js';
import type { Event } from './event.js';

export type PlayerAction =
  | { type: 'ATTACK' }
  | { type: 'DODGE' }
  | { type: 'DEFEND' }
  | { type: 'AMBUSH' }
  | { type: 'SKILL'; skillId: string }
  | { type: 'ITEM'; instanceId: string };

export interface CombatSession {
  character: CharacterState;
  enemy: EnemyState;
  turnCount: number;
  playerActed: boolean;
  playerLastAction: PlayerActionType | null;
  active: boolean;
  outcome: CombatOutcome;
  rageAnnounced: boolean;
}

/** Persisted form of an in-progress encounter; the character is saved separately */
export interface CombatSnapshot {
  enemy: EnemyState;
  turnCount: number;
  playerActed: boolean;
  playerLastAction: PlayerActionType | null;
  active: boolean;
  outcome: CombatOutcome;
  rageAnnounced: boolean;
  rng: { seed: string; cursor: number };
}

export interface Rejection {
  code: RejectionCode;
  message: string;
}

export interface RoundReport {
  turnCount: number;
  action: PlayerActionType;
  rejection?: Rejection;
  playerDamageDealt: number;
  playerDamageTaken: number;
  enemyAction: EnemyAction | null;
  enemyMissed: boolean;
  outcome: CombatOutcome;
  events: Event[];
}

export interface CombatOpenOptions {
  mercenary?: boolean;
}
