import { Injectable } from '@nestjs/common';
import type {
  CharacterState,
  CombatOpenOptions,
  CombatSession,
  EnemyState,
  Event,
  PlayerAction,
  Rejection,
  RoundReport,
} from '../../db/types/index.js';
import type { RandomSource } from '../rng/rng.service.js';
import { CombatService } from './combat.service.js';
import { RewardsService, type VictoryRewards } from '../rewards/rewards.service.js';

/** Picks the next action; `lastRejection` is set when the previous pick was refused */
export type ActionChooser = (session: Readonly<CombatSession>, lastRejection: Rejection | null) => PlayerAction;

export interface StartCombatOptions extends CombatOpenOptions {
  maxRounds?: number;
}

export interface EncounterResult {
  outcome: 'VICTORY' | 'DEATH';
  rounds: RoundReport[];
  openingEvents: Event[];
  rewards?: VictoryRewards;
  rewardEvents: Event[];
}

export const MAX_CONSECUTIVE_REJECTIONS = 3;
export const DEFAULT_MAX_ROUNDS = 500;

// Fallback after repeated refusals: defend has no precondition
const FALLBACK_ACTION: PlayerAction = { type: 'DEFEND' };

@Injectable()
export class EncounterService {
  constructor(
    private readonly combatService: CombatService,
    private readonly rewardsService: RewardsService,
  ) {}

  /**
   * Runs an encounter to its end. Side effects stay on `character`
   * (experience, money, loot, durability, curses); the enemy is discarded.
   */
  startCombat(
    character: CharacterState,
    enemy: EnemyState,
    chooseAction: ActionChooser,
    rng: RandomSource,
    options: StartCombatOptions = {},
  ): EncounterResult {
    const maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    const { session, events } = this.combatService.open(character, enemy, options, rng);
    const rounds: RoundReport[] = [];
    let lastRejection: Rejection | null = null;
    let rejections = 0;

    while (session.active) {
      if (session.turnCount >= maxRounds) {
        throw new Error(`Encounter with ${enemy.name} did not resolve in ${maxRounds} rounds`);
      }
      const action =
        rejections >= MAX_CONSECUTIVE_REJECTIONS
          ? FALLBACK_ACTION
          : chooseAction(session, lastRejection);
      const report = this.combatService.submitAction(session, action, rng);
      rounds.push(report);

      if (report.rejection) {
        lastRejection = report.rejection;
        rejections++;
      } else {
        lastRejection = null;
        rejections = 0;
      }
    }

    if (session.outcome === 'DEATH') {
      return { outcome: 'DEATH', rounds, openingEvents: events, rewardEvents: [] };
    }
    const victory = this.rewardsService.applyVictory(character, enemy, rng);
    return {
      outcome: 'VICTORY',
      rounds,
      openingEvents: events,
      rewards: victory.rewards,
      rewardEvents: victory.events,
    };
  }
}
