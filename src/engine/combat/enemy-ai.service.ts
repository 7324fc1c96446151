import { Injectable } from '@nestjs/common';
import type { EnemyAction, EnemyState, PlayerActionType } from '../../db/types/index.js';
import { pickOne, type RandomSource } from '../rng/rng.service.js';

// attack weighted 2:1 over strong_attack
const RAGE_ACTIONS: readonly EnemyAction[] = ['STRONG_ATTACK', 'ATTACK', 'ATTACK'];

@Injectable()
export class EnemyAiService {
  /**
   * Policy, first match wins:
   * rage → counter the player's last stance → configured pool.
   * Only the rage and pool branches draw.
   */
  chooseAction(
    e: EnemyState,
    playerLastAction: PlayerActionType | null,
    rng: RandomSource,
  ): EnemyAction {
    if (e.rageMode) return pickOne(rng, RAGE_ACTIONS);
    if (playerLastAction === 'DEFEND') return 'STRONG_ATTACK';
    if (playerLastAction === 'DODGE') return 'FEINT';
    if (e.actionPool.length === 0) return 'ATTACK';
    return pickOne(rng, e.actionPool);
  }
}
