import type {
  CharacterState,
  CombatOutcome,
  CombatSession,
  CombatSnapshot,
  EnemyState,
  PlayerActionType,
} from '../db/types/index.js';
import type { RngState } from '../engine/rng/rng.service.js';

/** What the client sees of an encounter; the rng state stays server-side */
export interface EncounterView {
  enemy: EnemyState;
  turnCount: number;
  playerActed: boolean;
  playerLastAction: PlayerActionType | null;
  outcome: CombatOutcome;
}

export function toSnapshot(session: CombatSession, rng: RngState): CombatSnapshot {
  return {
    enemy: session.enemy,
    turnCount: session.turnCount,
    playerActed: session.playerActed,
    playerLastAction: session.playerLastAction,
    active: session.active,
    outcome: session.outcome,
    rageAnnounced: session.rageAnnounced,
    rng: { seed: rng.seed, cursor: rng.cursor },
  };
}

export function fromSnapshot(character: CharacterState, snapshot: CombatSnapshot): CombatSession {
  return {
    character,
    enemy: snapshot.enemy,
    turnCount: snapshot.turnCount,
    playerActed: snapshot.playerActed,
    playerLastAction: snapshot.playerLastAction,
    active: snapshot.active,
    outcome: snapshot.outcome,
    rageAnnounced: snapshot.rageAnnounced,
  };
}

export function toEncounterView(s: CombatSession | CombatSnapshot): EncounterView {
  return {
    enemy: s.enemy,
    turnCount: s.turnCount,
    playerActed: s.playerActed,
    playerLastAction: s.playerLastAction,
    outcome: s.outcome,
  };
}
