import type { CharacterState, CombatSnapshot } from '../db/types/index.js';
import { ConflictError } from '../common/errors/game-errors.js';

export const SAVE_STORE = Symbol('SAVE_STORE');

export interface SaveSlot {
  userId: string;
  /** Bumped on every write */
  version: number;
  character: CharacterState;
  encounter: CombatSnapshot | null;
  updatedAt: Date;
}

export interface SaveData {
  character: CharacterState;
  encounter: CombatSnapshot | null;
}

export interface SaveStore {
  find(userId: string): Promise<SaveSlot | null>;
  /** Unconditional write; only a new game uses it */
  upsert(userId: string, data: SaveData): Promise<SaveSlot>;
  /** Writes only while the slot is still at expectedVersion; null when it moved on */
  update(userId: string, data: SaveData, expectedVersion: number): Promise<SaveSlot | null>;
  /** Returns false when there was nothing to delete or the version moved on */
  delete(userId: string, expectedVersion?: number): Promise<boolean>;
}

/** A conditional write lost to another request on the same slot */
export function staleSaveError(expectedVersion: number): ConflictError {
  return new ConflictError('The save changed while this request ran. Reload and retry.', {
    expectedVersion,
  });
}
