import type { RngState, SeededRandom } from './rng.service.js';

/**
 * Replays a fixed list of draws. Used by specs to pin every roll an engine
 * call makes; running out or drawing outside [min, max] throws.
 */
export class ScriptedRng implements SeededRandom {
  private readonly queue: number[];
  private _draws: Array<{ min: number; max: number; value: number }> = [];

  constructor(values: number[]) {
    this.queue = [...values];
  }

  range(min: number, max: number): number {
    const value = this.queue.shift();
    if (value === undefined) {
      throw new Error(`ScriptedRng exhausted (range ${min}~${max})`);
    }
    if (value < min || value > max) {
      throw new Error(`ScriptedRng value ${value} outside ${min}~${max}`);
    }
    this._draws.push({ min, max, value });
    return value;
  }

  /** Cursor counts the draws made so far */
  getState(): RngState {
    return { seed: 'scripted', cursor: this._draws.length };
  }

  get remaining(): number {
    return this.queue.length;
  }

  get draws(): ReadonlyArray<{ min: number; max: number; value: number }> {
    return this._draws;
  }
}
