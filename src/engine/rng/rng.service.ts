// splitmix64 deterministic RNG; seed + cursor are persisted with an open encounter

import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';

export interface RngState {
  seed: string;
  cursor: number;
}

/** Everything the engine draws from. Implementations must be inclusive on both ends. */
export interface RandomSource {
  range(min: number, max: number): number;
}

/** A source whose position can be persisted and resumed */
export interface SeededRandom extends RandomSource {
  getState(): RngState;
}

export function pickOne<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('pickOne: empty list');
  }
  return items[rng.range(0, items.length - 1)];
}

export class Rng implements SeededRandom {
  private state: bigint;
  private _cursor: number;

  constructor(
    private readonly seed: string,
    cursor: number = 0,
  ) {
    this.state = this.hashSeed(seed);
    this._cursor = cursor;
    // fast-forward to the cursor
    for (let i = 0; i < cursor; i++) {
      this.advanceState();
    }
  }

  private hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & 0xFFFFFFFFFFFFFFFFn;
    }
    return h === 0n ? 1n : h;
  }

  private advanceState(): void {
    this.state = (this.state + 0x9E3779B97F4A7C15n) & 0xFFFFFFFFFFFFFFFFn;
  }

  private nextRaw(): bigint {
    this._cursor++;
    this.advanceState();
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xBF58476D1CE4E5B9n) & 0xFFFFFFFFFFFFFFFFn;
    z = ((z ^ (z >> 27n)) * 0x94D049BB133111EBn) & 0xFFFFFFFFFFFFFFFFn;
    return (z ^ (z >> 31n)) & 0xFFFFFFFFFFFFFFFFn;
  }

  /** [0, 1) */
  next(): number {
    return Math.min(
      Number(this.nextRaw()) / Number(0xFFFFFFFFFFFFFFFFn),
      0.9999999999999999,
    );
  }

  /** min~max integer (inclusive) */
  range(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  getState(): RngState {
    return { seed: this.seed, cursor: this._cursor };
  }
}

@Injectable()
export class RngService {
  create(seed: string, cursor: number = 0): SeededRandom {
    return new Rng(seed, cursor);
  }

  newSeed(): string {
    return randomUUID();
  }
}
