// Turn-counted buffs/debuffs attached to the character

import { Injectable } from '@nestjs/common';
import type { Event, StatusEffect, StatusKind } from '../../db/types/index.js';

const STATUS_LABELS: Record<StatusKind, string> = {
  DODGE: 'evasive stance',
  DEFENSE: 'guard',
  POISON: 'poisoned blade',
  TRAP: 'set trap',
};

export interface TickResult {
  effects: StatusEffect[];
  events: Event[];
}

@Injectable()
export class StatusService {
  /** Entries never merge: two dodge stances count twice until each runs out */
  add(
    effects: StatusEffect[],
    kind: StatusKind,
    turns: number,
    magnitude: number,
  ): StatusEffect[] {
    return [...effects, { kind, turns, magnitude }];
  }

  sumMagnitude(effects: StatusEffect[], kind: StatusKind): number {
    return effects
      .filter((e) => e.kind === kind)
      .reduce((sum, e) => sum + e.magnitude, 0);
  }

  find(effects: StatusEffect[], kind: StatusKind): StatusEffect | undefined {
    return effects.find((e) => e.kind === kind);
  }

  /** Drops the first entry of the kind, if any */
  removeFirst(effects: StatusEffect[], kind: StatusKind): StatusEffect[] {
    const idx = effects.findIndex((e) => e.kind === kind);
    if (idx < 0) return effects;
    return [...effects.slice(0, idx), ...effects.slice(idx + 1)];
  }

  /** End of round: every counter -1, entries at 0 are dropped */
  tick(effects: StatusEffect[], turnNo: number): TickResult {
    const remaining: StatusEffect[] = [];
    const events: Event[] = [];

    for (const effect of effects) {
      const turns = effect.turns - 1;
      if (turns <= 0) {
        events.push({
          id: `status_expired_${effect.kind}_${turnNo}_${events.length + 1}`,
          kind: 'STATUS',
          text: `The ${STATUS_LABELS[effect.kind]} wears off.`,
          tags: ['EXPIRED', effect.kind],
          data: { kind: effect.kind, magnitude: effect.magnitude },
        });
      } else {
        remaining.push({ ...effect, turns });
      }
    }

    return { effects: remaining, events };
  }
}
