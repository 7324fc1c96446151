import { EnemyAiService } from './enemy-ai.service.js';
import { ScriptedRng } from '../rng/scripted-rng.js';
import type { EnemyState } from '../../db/types/index.js';

function makeEnemy(overrides: Partial<EnemyState> = {}): EnemyState {
  return {
    enemyId: 'mad_monk',
    name: 'Mad Monk',
    maxHealth: 80,
    health: 80,
    attack: 18,
    defense: 12,
    experienceReward: 45,
    loot: [],
    actionPool: ['ATTACK', 'TAUNT', 'DEFEND'],
    rageMode: false,
    stance: 'NORMAL',
    ...overrides,
  };
}

describe('EnemyAiService', () => {
  let ai: EnemyAiService;

  beforeEach(() => {
    ai = new EnemyAiService();
  });

  describe('rage', () => {
    it('picks from [STRONG_ATTACK, ATTACK, ATTACK]', () => {
      const e = makeEnemy({ rageMode: true });
      expect(ai.chooseAction(e, null, new ScriptedRng([0]))).toBe('STRONG_ATTACK');
      expect(ai.chooseAction(e, null, new ScriptedRng([1]))).toBe('ATTACK');
      expect(ai.chooseAction(e, null, new ScriptedRng([2]))).toBe('ATTACK');
    });

    it('overrides the counter to defend/dodge', () => {
      const e = makeEnemy({ rageMode: true });
      expect(ai.chooseAction(e, 'DEFEND', new ScriptedRng([1]))).toBe('ATTACK');
      expect(ai.chooseAction(e, 'DODGE', new ScriptedRng([0]))).toBe('STRONG_ATTACK');
    });
  });

  it('a defending player draws a strong attack without a roll', () => {
    const rng = new ScriptedRng([]);
    expect(ai.chooseAction(makeEnemy(), 'DEFEND', rng)).toBe('STRONG_ATTACK');
    expect(rng.draws).toHaveLength(0);
  });

  it('a dodging player draws a feint without a roll', () => {
    const rng = new ScriptedRng([]);
    expect(ai.chooseAction(makeEnemy(), 'DODGE', rng)).toBe('FEINT');
    expect(rng.draws).toHaveLength(0);
  });

  it('otherwise picks uniformly from the pool', () => {
    const e = makeEnemy();
    const rng = new ScriptedRng([2]);
    expect(ai.chooseAction(e, 'ATTACK', rng)).toBe('DEFEND');
    expect(rng.draws).toEqual([{ min: 0, max: 2, value: 2 }]);
    expect(ai.chooseAction(e, null, new ScriptedRng([1]))).toBe('TAUNT');
  });

  it('an empty pool falls back to ATTACK', () => {
    const rng = new ScriptedRng([]);
    expect(ai.chooseAction(makeEnemy({ actionPool: [] }), 'AMBUSH', rng)).toBe('ATTACK');
    expect(rng.draws).toHaveLength(0);
  });
});
