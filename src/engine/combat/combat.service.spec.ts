import { RoundLog } from './combat.service.js';
import { ScriptedRng } from '../rng/scripted-rng.js';
import { makeCharacter, makeEnemy, makeEngine, makeItem, type EngineServices } from '../testing/fixtures.js';
import type { CharacterState, CombatSession, EnemyState, RoundReport } from '../../db/types/index.js';

const flashCut = {
  skillId: 'flash_cut',
  name: 'Flash Cut',
  damageMultiplier: 1.5,
  staminaCost: 20,
  focusCost: 10,
  description: 'A quick slash.',
};

function tagged(report: RoundReport, tag: string) {
  return report.events.filter((e) => e.tags.includes(tag));
}

describe('CombatService', () => {
  let engine: EngineServices;

  beforeEach(() => {
    engine = makeEngine();
  });

  function start(c: CharacterState, e: EnemyState): CombatSession {
    return engine.combat.open(c, e, {}, new ScriptedRng([])).session;
  }

  describe('open', () => {
    it('starts an active session with a start event and no draws', () => {
      const { session, events } = engine.combat.open(makeCharacter(), makeEnemy(), {}, new ScriptedRng([]));
      expect(session.active).toBe(true);
      expect(session.outcome).toBe('ONGOING');
      expect(session.turnCount).toBe(0);
      expect(events).toHaveLength(1);
      expect(events[0].tags).toEqual(['START']);
    });

    it('a mercenary cuts enemy health to 80%', () => {
      const e = makeEnemy({ health: 75, maxHealth: 75 });
      engine.combat.open(makeCharacter(), e, { mercenary: true }, new ScriptedRng([]));
      expect(e.health).toBe(60);
      expect(e.maxHealth).toBe(75);
    });

    it('a trap springs at or under its magnitude and is consumed', () => {
      const c = makeCharacter({ buffs: [{ kind: 'TRAP', turns: 5, magnitude: 30 }] });
      const e = makeEnemy();
      const { events } = engine.combat.open(c, e, { mercenary: true }, new ScriptedRng([30]));
      // 100 → 80 (mercenary) → 50 (trap ignores defense)
      expect(e.health).toBe(50);
      expect(c.buffs).toEqual([]);
      expect(events.map((ev) => ev.tags[0])).toEqual(['START', 'MERCENARY', 'TRAP']);
    });

    it('a trap that misses stays set', () => {
      const c = makeCharacter({ buffs: [{ kind: 'TRAP', turns: 5, magnitude: 30 }] });
      const e = makeEnemy();
      engine.combat.open(c, e, {}, new ScriptedRng([31]));
      expect(e.health).toBe(100);
      expect(c.buffs).toHaveLength(1);
    });

    it('a trap can finish a weak enemy before the first round', () => {
      const c = makeCharacter({ buffs: [{ kind: 'TRAP', turns: 5, magnitude: 100 }] });
      const e = makeEnemy({ health: 20 });
      const { session } = engine.combat.open(c, e, {}, new ScriptedRng([77]));
      expect(e.health).toBe(0);
      expect(session.outcome).toBe('VICTORY');
      expect(session.active).toBe(false);
    });
  });

  describe('attack', () => {
    it('100 total attack vs 10 defense: forced hit at +0 deals 90 and wins', () => {
      const c = makeCharacter({ baseAttack: 100 });
      const e = makeEnemy({ defense: 10, health: 40, maxHealth: 40 });
      const session = start(c, e);
      const rng = new ScriptedRng([1, 0]);

      const report = engine.combat.submitAction(session, { type: 'ATTACK' }, rng);

      expect(report.playerDamageDealt).toBe(90);
      expect(report.outcome).toBe('VICTORY');
      expect(report.enemyAction).toBeNull();
      expect(report.turnCount).toBe(1);
      expect(e.health).toBe(0);
      expect(session.active).toBe(false);
      expect(rng.remaining).toBe(0);
      expect(tagged(report, 'VICTORY')).toHaveLength(1);
    });

    it('pays 10 stamina before the hit roll', () => {
      const c = makeCharacter();
      const session = start(c, makeEnemy());
      // chance 80 with stamina 90; miss, then enemy: no dodge, pick, +0
      const rng = new ScriptedRng([81, 100, 0, 0]);
      const report = engine.combat.submitAction(session, { type: 'ATTACK' }, rng);
      expect(c.stamina).toBe(90);
      expect(report.playerDamageDealt).toBe(0);
      expect(tagged(report, 'MISS')).toHaveLength(1);
      expect(rng.draws[0]).toEqual({ min: 1, max: 100, value: 81 });
    });

    it('is rejected without stamina and leaves the round open', () => {
      const c = makeCharacter({ stamina: 9 });
      const session = start(c, makeEnemy());
      const report = engine.combat.submitAction(session, { type: 'ATTACK' }, new ScriptedRng([]));

      expect(report.rejection).toEqual({ code: 'INSUFFICIENT_RESOURCE', message: 'Not enough stamina.' });
      expect(report.events).toEqual([]);
      expect(report.turnCount).toBe(0);
      expect(c.stamina).toBe(9);
      expect(session.playerActed).toBe(false);

      // the same round still accepts another action
      const next = engine.combat.submitAction(session, { type: 'DEFEND' }, new ScriptedRng([100, 0]));
      expect(next.rejection).toBeUndefined();
      expect(next.turnCount).toBe(1);
      expect(c.stamina).toBe(4);
    });

    it('wears the weapon on a hit and unequips it when it breaks', () => {
      const sword = makeItem({ instanceId: 'sword', power: 10, durability: 1 });
      const c = makeCharacter({ inventory: [sword], equippedWeaponId: 'sword' });
      const e = makeEnemy();
      const session = start(c, e);
      // hit, +0 → 30 − 5; enemy: no dodge, pick, +0 → 20 − 10
      const report = engine.combat.submitAction(session, { type: 'ATTACK' }, new ScriptedRng([1, 0, 100, 0, 0]));

      expect(report.playerDamageDealt).toBe(25);
      expect(e.health).toBe(75);
      expect(sword.durability).toBe(0);
      expect(c.equippedWeaponId).toBeNull();
      expect(c.inventory).toEqual([sword]);
      const broken = tagged(report, 'BROKEN');
      expect(broken).toHaveLength(1);
      expect(broken[0].kind).toBe('EQUIPMENT');
      expect(broken[0].tags).toEqual(['BROKEN', 'WEAPON']);
    });

    it('does not wear the weapon on a miss', () => {
      const sword = makeItem({ instanceId: 'sword', durability: 50 });
      const c = makeCharacter({ inventory: [sword], equippedWeaponId: 'sword' });
      const session = start(c, makeEnemy());
      engine.combat.submitAction(session, { type: 'ATTACK' }, new ScriptedRng([100, 100, 0, 0]));
      expect(sword.durability).toBe(50);
    });
  });

  describe('dodge', () => {
    it('adds a two-round dodge buff and draws a feint', () => {
      const c = makeCharacter();
      const session = start(c, makeEnemy());
      // dodge chance 10 + 5 + 30 = 45; 46 fails; FEINT draws nothing
      const rng = new ScriptedRng([46]);
      const report = engine.combat.submitAction(session, { type: 'DODGE' }, rng);

      expect(c.stamina).toBe(85);
      expect(report.enemyAction).toBe('FEINT');
      expect(report.playerDamageTaken).toBe(0);
      expect(c.focus).toBe(85);
      expect(c.buffs).toEqual([{ kind: 'DODGE', turns: 1, magnitude: 30 }]);
      expect(rng.remaining).toBe(0);
    });
  });

  describe('defend', () => {
    it('strong attack: floor(20 × 1.5) − 5 = 25', () => {
      const c = makeCharacter({ defense: 5 });
      const session = start(c, makeEnemy());
      const rng = new ScriptedRng([100, 0]);
      const report = engine.combat.submitAction(session, { type: 'DEFEND' }, rng);

      expect(report.enemyAction).toBe('STRONG_ATTACK');
      expect(report.playerDamageTaken).toBe(25);
      expect(c.health).toBe(75);
      expect(c.stamina).toBe(95);
      // one-round guard expires at the end of the round
      expect(c.buffs).toEqual([]);
      expect(tagged(report, 'EXPIRED')).toHaveLength(1);
      expect(rng.remaining).toBe(0);
    });

    it('never rejects: stamina floors at 0', () => {
      const c = makeCharacter({ stamina: 3 });
      const session = start(c, makeEnemy());
      const report = engine.combat.submitAction(session, { type: 'DEFEND' }, new ScriptedRng([100, 0]));
      expect(report.rejection).toBeUndefined();
      expect(c.stamina).toBe(0);
      expect(c.health).toBe(80);
    });
  });

  describe('ambush', () => {
    it('checks stamina and focus before paying either', () => {
      const c = makeCharacter({ stamina: 30, focus: 10 });
      const session = start(c, makeEnemy());
      const report = engine.combat.submitAction(session, { type: 'AMBUSH' }, new ScriptedRng([]));
      expect(report.rejection).toEqual({ code: 'INSUFFICIENT_RESOURCE', message: 'Not enough stamina or focus.' });
      expect(c.stamina).toBe(30);
      expect(c.focus).toBe(10);
    });

    it('on success doubles total attack', () => {
      const c = makeCharacter();
      const e = makeEnemy();
      const session = start(c, e);
      // level 1 → 52%; 20 × 2 − 5 = 35; enemy: no dodge, pick, +0
      const report = engine.combat.submitAction(session, { type: 'AMBUSH' }, new ScriptedRng([52, 100, 0, 0]));
      expect(report.playerDamageDealt).toBe(35);
      expect(e.health).toBe(65);
      expect(c.stamina).toBe(80);
      expect(c.focus).toBe(80);
      expect(report.enemyAction).toBe('ATTACK');
      expect(report.playerDamageTaken).toBe(10);
    });

    it('on failure deals nothing and costs the same', () => {
      const c = makeCharacter();
      const e = makeEnemy();
      const session = start(c, e);
      const report = engine.combat.submitAction(session, { type: 'AMBUSH' }, new ScriptedRng([53, 100, 0, 0]));
      expect(report.playerDamageDealt).toBe(0);
      expect(e.health).toBe(100);
      expect(c.stamina).toBe(80);
      expect(tagged(report, 'AMBUSH')).toHaveLength(1);
    });
  });

  describe('skill', () => {
    it('deals floor(total × multiplier) and pays both costs', () => {
      const c = makeCharacter({ skills: [flashCut] });
      const e = makeEnemy();
      const session = start(c, e);
      // 20 × 1.5 − 5 = 25
      const report = engine.combat.submitAction(
        session,
        { type: 'SKILL', skillId: 'flash_cut' },
        new ScriptedRng([100, 0, 0]),
      );
      expect(report.playerDamageDealt).toBe(25);
      expect(c.stamina).toBe(80);
      expect(c.focus).toBe(90);
      expect(report.events[0].data).toMatchObject({ source: 'skill', skillId: 'flash_cut' });
    });

    it('rejects an unlearned technique', () => {
      const session = start(makeCharacter(), makeEnemy());
      const report = engine.combat.submitAction(session, { type: 'SKILL', skillId: 'flash_cut' }, new ScriptedRng([]));
      expect(report.rejection).toEqual({ code: 'INVALID_ACTION', message: 'You have not learned that technique.' });
    });

    it('rejects when either cost is short, paying nothing', () => {
      const c = makeCharacter({ skills: [flashCut], stamina: 10 });
      const session = start(c, makeEnemy());
      const report = engine.combat.submitAction(session, { type: 'SKILL', skillId: 'flash_cut' }, new ScriptedRng([]));
      expect(report.rejection).toEqual({
        code: 'INSUFFICIENT_RESOURCE',
        message: 'Not enough stamina or focus for Flash Cut.',
      });
      expect(c.focus).toBe(100);
    });
  });

  describe('items', () => {
    it('a heal item restores health and is consumed', () => {
      const tonic = makeItem({
        instanceId: 'tonic',
        itemId: 'healing_tonic',
        name: 'Healing Tonic',
        category: 'SPECIAL',
        power: 0,
        use: { type: 'HEAL', amount: 50 },
      });
      const c = makeCharacter({ health: 40, inventory: [tonic] });
      const session = start(c, makeEnemy());
      // enemy turn dodged: 1 ≤ 15
      const report = engine.combat.submitAction(session, { type: 'ITEM', instanceId: 'tonic' }, new ScriptedRng([1]));
      expect(c.health).toBe(90);
      expect(c.inventory).toEqual([]);
      expect(report.enemyMissed).toBe(true);
      expect(report.enemyAction).toBeNull();
    });

    it('poison needs an equipped weapon', () => {
      const vial = makeItem({
        instanceId: 'vial',
        name: 'Poison Vial',
        category: 'SPECIAL',
        use: { type: 'POISON', turns: 3, magnitude: 10 },
      });
      const c = makeCharacter({ inventory: [vial] });
      const session = start(c, makeEnemy());
      const report = engine.combat.submitAction(session, { type: 'ITEM', instanceId: 'vial' }, new ScriptedRng([]));
      expect(report.rejection).toEqual({ code: 'INVALID_ACTION', message: 'You have no blade to coat.' });
      expect(c.inventory).toHaveLength(1);
    });

    it('poison on a weapon adds a three-round buff', () => {
      const vial = makeItem({
        instanceId: 'vial',
        name: 'Poison Vial',
        category: 'SPECIAL',
        use: { type: 'POISON', turns: 3, magnitude: 10 },
      });
      const sword = makeItem({ instanceId: 'sword' });
      const c = makeCharacter({ inventory: [vial, sword], equippedWeaponId: 'sword' });
      const session = start(c, makeEnemy());
      engine.combat.submitAction(session, { type: 'ITEM', instanceId: 'vial' }, new ScriptedRng([1]));
      expect(c.buffs).toEqual([{ kind: 'POISON', turns: 2, magnitude: 10 }]);
      expect(c.inventory).toEqual([sword]);
    });

    it('gear cannot be used as an item', () => {
      const c = makeCharacter({ inventory: [makeItem()] });
      const session = start(c, makeEnemy());
      const report = engine.combat.submitAction(session, { type: 'ITEM', instanceId: 'item-1' }, new ScriptedRng([]));
      expect(report.rejection).toEqual({ code: 'INVALID_ACTION', message: 'Rusty Sword cannot be used in combat.' });
    });
  });

  describe('enemy turn', () => {
    it('a dodge skips the enemy action entirely', () => {
      const c = makeCharacter();
      const session = start(c, makeEnemy());
      const rng = new ScriptedRng([15]);
      const report = engine.combat.submitAction(session, { type: 'DEFEND' }, rng);
      expect(report.enemyMissed).toBe(true);
      expect(report.playerDamageTaken).toBe(0);
      expect(c.health).toBe(100);
      expect(rng.remaining).toBe(0);
    });

    it('armor wears on a damaging hit and breaks at 0', () => {
      const armor = makeItem({ instanceId: 'armor', category: 'ARMOR', power: 0, defense: 15, durability: 1 });
      const c = makeCharacter({ inventory: [armor], equippedArmorId: 'armor' });
      const session = start(c, makeEnemy());
      const report = engine.combat.submitAction(session, { type: 'ATTACK' }, new ScriptedRng([100, 100, 0, 0]));
      expect(report.playerDamageTaken).toBe(10);
      expect(armor.durability).toBe(0);
      expect(c.equippedArmorId).toBeNull();
      expect(c.inventory).toEqual([armor]);
      expect(tagged(report, 'ARMOR')).toHaveLength(1);
    });

    it('armor does not wear when the hit is fully absorbed', () => {
      const armor = makeItem({ instanceId: 'armor', category: 'ARMOR', power: 0, defense: 15, durability: 5 });
      const c = makeCharacter({ defense: 30, inventory: [armor], equippedArmorId: 'armor' });
      const session = start(c, makeEnemy());
      const report = engine.combat.submitAction(session, { type: 'ATTACK' }, new ScriptedRng([100, 100, 0, 0]));
      expect(report.playerDamageTaken).toBe(0);
      expect(armor.durability).toBe(5);
    });

    it('enemy defend raises its defense and sets a defensive stance', () => {
      const e = makeEnemy({ actionPool: ['DEFEND'] });
      const session = start(makeCharacter(), e);
      engine.combat.submitAction(session, { type: 'ATTACK' }, new ScriptedRng([100, 100, 0]));
      expect(e.defense).toBe(10);
      expect(e.stance).toBe('DEFENSIVE');
    });

    it('a taunt costs 5 sanity', () => {
      const c = makeCharacter({ sanity: 3 });
      const session = start(c, makeEnemy({ actionPool: ['TAUNT'] }));
      engine.combat.submitAction(session, { type: 'ATTACK' }, new ScriptedRng([100, 100, 0]));
      expect(c.sanity).toBe(0);
    });

    it('rage is announced once per encounter', () => {
      const c = makeCharacter({ baseAttack: 80 });
      const e = makeEnemy();
      const session = start(c, e);
      // 80 − 5 = 75 → 25 left, rage; enemy picks ATTACK: trunc(30 × 1.3) − 10 = 29
      const first = engine.combat.submitAction(session, { type: 'ATTACK' }, new ScriptedRng([1, 0, 100, 1, 0]));
      const second = engine.combat.submitAction(session, { type: 'ATTACK' }, new ScriptedRng([100, 100, 1, 0]));
      expect(tagged(first, 'RAGE')).toHaveLength(1);
      expect(tagged(second, 'RAGE')).toHaveLength(0);
      expect(first.playerDamageTaken).toBe(29);
      expect(second.playerDamageTaken).toBe(29);
      expect(session.rageAnnounced).toBe(true);
    });

    it('death ends the encounter', () => {
      const c = makeCharacter({ health: 5 });
      const session = start(c, makeEnemy());
      const report = engine.combat.submitAction(session, { type: 'ATTACK' }, new ScriptedRng([100, 100, 0, 0]));
      expect(c.health).toBe(0);
      expect(report.outcome).toBe('DEATH');
      expect(session.active).toBe(false);
      expect(tagged(report, 'DEATH')).toHaveLength(1);
    });
  });

  describe('terminal and turn guards', () => {
    it('rejects every action after the fight is over', () => {
      const c = makeCharacter({ baseAttack: 100 });
      const session = start(c, makeEnemy({ health: 10 }));
      engine.combat.submitAction(session, { type: 'ATTACK' }, new ScriptedRng([1, 0]));
      const stamina = c.stamina;

      const report = engine.combat.submitAction(session, { type: 'DODGE' }, new ScriptedRng([]));
      expect(report.rejection).toEqual({ code: 'INVALID_ACTION', message: 'The fight is already over.' });
      expect(report.outcome).toBe('VICTORY');
      expect(report.turnCount).toBe(1);
      expect(c.stamina).toBe(stamina);
    });

    it('rejects a second action in the same round', () => {
      const session = start(makeCharacter(), makeEnemy());
      session.playerActed = true;
      const report = engine.combat.submitAction(session, { type: 'ATTACK' }, new ScriptedRng([]));
      expect(report.rejection).toEqual({ code: 'INVALID_ACTION', message: 'You have already acted this round.' });
    });

    it('event ids are unique within a round', () => {
      const c = makeCharacter({ defense: 5, buffs: [{ kind: 'DODGE', turns: 1, magnitude: 0 }] });
      const session = start(c, makeEnemy());
      const report = engine.combat.submitAction(session, { type: 'DEFEND' }, new ScriptedRng([100, 0]));
      const ids = report.events.map((e) => e.id);
      expect(new Set(ids).size).toBe(ids.length);
      expect(ids.length).toBeGreaterThanOrEqual(3);
    });
  });

  describe('endRound', () => {
    it('advances the counter, resets the acted flag and ticks effects', () => {
      const c = makeCharacter({
        buffs: [
          { kind: 'DODGE', turns: 2, magnitude: 30 },
          { kind: 'DEFENSE', turns: 1, magnitude: 15 },
        ],
        debuffs: [{ kind: 'POISON', turns: 1, magnitude: 5 }],
      });
      const session = start(c, makeEnemy());
      session.playerActed = true;
      const log = new RoundLog(1);

      engine.combat.endRound(session, log);

      expect(session.turnCount).toBe(1);
      expect(session.playerActed).toBe(false);
      expect(c.buffs).toEqual([{ kind: 'DODGE', turns: 1, magnitude: 30 }]);
      expect(c.debuffs).toEqual([]);
      expect(log.events.map((e) => e.tags)).toEqual([
        ['EXPIRED', 'DEFENSE'],
        ['EXPIRED', 'POISON'],
      ]);
    });
  });
});
