import { SaveCodec } from './save-codec.js';
import { InMemorySaveStore } from './in-memory-save-store.js';
import { InternalError } from '../common/errors/game-errors.js';
import { makeCharacter, makeEnemy, makeItem } from '../engine/testing/fixtures.js';
import type { CombatSnapshot } from '../db/types/index.js';

describe('SaveCodec', () => {
  const codec = new SaveCodec();

  it('keeps enhancement, durability, curses, effects and nightmares', () => {
    const blade = makeItem({
      instanceId: 'blade',
      name: 'Cursed Constabulary Sword',
      power: 37,
      enhancementLevel: 2,
      durability: 41,
      specialEffect: "Gnaws at the wearer's mind",
    });
    const vial = makeItem({
      instanceId: 'vial',
      category: 'SPECIAL',
      power: 0,
      use: { type: 'POISON', turns: 3, magnitude: 10 },
    });
    const c = makeCharacter({
      inventory: [blade, vial],
      equippedWeaponId: 'blade',
      cursed: true,
      nightmares: ['burning_village'],
      buffs: [{ kind: 'DODGE', turns: 1, magnitude: 30 }],
      debuffs: [{ kind: 'POISON', turns: 2, magnitude: 5 }],
      skills: [{ skillId: 'flash_cut', name: 'Flash Cut', damageMultiplier: 1.5, staminaCost: 20, focusCost: 10, description: '' }],
    });

    const decoded = codec.decodeCharacter(JSON.parse(JSON.stringify(c)));
    expect(decoded).toEqual(c);
  });

  it('round-trips an encounter snapshot', () => {
    const snapshot: CombatSnapshot = {
      enemy: makeEnemy({ health: 12, rageMode: true, attack: 30, stance: 'DEFENSIVE' }),
      turnCount: 4,
      playerActed: false,
      playerLastAction: 'DODGE',
      active: true,
      outcome: 'ONGOING',
      rageAnnounced: true,
      rng: { seed: 'seed-1', cursor: 17 },
    };
    expect(codec.encodeEncounter(snapshot)).toEqual(snapshot);
    expect(codec.decodeEncounter(null)).toBeNull();
  });

  it('a corrupt slot is an internal error naming the bad paths', () => {
    const raw = { ...makeCharacter(), job: 'EMPEROR', sanity: 140 };
    let caught: unknown;
    try {
      codec.decodeCharacter(raw);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InternalError);
    if (caught instanceof InternalError) {
      expect(caught.message).toBe('Corrupt character save');
      expect(caught.details).toEqual({ issues: ['job', 'sanity'] });
    }
  });
});

describe('InMemorySaveStore', () => {
  it('versions writes and hands out copies', async () => {
    const store = new InMemorySaveStore(new SaveCodec());
    const c = makeCharacter();
    const first = await store.upsert('u1', { character: c, encounter: null });
    expect(first.version).toBe(1);

    c.money = 999;
    const loaded = await store.find('u1');
    expect(loaded?.character.money).toBe(50);

    const second = await store.upsert('u1', { character: c, encounter: null });
    expect(second.version).toBe(2);
    expect(await store.delete('u1')).toBe(true);
    expect(await store.find('u1')).toBeNull();
    expect(await store.delete('u1')).toBe(false);
  });

  it('writes conditionally on the loaded version', async () => {
    const store = new InMemorySaveStore(new SaveCodec());
    const c = makeCharacter();
    await store.upsert('u1', { character: c, encounter: null });

    expect(await store.update('u1', { character: c, encounter: null }, 2)).toBeNull();
    const written = await store.update('u1', { character: { ...c, money: 70 }, encounter: null }, 1);
    expect(written?.version).toBe(2);
    expect(await store.update('u1', { character: c, encounter: null }, 1)).toBeNull();
    expect((await store.find('u1'))?.character.money).toBe(70);

    expect(await store.update('nobody', { character: c, encounter: null }, 1)).toBeNull();
  });

  it('deletes conditionally when given a version', async () => {
    const store = new InMemorySaveStore(new SaveCodec());
    await store.upsert('u1', { character: makeCharacter(), encounter: null });

    expect(await store.delete('u1', 3)).toBe(false);
    expect(store.size).toBe(1);
    expect(await store.delete('u1', 1)).toBe(true);
    expect(store.size).toBe(0);
  });
});
