// Hand-built states for engine specs; every stat is explicit so expected numbers can be traced

import type { CharacterState, EnemyState, ItemInstance } from '../../db/types/index.js';
import { CharacterService } from '../character/character.service.js';
import { EnemyService } from '../enemy/enemy.service.js';
import { ItemService } from '../items/item.service.js';
import { StatusService } from '../status/status.service.js';
import { HitService } from '../combat/hit.service.js';
import { DamageService } from '../combat/damage.service.js';
import { EnemyAiService } from '../combat/enemy-ai.service.js';
import { CombatService } from '../combat/combat.service.js';

export function makeCharacter(overrides: Partial<CharacterState> = {}): CharacterState {
  return {
    name: 'Test',
    origin: 'BANDIT_OUTCAST',
    job: 'WANDERER',
    factionAffinity: { PALACE: 10, CULT: 40, SHADOW_GUILD: 70, PEOPLE_ALLIANCE: 50, FOREIGNER_UNION: 60 },
    health: 100,
    maxHealth: 100,
    stamina: 100,
    maxStamina: 100,
    focus: 100,
    maxFocus: 100,
    defense: 10,
    sanity: 100,
    baseAttack: 20,
    baseDefense: 10,
    money: 50,
    experience: 0,
    level: 1,
    inventory: [],
    equippedWeaponId: null,
    equippedArmorId: null,
    skills: [],
    cursed: false,
    nightmares: [],
    buffs: [],
    debuffs: [],
    ...overrides,
  };
}

export function makeEnemy(overrides: Partial<EnemyState> = {}): EnemyState {
  return {
    enemyId: 'bandit',
    name: 'Bandit',
    maxHealth: 100,
    health: 100,
    attack: 20,
    defense: 5,
    experienceReward: 30,
    loot: [],
    actionPool: ['ATTACK'],
    rageMode: false,
    stance: 'NORMAL',
    ...overrides,
  };
}

export function makeItem(overrides: Partial<ItemInstance> = {}): ItemInstance {
  return {
    instanceId: 'item-1',
    itemId: 'rusty_sword',
    name: 'Rusty Sword',
    category: 'WEAPON',
    description: 'An old blade.',
    power: 10,
    defense: 0,
    specialEffect: '',
    enhancementLevel: 0,
    durability: 100,
    ...overrides,
  };
}

export interface EngineServices {
  status: StatusService;
  items: ItemService;
  characters: CharacterService;
  enemies: EnemyService;
  combat: CombatService;
}

export function makeEngine(): EngineServices {
  const status = new StatusService();
  const items = new ItemService();
  const characters = new CharacterService(status, items);
  const enemies = new EnemyService();
  const combat = new CombatService(
    characters,
    enemies,
    items,
    status,
    new HitService(characters),
    new DamageService(),
    new EnemyAiService(),
  );
  return { status, items, characters, enemies, combat };
}
