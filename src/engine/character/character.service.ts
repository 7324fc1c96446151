import { Injectable } from '@nestjs/common';
import type {
  CharacterState,
  EquipSlot,
  ItemInstance,
  Rejection,
  SkillDefinition,
} from '../../db/types/index.js';
import {
  BASE_FLAT_DEFENSE,
  BASE_POOL,
  MAX_SANITY,
} from '../../db/types/index.js';
import type { OriginDefinition } from '../../content/content.types.js';
import { StatusService } from '../status/status.service.js';
import { ItemService } from '../items/item.service.js';

const DODGE_BASE = 10;
const DODGE_CAP = 75;

const REST_STAMINA = 30;
const REST_FOCUS = 20;
const REST_HEALTH = 10;

export interface RestResult {
  health: number;
  stamina: number;
  focus: number;
}

export type ItemUseResult =
  | { used: true; healed: number; item: ItemInstance }
  | { used: false; rejection: Rejection };

@Injectable()
export class CharacterService {
  constructor(
    private readonly statusService: StatusService,
    private readonly itemService: ItemService,
  ) {}

  /** New level-1 wanderer; starting kit is added by the caller */
  create(name: string, origin: OriginDefinition): CharacterState {
    return {
      name,
      origin: origin.origin,
      job: 'WANDERER',
      factionAffinity: { ...origin.factionAffinity },
      health: BASE_POOL,
      maxHealth: BASE_POOL,
      stamina: BASE_POOL + origin.maxStaminaBonus,
      maxStamina: BASE_POOL + origin.maxStaminaBonus,
      focus: BASE_POOL,
      maxFocus: BASE_POOL,
      defense: BASE_FLAT_DEFENSE,
      sanity: MAX_SANITY,
      baseAttack: origin.baseAttack,
      baseDefense: origin.baseDefense,
      money: origin.money,
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
    };
  }

  // --- resource pools ---

  /**
   * Flat reduction by the character's scalar defense. Health is clamped at 0
   * so the pool invariant holds; death is detected by the combat session.
   */
  takeDamage(c: CharacterState, amount: number): number {
    const effective = Math.max(0, amount - c.defense);
    c.health = Math.max(0, c.health - effective);
    return effective;
  }

  heal(c: CharacterState, amount: number): number {
    const before = c.health;
    c.health = Math.min(c.maxHealth, c.health + amount);
    return c.health - before;
  }

  /** The only gate for stamina-costing actions: no partial spend */
  useStamina(c: CharacterState, amount: number): boolean {
    if (c.stamina < amount) return false;
    c.stamina -= amount;
    return true;
  }

  useFocus(c: CharacterState, amount: number): boolean {
    if (c.focus < amount) return false;
    c.focus -= amount;
    return true;
  }

  /** Unconditional drain, floored at 0 */
  drainStamina(c: CharacterState, amount: number): number {
    const before = c.stamina;
    c.stamina = Math.max(0, c.stamina - amount);
    return before - c.stamina;
  }

  drainFocus(c: CharacterState, amount: number): number {
    const before = c.focus;
    c.focus = Math.max(0, c.focus - amount);
    return before - c.focus;
  }

  adjustSanity(c: CharacterState, delta: number): number {
    const before = c.sanity;
    c.sanity = Math.max(0, Math.min(MAX_SANITY, c.sanity + delta));
    return c.sanity - before;
  }

  rest(c: CharacterState): RestResult {
    const before = { health: c.health, stamina: c.stamina, focus: c.focus };
    c.stamina = Math.min(c.maxStamina, c.stamina + REST_STAMINA);
    c.focus = Math.min(c.maxFocus, c.focus + REST_FOCUS);
    c.health = Math.min(c.maxHealth, c.health + REST_HEALTH);
    return {
      health: c.health - before.health,
      stamina: c.stamina - before.stamina,
      focus: c.focus - before.focus,
    };
  }

  isAlive(c: CharacterState): boolean {
    return c.health > 0;
  }

  // --- inventory / equipment ---

  addItem(c: CharacterState, item: ItemInstance): void {
    c.inventory.push(item);
  }

  findItem(c: CharacterState, instanceId: string): ItemInstance | undefined {
    return c.inventory.find((i) => i.instanceId === instanceId);
  }

  /** Removes from inventory and from whichever slot referenced it */
  removeItem(c: CharacterState, instanceId: string): ItemInstance | undefined {
    const idx = c.inventory.findIndex((i) => i.instanceId === instanceId);
    if (idx < 0) return undefined;
    const [removed] = c.inventory.splice(idx, 1);
    if (c.equippedWeaponId === instanceId) c.equippedWeaponId = null;
    if (c.equippedArmorId === instanceId) c.equippedArmorId = null;
    return removed;
  }

  equipWeapon(c: CharacterState, instanceId: string): boolean {
    const item = this.findItem(c, instanceId);
    if (!item || item.category !== 'WEAPON' || this.itemService.isBroken(item)) {
      return false;
    }
    c.equippedWeaponId = item.instanceId;
    return true;
  }

  equipArmor(c: CharacterState, instanceId: string): boolean {
    const item = this.findItem(c, instanceId);
    if (!item || item.category !== 'ARMOR' || this.itemService.isBroken(item)) {
      return false;
    }
    c.equippedArmorId = item.instanceId;
    return true;
  }

  /** Routes to the slot matching the item's category */
  equip(c: CharacterState, instanceId: string): EquipSlot | null {
    const item = this.findItem(c, instanceId);
    if (!item) return null;
    const slot = this.itemService.slotOf(item);
    if (slot === 'WEAPON') return this.equipWeapon(c, instanceId) ? slot : null;
    if (slot === 'ARMOR') return this.equipArmor(c, instanceId) ? slot : null;
    return null;
  }

  unequip(c: CharacterState, slot: EquipSlot): ItemInstance | null {
    const item = slot === 'WEAPON' ? this.equippedWeapon(c) : this.equippedArmor(c);
    if (slot === 'WEAPON') c.equippedWeaponId = null;
    else c.equippedArmorId = null;
    return item;
  }

  equippedWeapon(c: CharacterState): ItemInstance | null {
    if (!c.equippedWeaponId) return null;
    return this.findItem(c, c.equippedWeaponId) ?? null;
  }

  equippedArmor(c: CharacterState): ItemInstance | null {
    if (!c.equippedArmorId) return null;
    return this.findItem(c, c.equippedArmorId) ?? null;
  }

  // --- skills ---

  /** Set semantics by skillId */
  learnSkill(c: CharacterState, skill: SkillDefinition): boolean {
    if (c.skills.some((s) => s.skillId === skill.skillId)) return false;
    c.skills.push({ ...skill });
    return true;
  }

  findSkill(c: CharacterState, skillId: string): SkillDefinition | undefined {
    return c.skills.find((s) => s.skillId === skillId);
  }

  // --- derived stats ---

  totalAttack(c: CharacterState): number {
    const weapon = this.equippedWeapon(c);
    const weaponPower = weapon && !this.itemService.isBroken(weapon) ? weapon.power : 0;
    return c.baseAttack + weaponPower;
  }

  totalDefense(c: CharacterState): number {
    const armor = this.equippedArmor(c);
    const armorDefense = armor && !this.itemService.isBroken(armor) ? armor.defense : 0;
    return (
      c.baseDefense +
      armorDefense +
      this.statusService.sumMagnitude(c.buffs, 'DEFENSE')
    );
  }

  dodgeChance(c: CharacterState): number {
    const chance =
      DODGE_BASE +
      Math.floor(c.focus / 20) +
      this.statusService.sumMagnitude(c.buffs, 'DODGE');
    return Math.min(chance, DODGE_CAP);
  }

  // --- consumables outside combat ---

  useItemOutsideCombat(c: CharacterState, instanceId: string): ItemUseResult {
    const item = this.findItem(c, instanceId);
    if (!item) {
      return { used: false, rejection: { code: 'INVALID_ACTION', message: 'You do not carry that item.' } };
    }
    if (item.category !== 'SPECIAL' || item.use?.type !== 'HEAL') {
      return { used: false, rejection: { code: 'INVALID_ACTION', message: `${item.name} cannot be used here.` } };
    }
    const healed = this.heal(c, item.use.amount);
    this.removeItem(c, instanceId);
    return { used: true, healed, item };
  }
}
