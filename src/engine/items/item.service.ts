import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { EquipSlot, ItemDefinition, ItemInstance } from '../../db/types/index.js';

export const MAX_DURABILITY = 100;

@Injectable()
export class ItemService {
  /** Fresh owned copy of a catalog template: +0, full durability */
  createInstance(def: ItemDefinition): ItemInstance {
    const instance: ItemInstance = {
      instanceId: randomUUID(),
      itemId: def.itemId,
      name: def.name,
      category: def.category,
      description: def.description,
      power: def.power,
      defense: def.defense,
      specialEffect: def.specialEffect,
      enhancementLevel: 0,
      durability: MAX_DURABILITY,
    };
    if (def.use) instance.use = { ...def.use };
    return instance;
  }

  isBroken(item: ItemInstance): boolean {
    return item.durability <= 0;
  }

  /** WEAPON/ARMOR slot the item fits, or null for consumables and story items */
  slotOf(item: ItemInstance): EquipSlot | null {
    if (item.category === 'WEAPON') return 'WEAPON';
    if (item.category === 'ARMOR') return 'ARMOR';
    return null;
  }

  /**
   * Combat wear: durability -amount, floored at 0.
   * Returns true when this call broke the item.
   */
  wear(item: ItemInstance, amount: number = 1): boolean {
    if (item.durability <= 0) return false;
    item.durability = Math.max(0, item.durability - amount);
    return item.durability === 0;
  }
}
