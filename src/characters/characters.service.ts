import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  CharacterState,
  EnhanceResult,
  EquipSlot,
  ItemInstance,
  ItemDefinition,
  Origin,
  SkillDefinition,
} from '../db/types/index.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { CharacterService, type RestResult } from '../engine/character/character.service.js';
import { ProgressionService } from '../engine/character/progression.service.js';
import { SurvivalService, type SurvivalOption } from '../engine/character/survival.service.js';
import { ItemService } from '../engine/items/item.service.js';
import { EnhancementService } from '../engine/items/enhancement.service.js';
import { RngService } from '../engine/rng/rng.service.js';
import { SAVE_STORE, staleSaveError, type SaveSlot, type SaveStore } from '../saves/save-store.js';
import {
  ConflictError,
  InsufficientResourceError,
  InternalError,
  InvalidActionError,
  NotFoundError,
  rejectionError,
} from '../common/errors/game-errors.js';
import { buildCharacterView, type CharacterView } from './character-view.js';

export interface EnhanceResponse {
  result: EnhanceResult;
  successRate: number;
  item: ItemInstance;
  character: CharacterView;
}

@Injectable()
export class CharactersService {
  private readonly logger = new Logger(CharactersService.name);

  constructor(
    @Inject(SAVE_STORE) private readonly saves: SaveStore,
    private readonly content: ContentLoaderService,
    private readonly characters: CharacterService,
    private readonly progression: ProgressionService,
    private readonly survival: SurvivalService,
    private readonly items: ItemService,
    private readonly enhancement: EnhancementService,
    private readonly rngService: RngService,
  ) {}

  /** New game: replaces whatever the slot held */
  async create(userId: string, name: string, origin: Origin): Promise<CharacterView> {
    const def = this.content.getOrigin(origin);
    if (!def) throw new InternalError(`Origin missing from catalog: ${origin}`);

    const c = this.characters.create(name, def);
    for (const itemId of def.startingItems) {
      const item = this.items.createInstance(this.requireItem(itemId));
      this.characters.addItem(c, item);
      if (this.items.slotOf(item)) this.characters.equip(c, item.instanceId);
    }
    for (const skillId of def.startingSkills) {
      this.characters.learnSkill(c, this.requireSkill(skillId));
    }

    await this.saves.upsert(userId, { character: c, encounter: null });
    this.logger.log(`New character for ${userId}: ${name} (${origin})`);
    return this.view(c, false);
  }

  async get(userId: string): Promise<CharacterView> {
    const slot = await this.loadSlot(userId);
    return this.view(slot.character, slot.encounter !== null);
  }

  async rest(userId: string): Promise<{ restored: RestResult; character: CharacterView }> {
    const saved = await this.loadIdle(userId);
    const c = saved.character;
    const restored = this.characters.rest(c);
    await this.save(saved);
    return { restored, character: this.view(c, false) };
  }

  async equip(userId: string, instanceId: string): Promise<CharacterView> {
    const saved = await this.loadIdle(userId);
    const c = saved.character;
    const item = this.requireOwned(c, instanceId);
    if (!this.characters.equip(c, instanceId)) {
      throw new InvalidActionError(`${item.name} cannot be equipped.`);
    }
    await this.save(saved);
    return this.view(c, false);
  }

  async unequip(userId: string, slot: EquipSlot): Promise<CharacterView> {
    const saved = await this.loadIdle(userId);
    const c = saved.character;
    if (!this.characters.unequip(c, slot)) {
      throw new InvalidActionError(`Nothing is equipped in the ${slot.toLowerCase()} slot.`);
    }
    await this.save(saved);
    return this.view(c, false);
  }

  async enhance(userId: string, instanceId: string): Promise<EnhanceResponse> {
    const saved = await this.loadIdle(userId);
    const c = saved.character;
    const item = this.requireOwned(c, instanceId);
    if (!this.enhancement.canEnhance(item)) {
      throw new InvalidActionError(`${item.name} cannot be enhanced.`);
    }

    const successRate = this.enhancement.successRate(item);
    const result = this.enhancement.enhance(item, this.rngService.create(this.rngService.newSeed()));
    if (result.outcome === 'DESTROYED') {
      this.characters.removeItem(c, instanceId);
    } else if (this.items.isBroken(item)) {
      // a damaging failure can take the last durability
      const slot = this.items.slotOf(item);
      if (slot && (c.equippedWeaponId === instanceId || c.equippedArmorId === instanceId)) {
        this.characters.unequip(c, slot);
      }
    }

    await this.save(saved);
    this.logger.log(`Enhance ${item.itemId} for ${userId}: ${result.outcome}${result.success ? ' +' : ''}`);
    return { result, successRate, item, character: this.view(c, false) };
  }

  async useItem(userId: string, instanceId: string): Promise<{ healed: number; character: CharacterView }> {
    const saved = await this.loadIdle(userId);
    const c = saved.character;
    this.requireOwned(c, instanceId);
    const result = this.characters.useItemOutsideCombat(c, instanceId);
    if (!result.used) throw rejectionError(result.rejection);
    await this.save(saved);
    return { healed: result.healed, character: this.view(c, false) };
  }

  /** Only priced techniques are taught; the price comes out of money */
  async learnSkill(userId: string, skillId: string): Promise<CharacterView> {
    const saved = await this.loadIdle(userId);
    const c = saved.character;
    const skill = this.content.getSkill(skillId);
    if (!skill) throw new NotFoundError(`Unknown skill: ${skillId}`);
    if (this.characters.findSkill(c, skillId)) {
      throw new ConflictError(`${skill.name} is already known.`);
    }
    if (skill.price === undefined) {
      throw new InvalidActionError(`No one teaches ${skill.name}.`);
    }
    if (skill.minLevel !== undefined && c.level < skill.minLevel) {
      throw new InvalidActionError(`${skill.name} requires level ${skill.minLevel}.`);
    }
    if (c.money < skill.price) {
      throw new InsufficientResourceError(`${skill.name} costs ${skill.price} coins.`, {
        price: skill.price,
        money: c.money,
      });
    }

    c.money -= skill.price;
    this.characters.learnSkill(c, skill);
    await this.save(saved);
    return this.view(c, false);
  }

  async advanceJob(userId: string): Promise<CharacterView> {
    const saved = await this.loadIdle(userId);
    const c = saved.character;
    const required = this.progression.nextJobRequirement(c);
    if (!this.progression.advanceJob(c)) {
      throw new InvalidActionError(
        required === null ? 'There is no higher rank.' : `Advancement requires level ${required}.`,
        { required, level: c.level },
      );
    }
    await this.save(saved);
    this.logger.log(`Job advanced for ${userId}: ${c.job}`);
    return this.view(c, false);
  }

  async survive(userId: string, option: SurvivalOption): Promise<{ text: string; character: CharacterView }> {
    const saved = await this.loadIdle(userId);
    const c = saved.character;
    const result = this.survival.apply(c, option);
    if (!result.done) throw rejectionError(result.rejection);
    await this.save(saved);
    return { text: result.text, character: this.view(c, false) };
  }

  // --- helpers ---

  private async loadSlot(userId: string): Promise<SaveSlot> {
    const slot = await this.saves.find(userId);
    if (!slot) throw new NotFoundError('No character. Start a new game first.');
    return slot;
  }

  /** Slot with no encounter in progress */
  private async loadIdle(userId: string): Promise<SaveSlot> {
    const slot = await this.loadSlot(userId);
    if (slot.encounter) throw new ConflictError('Not while a fight is in progress.');
    return slot;
  }

  /** Writes back the slot's character unless another request saved first */
  private async save(saved: SaveSlot): Promise<void> {
    const written = await this.saves.update(
      saved.userId,
      { character: saved.character, encounter: null },
      saved.version,
    );
    if (!written) throw staleSaveError(saved.version);
  }

  private requireOwned(c: CharacterState, instanceId: string): ItemInstance {
    const item = this.characters.findItem(c, instanceId);
    if (!item) throw new NotFoundError(`No such item in inventory: ${instanceId}`);
    return item;
  }

  private requireItem(itemId: string): ItemDefinition {
    const def = this.content.getItem(itemId);
    if (!def) throw new InternalError(`Item missing from catalog: ${itemId}`);
    return def;
  }

  private requireSkill(skillId: string): SkillDefinition {
    const def = this.content.getSkill(skillId);
    if (!def) throw new InternalError(`Skill missing from catalog: ${skillId}`);
    return def;
  }

  private view(c: CharacterState, inEncounter: boolean): CharacterView {
    return buildCharacterView(c, inEncounter, this.characters, this.progression);
  }
}
