import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  CharacterState,
  EnemyState,
  Event,
  ItemInstance,
  PlayerAction,
  RoundReport,
} from '../db/types/index.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { CharacterService } from '../engine/character/character.service.js';
import { ProgressionService } from '../engine/character/progression.service.js';
import { CombatService } from '../engine/combat/combat.service.js';
import { EnemyService } from '../engine/enemy/enemy.service.js';
import { ItemService } from '../engine/items/item.service.js';
import { RewardsService, type VictoryRewards } from '../engine/rewards/rewards.service.js';
import { RngService, type RandomSource } from '../engine/rng/rng.service.js';
import {
  SAVE_STORE,
  staleSaveError,
  type SaveData,
  type SaveSlot,
  type SaveStore,
} from '../saves/save-store.js';
import {
  ConflictError,
  InsufficientResourceError,
  InternalError,
  NotFoundError,
} from '../common/errors/game-errors.js';
import { buildCharacterView, type CharacterView } from '../characters/character-view.js';
import {
  fromSnapshot,
  toEncounterView,
  toSnapshot,
  type EncounterView,
} from './encounter-snapshot.js';

export const MERCENARY_FEE = 50;

export interface OpenEncounterResponse {
  events: Event[];
  /** null when the fight ended before the first round */
  encounter: EncounterView | null;
  character: CharacterView;
  rewards: VictoryRewards | null;
  rewardEvents: Event[];
}

export interface EncounterActionResponse {
  report: RoundReport;
  encounter: EncounterView | null;
  /** null after death: the save is gone */
  character: CharacterView | null;
  rewards: VictoryRewards | null;
  rewardEvents: Event[];
}

@Injectable()
export class EncountersService {
  private readonly logger = new Logger(EncountersService.name);

  constructor(
    @Inject(SAVE_STORE) private readonly saves: SaveStore,
    private readonly content: ContentLoaderService,
    private readonly characters: CharacterService,
    private readonly progression: ProgressionService,
    private readonly items: ItemService,
    private readonly enemies: EnemyService,
    private readonly combat: CombatService,
    private readonly rewardsService: RewardsService,
    private readonly rngService: RngService,
  ) {}

  async open(userId: string, enemyId: string, mercenary: boolean): Promise<OpenEncounterResponse> {
    const slot = await this.loadSlot(userId);
    if (slot.encounter) throw new ConflictError('A fight is already in progress.');

    const def = this.content.getEnemy(enemyId);
    if (!def) throw new NotFoundError(`Unknown enemy: ${enemyId}`);

    const c = slot.character;
    if (mercenary) {
      if (c.money < MERCENARY_FEE) {
        throw new InsufficientResourceError(`A mercenary costs ${MERCENARY_FEE} coins.`, {
          price: MERCENARY_FEE,
          money: c.money,
        });
      }
      c.money -= MERCENARY_FEE;
    }

    const enemy = this.enemies.create(def, def.loot.map((itemId) => this.lootInstance(itemId)));
    const rng = this.rngService.create(this.rngService.newSeed());
    const { session, events } = this.combat.open(c, enemy, { mercenary }, rng);
    this.logger.log(`Encounter opened for ${userId}: ${enemyId}${mercenary ? ' (mercenary)' : ''}`);

    // a sprung trap can finish the enemy before the first round
    if (session.outcome === 'VICTORY') {
      const won = this.win(userId, c, session.enemy, rng);
      await this.save(slot, { character: c, encounter: null });
      return { events, encounter: null, character: this.view(c, false), ...won };
    }

    await this.save(slot, { character: c, encounter: toSnapshot(session, rng.getState()) });
    return {
      events,
      encounter: toEncounterView(session),
      character: this.view(c, true),
      rewards: null,
      rewardEvents: [],
    };
  }

  async get(userId: string): Promise<EncounterView> {
    const slot = await this.loadSlot(userId);
    if (!slot.encounter) throw new NotFoundError('No fight in progress.');
    return toEncounterView(slot.encounter);
  }

  /**
   * One round against the stored encounter. The rng resumes at the saved
   * cursor so a reloaded fight draws the same sequence it would have.
   * expectedTurn is the turnCount the client acted on; a stale one is refused.
   */
  async act(userId: string, action: PlayerAction, expectedTurn: number): Promise<EncounterActionResponse> {
    const slot = await this.loadSlot(userId);
    const snapshot = slot.encounter;
    if (!snapshot) throw new NotFoundError('No fight in progress.');
    if (snapshot.turnCount !== expectedTurn) {
      throw new ConflictError('Turn number mismatch', {
        expected: snapshot.turnCount,
        received: expectedTurn,
      });
    }

    const c = slot.character;
    const session = fromSnapshot(c, snapshot);
    const rng = this.rngService.create(snapshot.rng.seed, snapshot.rng.cursor);
    const report = this.combat.submitAction(session, action, rng);

    if (report.rejection) {
      return {
        report,
        encounter: toEncounterView(snapshot),
        character: this.view(c, true),
        rewards: null,
        rewardEvents: [],
      };
    }

    switch (session.outcome) {
      case 'VICTORY': {
        const won = this.win(userId, c, session.enemy, rng);
        await this.save(slot, { character: c, encounter: null });
        return { report, encounter: null, character: this.view(c, false), ...won };
      }
      case 'DEATH': {
        if (!(await this.saves.delete(userId, slot.version))) throw staleSaveError(slot.version);
        this.logger.log(`${c.name} (${userId}) fell to ${session.enemy.name} on turn ${session.turnCount}; save deleted`);
        return { report, encounter: null, character: null, rewards: null, rewardEvents: [] };
      }
      case 'ONGOING': {
        await this.save(slot, { character: c, encounter: toSnapshot(session, rng.getState()) });
        return {
          report,
          encounter: toEncounterView(session),
          character: this.view(c, true),
          rewards: null,
          rewardEvents: [],
        };
      }
    }
  }

  // --- helpers ---

  private win(
    userId: string,
    c: CharacterState,
    enemy: EnemyState,
    rng: RandomSource,
  ): { rewards: VictoryRewards; rewardEvents: Event[] } {
    const { rewards, events } = this.rewardsService.applyVictory(c, enemy, rng);
    this.logger.log(
      `${c.name} (${userId}) defeated ${enemy.name}: +${rewards.experience} xp, +${rewards.money} coins, level ${rewards.level}`,
    );
    return { rewards, rewardEvents: events };
  }

  private async loadSlot(userId: string): Promise<SaveSlot> {
    const slot = await this.saves.find(userId);
    if (!slot) throw new NotFoundError('No character. Start a new game first.');
    return slot;
  }

  private async save(slot: SaveSlot, data: SaveData): Promise<void> {
    const written = await this.saves.update(slot.userId, data, slot.version);
    if (!written) throw staleSaveError(slot.version);
  }

  private lootInstance(itemId: string): ItemInstance {
    const def = this.content.getItem(itemId);
    if (!def) throw new InternalError(`Item missing from catalog: ${itemId}`);
    return this.items.createInstance(def);
  }

  private view(c: CharacterState, inEncounter: boolean): CharacterView {
    return buildCharacterView(c, inEncounter, this.characters, this.progression);
  }
}
