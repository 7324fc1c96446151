import { Injectable } from '@nestjs/common';
import type {
  CharacterState,
  CombatOpenOptions,
  CombatOutcome,
  CombatSession,
  EnemyAction,
  EnemyState,
  Event,
  EventKind,
  PlayerAction,
  Rejection,
  RoundReport,
} from '../../db/types/index.js';
import type { RandomSource } from '../rng/rng.service.js';
import { CharacterService } from '../character/character.service.js';
import { EnemyService } from '../enemy/enemy.service.js';
import { ItemService } from '../items/item.service.js';
import { StatusService } from '../status/status.service.js';
import { HitService } from './hit.service.js';
import { DamageService } from './damage.service.js';
import { EnemyAiService } from './enemy-ai.service.js';

export const ATTACK_STAMINA = 10;
export const DODGE_STAMINA = 15;
export const DEFEND_STAMINA = 5;
export const AMBUSH_STAMINA = 20;
export const AMBUSH_FOCUS = 20;

export const DODGE_BUFF = { turns: 2, magnitude: 30 } as const;
export const DEFENSE_BUFF = { turns: 1, magnitude: 15 } as const;

export const FEINT_FOCUS_LOSS = 15;
export const ENEMY_DEFEND_BONUS = 5;
export const TAUNT_SANITY_LOSS = 5;

export const MERCENARY_HEALTH_RATIO = 0.8;
export const TRAP_DAMAGE = 30;

/** Collects a round's events and tallies; ids are unique within a session */
export class RoundLog {
  readonly events: Event[] = [];
  dealt = 0;
  taken = 0;
  enemyAction: EnemyAction | null = null;
  enemyMissed = false;

  constructor(private readonly turnNo: number) {}

  push(
    kind: EventKind,
    key: string,
    text: string,
    tags: string[] = [],
    data?: Record<string, unknown>,
  ): void {
    const event: Event = {
      id: `${key}_${this.turnNo}_${this.events.length}`,
      kind,
      text,
      tags,
    };
    if (data) event.data = data;
    this.events.push(event);
  }
}

export interface CombatOpenResult {
  session: CombatSession;
  events: Event[];
}

function reject(code: Rejection['code'], message: string): Rejection {
  return { code, message };
}

@Injectable()
export class CombatService {
  constructor(
    private readonly characterService: CharacterService,
    private readonly enemyService: EnemyService,
    private readonly itemService: ItemService,
    private readonly statusService: StatusService,
    private readonly hitService: HitService,
    private readonly damageService: DamageService,
    private readonly enemyAiService: EnemyAiService,
  ) {}

  /**
   * Starts an encounter. Opening modifiers, in order:
   * mercenary (no draw), then a TRAP buff springs on range(1, 100) ≤ magnitude.
   */
  open(
    character: CharacterState,
    enemy: EnemyState,
    options: CombatOpenOptions,
    rng: RandomSource,
  ): CombatOpenResult {
    const session: CombatSession = {
      character,
      enemy,
      turnCount: 0,
      playerActed: false,
      playerLastAction: null,
      active: true,
      outcome: 'ONGOING',
      rageAnnounced: false,
    };
    const log = new RoundLog(0);
    log.push('BATTLE', 'combat_start', `${enemy.name} bars your way.`, ['START'], {
      enemyId: enemy.enemyId,
    });

    if (options.mercenary) {
      const before = enemy.health;
      enemy.health = Math.trunc(enemy.health * MERCENARY_HEALTH_RATIO);
      log.push('BATTLE', 'mercenary', 'Your hired sword joins the fight.', ['MERCENARY'], {
        enemyHealth: { from: before, to: enemy.health },
      });
    }

    const trap = this.statusService.find(character.buffs, 'TRAP');
    if (trap && rng.range(1, 100) <= trap.magnitude) {
      const { effective } = this.enemyService.loseHealth(enemy, TRAP_DAMAGE);
      character.buffs = this.statusService.removeFirst(character.buffs, 'TRAP');
      log.push('DAMAGE', 'trap', `${enemy.name} walks into your trap and takes ${effective} damage.`, ['TRAP'], {
        damage: effective,
        enemyHealth: enemy.health,
      });
      this.announceRage(session, log);
    }

    this.checkOutcome(session);
    return { session, events: log.events };
  }

  /**
   * One round: player action → victory check → enemy turn → death check →
   * end of round. A rejected action stops before anything is mutated.
   */
  submitAction(
    session: CombatSession,
    action: PlayerAction,
    rng: RandomSource,
  ): RoundReport {
    const log = new RoundLog(session.turnCount + 1);

    if (!session.active) {
      return this.report(session, action, log, reject('INVALID_ACTION', 'The fight is already over.'));
    }
    if (session.playerActed) {
      return this.report(session, action, log, reject('INVALID_ACTION', 'You have already acted this round.'));
    }

    const rejection = this.resolvePlayerAction(session, action, rng, log);
    if (rejection) return this.report(session, action, log, rejection);

    session.playerActed = true;
    session.playerLastAction = action.type;

    if (this.checkOutcome(session) === 'ONGOING') {
      this.resolveEnemyTurn(session, rng, log);
      this.checkOutcome(session);
    }
    this.endRound(session, log);

    if (session.outcome === 'VICTORY') {
      log.push('BATTLE', 'victory', `${session.enemy.name} falls.`, ['VICTORY']);
    } else if (session.outcome === 'DEATH') {
      log.push('BATTLE', 'death', 'Your blood soaks into the cold ground.', ['DEATH']);
    }
    return this.report(session, action, log);
  }

  /** Returns a rejection without touching state, or null once the action resolved */
  resolvePlayerAction(
    session: CombatSession,
    action: PlayerAction,
    rng: RandomSource,
    log: RoundLog,
  ): Rejection | null {
    const c = session.character;

    switch (action.type) {
      case 'ATTACK': {
        if (!this.characterService.useStamina(c, ATTACK_STAMINA)) {
          return reject('INSUFFICIENT_RESOURCE', 'Not enough stamina.');
        }
        const hit = this.hitService.rollAttack(c, rng);
        if (!hit.success) {
          log.push('BATTLE', 'attack_miss', 'Your strike misses.', ['MISS'], { roll: hit.roll, chance: hit.chance });
          return null;
        }
        const roll = this.damageService.rollAttack(this.characterService.totalAttack(c), rng);
        this.hitEnemy(session, roll.damage, log, 'attack');
        this.wearWeapon(c, log);
        return null;
      }

      case 'DODGE': {
        if (!this.characterService.useStamina(c, DODGE_STAMINA)) {
          return reject('INSUFFICIENT_RESOURCE', 'Not enough stamina.');
        }
        c.buffs = this.statusService.add(c.buffs, 'DODGE', DODGE_BUFF.turns, DODGE_BUFF.magnitude);
        log.push('STATUS', 'dodge', 'You shift into an evasive stance.', ['DODGE']);
        return null;
      }

      case 'DEFEND': {
        // flat cost, never rejects
        this.characterService.drainStamina(c, DEFEND_STAMINA);
        c.buffs = this.statusService.add(c.buffs, 'DEFENSE', DEFENSE_BUFF.turns, DEFENSE_BUFF.magnitude);
        log.push('STATUS', 'defend', 'You raise your guard.', ['DEFEND']);
        return null;
      }

      case 'AMBUSH': {
        if (c.stamina < AMBUSH_STAMINA || c.focus < AMBUSH_FOCUS) {
          return reject('INSUFFICIENT_RESOURCE', 'Not enough stamina or focus.');
        }
        this.characterService.useStamina(c, AMBUSH_STAMINA);
        this.characterService.useFocus(c, AMBUSH_FOCUS);
        const roll = this.hitService.rollAmbush(c, rng);
        if (!roll.success) {
          log.push('BATTLE', 'ambush_fail', 'Your ambush is spotted.', ['AMBUSH', 'MISS'], {
            roll: roll.roll,
            chance: roll.chance,
          });
          return null;
        }
        const raw = this.damageService.ambush(this.characterService.totalAttack(c));
        this.hitEnemy(session, raw, log, 'ambush');
        return null;
      }

      case 'SKILL': {
        const skill = this.characterService.findSkill(c, action.skillId);
        if (!skill) return reject('INVALID_ACTION', 'You have not learned that technique.');
        if (c.stamina < skill.staminaCost || c.focus < skill.focusCost) {
          return reject('INSUFFICIENT_RESOURCE', `Not enough stamina or focus for ${skill.name}.`);
        }
        this.characterService.useStamina(c, skill.staminaCost);
        this.characterService.useFocus(c, skill.focusCost);
        const raw = this.damageService.skill(this.characterService.totalAttack(c), skill.damageMultiplier);
        this.hitEnemy(session, raw, log, 'skill', skill.skillId);
        return null;
      }

      case 'ITEM':
        return this.useItem(c, action.instanceId, log);
    }
  }

  /**
   * Dodge roll first (a dodge skips the whole turn), then the AI draw,
   * then damage.
   */
  resolveEnemyTurn(session: CombatSession, rng: RandomSource, log: RoundLog): void {
    const c = session.character;
    const e = session.enemy;

    const dodge = this.hitService.rollDodge(c, rng);
    if (dodge.success) {
      log.enemyMissed = true;
      log.push('BATTLE', 'enemy_dodged', `You slip past ${e.name}'s attack.`, ['DODGED'], {
        roll: dodge.roll,
        chance: dodge.chance,
      });
      return;
    }

    const action = this.enemyAiService.chooseAction(e, session.playerLastAction, rng);
    log.enemyAction = action;

    switch (action) {
      case 'ATTACK':
        this.hitPlayer(session, this.enemyService.getAttackDamage(e, rng), log, 'attacks');
        break;
      case 'STRONG_ATTACK':
        this.hitPlayer(
          session,
          this.damageService.strongAttack(this.enemyService.getAttackDamage(e, rng)),
          log,
          'lands a heavy blow',
        );
        break;
      case 'FEINT': {
        const lost = this.characterService.drainFocus(c, FEINT_FOCUS_LOSS);
        log.push('BATTLE', 'enemy_feint', `${e.name} feints and breaks your focus.`, ['FEINT'], { focusLost: lost });
        break;
      }
      case 'DEFEND':
        e.defense += ENEMY_DEFEND_BONUS;
        e.stance = 'DEFENSIVE';
        log.push('BATTLE', 'enemy_defend', `${e.name} takes a defensive stance.`, ['ENEMY_DEFEND'], {
          defense: e.defense,
        });
        break;
      case 'TAUNT': {
        const delta = this.characterService.adjustSanity(c, -TAUNT_SANITY_LOSS);
        log.push('BATTLE', 'enemy_taunt', `${e.name} jeers at you. Your resolve wavers.`, ['TAUNT'], {
          sanityLost: -delta,
        });
        break;
      }
    }
  }

  /** Turn counter +1, acted flag reset, buff/debuff counters tick */
  endRound(session: CombatSession, log: RoundLog): void {
    const c = session.character;
    session.turnCount += 1;
    session.playerActed = false;

    const buffs = this.statusService.tick(c.buffs, session.turnCount);
    const debuffs = this.statusService.tick(c.debuffs, session.turnCount);
    c.buffs = buffs.effects;
    c.debuffs = debuffs.effects;
    log.events.push(...buffs.events, ...debuffs.events);
  }

  /** Player death is checked first; both results are terminal */
  checkOutcome(session: CombatSession): CombatOutcome {
    if (session.outcome !== 'ONGOING') return session.outcome;
    if (!this.characterService.isAlive(session.character)) {
      session.outcome = 'DEATH';
    } else if (!this.enemyService.isAlive(session.enemy)) {
      session.outcome = 'VICTORY';
    }
    if (session.outcome !== 'ONGOING') session.active = false;
    return session.outcome;
  }

  // --- internals ---

  private useItem(c: CharacterState, instanceId: string, log: RoundLog): Rejection | null {
    const item = this.characterService.findItem(c, instanceId);
    if (!item) return reject('INVALID_ACTION', 'You do not carry that item.');
    if (item.category !== 'SPECIAL' || !item.use) {
      return reject('INVALID_ACTION', `${item.name} cannot be used in combat.`);
    }

    const use = item.use;
    if (use.type === 'HEAL') {
      const healed = this.characterService.heal(c, use.amount);
      this.characterService.removeItem(c, instanceId);
      log.push('STATUS', 'item_heal', `You use ${item.name} and recover ${healed} health.`, ['ITEM', 'HEAL'], {
        itemId: item.itemId,
        healed,
      });
      return null;
    }

    const weapon = this.characterService.equippedWeapon(c);
    if (!weapon || this.itemService.isBroken(weapon)) {
      return reject('INVALID_ACTION', 'You have no blade to coat.');
    }
    c.buffs = this.statusService.add(c.buffs, 'POISON', use.turns, use.magnitude);
    this.characterService.removeItem(c, instanceId);
    log.push('STATUS', 'item_poison', `You coat ${weapon.name} with poison.`, ['ITEM', 'POISON'], {
      itemId: item.itemId,
    });
    return null;
  }

  private hitEnemy(
    session: CombatSession,
    raw: number,
    log: RoundLog,
    source: 'attack' | 'ambush' | 'skill',
    skillId?: string,
  ): void {
    const e = session.enemy;
    const { effective } = this.enemyService.takeDamage(e, raw);
    log.dealt += effective;
    const data: Record<string, unknown> = { source, raw, damage: effective, enemyHealth: e.health };
    if (skillId) data.skillId = skillId;
    log.push('DAMAGE', `dmg_${source}`, `You deal ${effective} damage to ${e.name}.`, [source.toUpperCase()], data);
    this.announceRage(session, log);
  }

  private hitPlayer(session: CombatSession, raw: number, log: RoundLog, verb: string): void {
    const c = session.character;
    const e = session.enemy;
    const effective = this.characterService.takeDamage(c, raw);
    log.taken += effective;
    log.push('DAMAGE', 'dmg_taken', `${e.name} ${verb}: you take ${effective} damage.`, ['HIT'], {
      raw,
      damage: effective,
      health: c.health,
    });
    if (effective > 0) this.wearArmor(c, log);
  }

  private announceRage(session: CombatSession, log: RoundLog): void {
    if (!session.enemy.rageMode || session.rageAnnounced) return;
    session.rageAnnounced = true;
    log.push('BATTLE', 'enemy_rage', `${session.enemy.name} flies into a rage!`, ['RAGE']);
  }

  private wearWeapon(c: CharacterState, log: RoundLog): void {
    const weapon = this.characterService.equippedWeapon(c);
    if (!weapon || !this.itemService.wear(weapon)) return;
    this.characterService.unequip(c, 'WEAPON');
    log.push('EQUIPMENT', 'weapon_broken', `${weapon.name} shatters!`, ['BROKEN', 'WEAPON'], {
      instanceId: weapon.instanceId,
    });
  }

  private wearArmor(c: CharacterState, log: RoundLog): void {
    const armor = this.characterService.equippedArmor(c);
    if (!armor || !this.itemService.wear(armor)) return;
    this.characterService.unequip(c, 'ARMOR');
    log.push('EQUIPMENT', 'armor_broken', `${armor.name} falls apart!`, ['BROKEN', 'ARMOR'], {
      instanceId: armor.instanceId,
    });
  }

  private report(
    session: CombatSession,
    action: PlayerAction,
    log: RoundLog,
    rejection?: Rejection,
  ): RoundReport {
    const report: RoundReport = {
      turnCount: session.turnCount,
      action: action.type,
      playerDamageDealt: log.dealt,
      playerDamageTaken: log.taken,
      enemyAction: log.enemyAction,
      enemyMissed: log.enemyMissed,
      outcome: session.outcome,
      events: log.events,
    };
    if (rejection) report.rejection = rejection;
    return report;
  }
}
