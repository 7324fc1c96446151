import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { ItemService } from './items/item.service.js';
import { EnhancementService } from './items/enhancement.service.js';
import { StatusService } from './status/status.service.js';
import { CharacterService } from './character/character.service.js';
import { ProgressionService } from './character/progression.service.js';
import { SurvivalService } from './character/survival.service.js';
import { EnemyService } from './enemy/enemy.service.js';
import { HitService } from './combat/hit.service.js';
import { DamageService } from './combat/damage.service.js';
import { EnemyAiService } from './combat/enemy-ai.service.js';
import { CombatService } from './combat/combat.service.js';
import { EncounterService } from './combat/encounter.service.js';
import { RewardsService } from './rewards/rewards.service.js';

const providers = [
  // Layer 1
  RngService,
  // Layer 2
  ItemService,
  EnhancementService,
  StatusService,
  // Layer 3
  CharacterService,
  ProgressionService,
  SurvivalService,
  EnemyService,
  // Layer 4
  HitService,
  DamageService,
  EnemyAiService,
  CombatService,
  // Layer 5
  RewardsService,
  EncounterService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
