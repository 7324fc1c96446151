import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { SavesModule } from '../saves/saves.module.js';
import { EncountersController } from './encounters.controller.js';
import { EncountersService } from './encounters.service.js';

@Module({
  imports: [EngineModule, SavesModule],
  controllers: [EncountersController],
  providers: [EncountersService],
})
export class EncountersModule {}
