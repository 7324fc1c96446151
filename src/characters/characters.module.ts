import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { SavesModule } from '../saves/saves.module.js';
import { CharactersController } from './characters.controller.js';
import { CharactersService } from './characters.service.js';

@Module({
  imports: [EngineModule, SavesModule],
  controllers: [CharactersController],
  providers: [CharactersService],
  exports: [CharactersService],
})
export class CharactersModule {}
