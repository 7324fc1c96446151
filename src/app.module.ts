import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from './common/config/config.module.js';
import { DrizzleModule } from './db/drizzle.module.js';
import { GameExceptionFilter } from './common/filters/game-exception.filter.js';
import { ContentModule } from './content/content.module.js';
import { EngineModule } from './engine/engine.module.js';
import { SavesModule } from './saves/saves.module.js';
import { AuthModule } from './auth/auth.module.js';
import { CharactersModule } from './characters/characters.module.js';
import { EncountersModule } from './encounters/encounters.module.js';

@Module({
  imports: [
    ConfigModule,
    DrizzleModule,
    ContentModule,
    EngineModule,
    SavesModule,
    AuthModule,
    CharactersModule,
    EncountersModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: GameExceptionFilter,
    },
  ],
})
export class AppModule {}
