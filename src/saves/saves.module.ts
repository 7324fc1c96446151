import { Module } from '@nestjs/common';
import { SaveCodec } from './save-codec.js';
import { DrizzleSaveStore } from './drizzle-save-store.js';
import { SAVE_STORE } from './save-store.js';

@Module({
  providers: [
    SaveCodec,
    { provide: SAVE_STORE, useClass: DrizzleSaveStore },
  ],
  exports: [SaveCodec, SAVE_STORE],
})
export class SavesModule {}
