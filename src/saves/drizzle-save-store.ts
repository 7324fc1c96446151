import { Inject, Injectable } from '@nestjs/common';
import { and, eq, sql } from 'drizzle-orm';
import { DB, type DrizzleDB } from '../db/drizzle.module.js';
import { saveSlots } from '../db/schema/index.js';
import { SaveCodec } from './save-codec.js';
import type { SaveData, SaveSlot, SaveStore } from './save-store.js';

type SaveSlotRow = typeof saveSlots.$inferSelect;

@Injectable()
export class DrizzleSaveStore implements SaveStore {
  constructor(
    @Inject(DB) private readonly db: DrizzleDB,
    private readonly codec: SaveCodec,
  ) {}

  async find(userId: string): Promise<SaveSlot | null> {
    const row = await this.db.query.saveSlots.findFirst({
      where: eq(saveSlots.userId, userId),
    });
    return row ? this.toSlot(row) : null;
  }

  async upsert(userId: string, data: SaveData): Promise<SaveSlot> {
    const character = this.codec.encodeCharacter(data.character);
    const encounter = this.codec.encodeEncounter(data.encounter);
    const [row] = await this.db
      .insert(saveSlots)
      .values({ userId, character, encounter })
      .onConflictDoUpdate({
        target: saveSlots.userId,
        set: {
          character,
          encounter,
          version: sql`${saveSlots.version} + 1`,
          updatedAt: new Date(),
        },
      })
      .returning();
    return this.toSlot(row);
  }

  async update(userId: string, data: SaveData, expectedVersion: number): Promise<SaveSlot | null> {
    const [row] = await this.db
      .update(saveSlots)
      .set({
        character: this.codec.encodeCharacter(data.character),
        encounter: this.codec.encodeEncounter(data.encounter),
        version: sql`${saveSlots.version} + 1`,
        updatedAt: new Date(),
      })
      .where(and(eq(saveSlots.userId, userId), eq(saveSlots.version, expectedVersion)))
      .returning();
    return row ? this.toSlot(row) : null;
  }

  async delete(userId: string, expectedVersion?: number): Promise<boolean> {
    const where =
      expectedVersion === undefined
        ? eq(saveSlots.userId, userId)
        : and(eq(saveSlots.userId, userId), eq(saveSlots.version, expectedVersion));
    const deleted = await this.db
      .delete(saveSlots)
      .where(where)
      .returning({ id: saveSlots.id });
    return deleted.length > 0;
  }

  private toSlot(row: SaveSlotRow): SaveSlot {
    return {
      userId: row.userId,
      version: row.version,
      character: this.codec.decodeCharacter(row.character),
      encounter: this.codec.decodeEncounter(row.encounter),
      updatedAt: row.updatedAt,
    };
  }
}
