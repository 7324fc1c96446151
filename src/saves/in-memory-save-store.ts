import { Injectable } from '@nestjs/common';
import { SaveCodec } from './save-codec.js';
import type { SaveData, SaveSlot, SaveStore } from './save-store.js';

/** Process-local SaveStore; rows pass through the codec like the drizzle store's */
@Injectable()
export class InMemorySaveStore implements SaveStore {
  private readonly rows = new Map<string, SaveSlot>();

  constructor(private readonly codec: SaveCodec) {}

  async find(userId: string): Promise<SaveSlot | null> {
    const row = this.rows.get(userId);
    return row ? this.copy(row) : null;
  }

  async upsert(userId: string, data: SaveData): Promise<SaveSlot> {
    const existing = this.rows.get(userId);
    return this.write(userId, data, existing ? existing.version + 1 : 1);
  }

  async update(userId: string, data: SaveData, expectedVersion: number): Promise<SaveSlot | null> {
    const existing = this.rows.get(userId);
    if (!existing || existing.version !== expectedVersion) return null;
    return this.write(userId, data, expectedVersion + 1);
  }

  async delete(userId: string, expectedVersion?: number): Promise<boolean> {
    const existing = this.rows.get(userId);
    if (!existing) return false;
    if (expectedVersion !== undefined && existing.version !== expectedVersion) return false;
    return this.rows.delete(userId);
  }

  get size(): number {
    return this.rows.size;
  }

  private write(userId: string, data: SaveData, version: number): SaveSlot {
    const row: SaveSlot = {
      userId,
      version,
      character: this.codec.encodeCharacter(data.character),
      encounter: this.codec.encodeEncounter(data.encounter),
      updatedAt: new Date(),
    };
    this.rows.set(userId, row);
    return this.copy(row);
  }

  private copy(row: SaveSlot): SaveSlot {
    return {
      ...row,
      character: this.codec.encodeCharacter(row.character),
      encounter: this.codec.encodeEncounter(row.encounter),
    };
  }
}
