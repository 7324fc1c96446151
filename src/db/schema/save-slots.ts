import { integer, jsonb, pgTable, text, timestamp, uuid } from 'drizzle-orm/pg-core';
import type { CharacterState, CombatSnapshot } from '../types/index.js';

/** One slot per user; deleted when the character dies */
export const saveSlots = pgTable('save_slots', {
  id: uuid('id').primaryKey().defaultRandom(),
  userId: text('user_id').notNull().unique(),
  version: integer('version').notNull().default(1),
  character: jsonb('character').$type<CharacterState>().notNull(),
  encounter: jsonb('encounter').$type<CombatSnapshot>(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});
