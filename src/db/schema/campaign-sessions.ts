import {
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';
import type {
  CharacterState,
  MemorySnapshot,
  SymbolicState,
} from '../types/index.js';

export const campaignSessions = pgTable(
  'campaign_sessions',
  {
    id: uuid('id').primaryKey(),
    name: text('name').notNull(),
    // write version: an update only applies when it still matches
    turnNo: integer('turn_no').notNull().default(0),
    configVersion: text('config_version').notNull(),
    character: jsonb('character').$type<CharacterState>().notNull(),
    symbolic: jsonb('symbolic').$type<SymbolicState>().notNull(),
    memory: jsonb('memory').$type<MemorySnapshot>().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index('campaign_sessions_updated_idx').on(table.updatedAt)],
);

export type CampaignSessionRow = typeof campaignSessions.$inferSelect;
