import { and, eq } from 'drizzle-orm';
import { TurnConflictError } from '../common/errors/game-errors.js';
import type { DrizzleDB } from '../db/drizzle.module.js';
import { campaignSessions } from '../db/schema/index.js';
import type { CampaignSessionRow } from '../db/schema/campaign-sessions.js';
import type { CampaignSession } from '../db/types/index.js';
import type { SessionStore } from './session-store.js';

export class DrizzleSessionStore implements SessionStore {
  constructor(private readonly db: DrizzleDB) {}

  async load(id: string): Promise<CampaignSession | null> {
    const row = await this.db.query.campaignSessions.findFirst({
      where: eq(campaignSessions.id, id),
    });
    return row ? toSession(row) : null;
  }

  async save(session: CampaignSession, expectedTurnNo: number | null): Promise<void> {
    if (expectedTurnNo === null) {
      const inserted = await this.db
        .insert(campaignSessions)
        .values({
          id: session.id,
          name: session.name,
          turnNo: session.turnNo,
          configVersion: session.configVersion,
          character: session.character,
          symbolic: session.symbolic,
          memory: session.memory,
          createdAt: new Date(session.createdAt),
          updatedAt: new Date(session.updatedAt),
        })
        .onConflictDoNothing()
        .returning({ id: campaignSessions.id });
      if (inserted.length === 0) {
        throw new TurnConflictError('TURN_CONFLICT', 'Session already exists', {
          sessionId: session.id,
        });
      }
      return;
    }

    // optimistic guard: only the writer that loaded expectedTurnNo wins
    const updated = await this.db
      .update(campaignSessions)
      .set({
        name: session.name,
        turnNo: session.turnNo,
        configVersion: session.configVersion,
        character: session.character,
        symbolic: session.symbolic,
        memory: session.memory,
        updatedAt: new Date(session.updatedAt),
      })
      .where(
        and(
          eq(campaignSessions.id, session.id),
          eq(campaignSessions.turnNo, expectedTurnNo),
        ),
      )
      .returning({ id: campaignSessions.id });

    if (updated.length === 0) {
      throw new TurnConflictError('TURN_CONFLICT', 'Session was modified concurrently', {
        sessionId: session.id,
        expected: expectedTurnNo,
      });
    }
  }
}

function toSession(row: CampaignSessionRow): CampaignSession {
  return {
    id: row.id,
    name: row.name,
    turnNo: row.turnNo,
    configVersion: row.configVersion,
    character: row.character,
    symbolic: row.symbolic,
    memory: row.memory,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}
