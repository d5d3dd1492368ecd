import { Injectable } from '@nestjs/common';
import { TurnConflictError } from '../common/errors/game-errors.js';
import type { CampaignSession } from '../db/types/index.js';
import type { SessionStore } from './session-store.js';

type StoredSession = {
  turnNo: number;
  json: string;
};

/**
 * Process-local store. Sessions are kept serialized, the way the jsonb
 * columns hold them, so callers never share state with it and anything that
 * would not survive the database round trip does not survive here either.
 */
@Injectable()
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, StoredSession>();

  async load(id: string): Promise<CampaignSession | null> {
    const stored = this.sessions.get(id);
    if (!stored) return null;
    const session: CampaignSession = JSON.parse(stored.json);
    return session;
  }

  async save(session: CampaignSession, expectedTurnNo: number | null): Promise<void> {
    const current = this.sessions.get(session.id);
    const currentTurnNo = current ? current.turnNo : null;
    if (currentTurnNo !== expectedTurnNo) {
      throw new TurnConflictError('TURN_CONFLICT', 'Session was modified concurrently', {
        sessionId: session.id,
        expected: expectedTurnNo,
        actual: currentTurnNo,
      });
    }
    this.sessions.set(session.id, { turnNo: session.turnNo, json: JSON.stringify(session) });
  }

  size(): number {
    return this.sessions.size;
  }
}
