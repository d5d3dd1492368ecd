import type { CampaignSession } from '../db/types/index.js';

export const SESSION_STORE = Symbol('SESSION_STORE');

/**
 * Durable campaign state. `save` is a versioned write: `expectedTurnNo` is the
 * turnNo the caller loaded (null for a new session); a mismatch raises
 * TurnConflictError and nothing is written.
 */
export interface SessionStore {
  load(id: string): Promise<CampaignSession | null>;
  save(session: CampaignSession, expectedTurnNo: number | null): Promise<void>;
}
