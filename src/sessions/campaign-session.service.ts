// Load/persist wrapper around the configured SessionStore

import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  GameError,
  NotFoundError,
  PersistenceError,
  TurnConflictError,
} from '../common/errors/game-errors.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { createCampaignSession, type CampaignSession } from '../db/types/index.js';
import { SESSION_STORE, type SessionStore } from './session-store.js';

@Injectable()
export class CampaignSessionService {
  private readonly logger = new Logger(CampaignSessionService.name);

  constructor(
    @Inject(SESSION_STORE) private readonly store: SessionStore,
    private readonly content: ContentLoaderService,
  ) {}

  async create(name: string, now: Date = new Date()): Promise<CampaignSession> {
    const engine = this.content.getEngineConfig();
    const session = createCampaignSession(
      randomUUID(),
      name,
      engine.version,
      engine.tension.initial,
      now,
    );
    await this.persist(session, null);
    this.logger.log(`Campaign created: ${session.id} (config ${engine.version})`);
    return session;
  }

  async require(id: string): Promise<CampaignSession> {
    let session: CampaignSession | null;
    try {
      session = await this.store.load(id);
    } catch (err) {
      throw this.toPersistenceError('load', id, err);
    }
    if (!session) throw new NotFoundError('Campaign not found', { sessionId: id });
    return session;
  }

  /** Rejects a client that acted on a stale turnNo. */
  assertTurnNo(session: CampaignSession, expectedTurnNo: number | undefined): void {
    if (expectedTurnNo !== undefined && expectedTurnNo !== session.turnNo) {
      throw new TurnConflictError('TURN_NO_MISMATCH', 'Turn number mismatch', {
        expected: session.turnNo,
        received: expectedTurnNo,
      });
    }
  }

  async persist(session: CampaignSession, expectedTurnNo: number | null): Promise<void> {
    try {
      await this.store.save(session, expectedTurnNo);
    } catch (err) {
      throw this.toPersistenceError('save', session.id, err);
    }
  }

  private toPersistenceError(op: 'load' | 'save', id: string, err: unknown): GameError {
    if (err instanceof GameError) return err;
    this.logger.error(`Session ${op} failed for ${id}: ${String(err)}`);
    return new PersistenceError(`Session state could not be ${op === 'load' ? 'loaded' : 'persisted'}`, {
      sessionId: id,
    });
  }
}
