import { Logger, Module } from '@nestjs/common';
import { DB, type DrizzleDB } from '../db/drizzle.module.js';
import { CampaignSessionService } from './campaign-session.service.js';
import { DrizzleSessionStore } from './drizzle-session.store.js';
import { InMemorySessionStore } from './in-memory-session.store.js';
import { SESSION_STORE, type SessionStore } from './session-store.js';

@Module({
  providers: [
    {
      provide: SESSION_STORE,
      inject: [DB],
      useFactory: (db: DrizzleDB | null): SessionStore => {
        const logger = new Logger('SessionsModule');
        if (db) {
          logger.log('Session store: PostgreSQL');
          return new DrizzleSessionStore(db);
        }
        logger.log('Session store: in-memory');
        return new InMemorySessionStore();
      },
    },
    CampaignSessionService,
  ],
  exports: [CampaignSessionService],
})
export class SessionsModule {}
