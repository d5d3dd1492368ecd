import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { DrizzleModule } from './db/drizzle.module.js';
import { GameExceptionFilter } from './common/filters/game-exception.filter.js';
import { ContentModule } from './content/content.module.js';
import { EngineModule } from './engine/engine.module.js';
import { SessionsModule } from './sessions/sessions.module.js';
import { TurnsModule } from './turns/turns.module.js';
import { CampaignsModule } from './campaigns/campaigns.module.js';
import { LlmModule } from './llm/llm.module.js';

@Module({
  imports: [
    DrizzleModule,
    ContentModule,
    LlmModule,
    EngineModule,
    SessionsModule,
    TurnsModule,
    CampaignsModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: GameExceptionFilter,
    },
  ],
})
export class AppModule {}
