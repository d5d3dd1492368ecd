import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { LlmModule } from '../llm/llm.module.js';
import { SessionsModule } from '../sessions/sessions.module.js';
import { CampaignsController } from './campaigns.controller.js';
import { CampaignsService } from './campaigns.service.js';

@Module({
  imports: [EngineModule, SessionsModule, LlmModule],
  controllers: [CampaignsController],
  providers: [CampaignsService],
})
export class CampaignsModule {}
