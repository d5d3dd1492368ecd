import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { SessionsModule } from '../sessions/sessions.module.js';
import { TurnsController } from './turns.controller.js';
import { TurnsService } from './turns.service.js';

@Module({
  imports: [EngineModule, SessionsModule],
  controllers: [TurnsController],
  providers: [TurnsService],
  exports: [TurnsService],
})
export class TurnsModule {}
