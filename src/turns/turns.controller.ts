import { Body, Controller, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { TurnsService } from './turns.service.js';
import {
  ConfirmFactBodySchema,
  SubmitTurnBodySchema,
  UndoBodySchema,
  type ConfirmFactBody,
  type SubmitTurnBody,
  type UndoBody,
} from './dto/submit-turn.dto.js';

@Controller('v1/campaigns/:campaignId')
export class TurnsController {
  constructor(private readonly turnsService: TurnsService) {}

  @Post('turns')
  @HttpCode(HttpStatus.OK)
  async submitTurn(
    @Param('campaignId') campaignId: string,
    @Body(new ZodValidationPipe(SubmitTurnBodySchema)) body: SubmitTurnBody,
  ) {
    return this.turnsService.processTurn(campaignId, body);
  }

  @Post('confirm')
  @HttpCode(HttpStatus.OK)
  async confirm(
    @Param('campaignId') campaignId: string,
    @Body(new ZodValidationPipe(ConfirmFactBodySchema)) body: ConfirmFactBody,
  ) {
    return this.turnsService.confirm(campaignId, body);
  }

  @Post('undo')
  @HttpCode(HttpStatus.OK)
  async undo(
    @Param('campaignId') campaignId: string,
    @Body(new ZodValidationPipe(UndoBodySchema)) body: UndoBody,
  ) {
    return this.turnsService.undo(campaignId, body);
  }
}
