import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { CampaignsService } from './campaigns.service.js';
import {
  CreateCampaignBodySchema,
  type CreateCampaignBody,
} from './dto/create-campaign.dto.js';
import {
  GetContextQuerySchema,
  NarrationBodySchema,
  type GetContextQuery,
  type NarrationBody,
} from './dto/get-context.dto.js';

@Controller('v1/campaigns')
export class CampaignsController {
  constructor(private readonly campaignsService: CampaignsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async createCampaign(
    @Body(new ZodValidationPipe(CreateCampaignBodySchema)) body: CreateCampaignBody,
  ) {
    return this.campaignsService.createCampaign(body.name);
  }

  @Get(':campaignId/state')
  async getState(@Param('campaignId') campaignId: string) {
    return this.campaignsService.getState(campaignId);
  }

  @Get(':campaignId/context')
  async getContext(
    @Param('campaignId') campaignId: string,
    @Query(new ZodValidationPipe(GetContextQuerySchema)) query: GetContextQuery,
  ) {
    return this.campaignsService.getContext(campaignId, query.budget);
  }

  @Post(':campaignId/narration')
  @HttpCode(HttpStatus.OK)
  async narrate(
    @Param('campaignId') campaignId: string,
    @Body(new ZodValidationPipe(NarrationBodySchema)) body: NarrationBody,
  ) {
    return this.campaignsService.narrate(campaignId, body.budget);
  }
}
