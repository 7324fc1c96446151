import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { UserId } from '../common/decorators/user-id.decorator.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { EncountersService } from './encounters.service.js';
import { OpenEncounterBodySchema, type OpenEncounterBody } from './dto/open-encounter.dto.js';
import { SubmitActionBodySchema, type SubmitActionBody } from './dto/submit-action.dto.js';

@Controller('v1/characters/me/encounters')
@UseGuards(AuthGuard)
export class EncountersController {
  constructor(private readonly encountersService: EncountersService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async open(
    @UserId() userId: string,
    @Body(new ZodValidationPipe(OpenEncounterBodySchema)) body: OpenEncounterBody,
  ) {
    return this.encountersService.open(userId, body.enemyId, body.mercenary);
  }

  @Get()
  async get(@UserId() userId: string) {
    return this.encountersService.get(userId);
  }

  // A rejected action is still a 200: the report carries the rejection
  @Post('actions')
  @HttpCode(HttpStatus.OK)
  async act(
    @UserId() userId: string,
    @Body(new ZodValidationPipe(SubmitActionBodySchema)) body: SubmitActionBody,
  ) {
    return this.encountersService.act(userId, body.action, body.expectedTurn);
  }
}
