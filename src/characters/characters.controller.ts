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
import { CharactersService } from './characters.service.js';
import {
  CreateCharacterBodySchema,
  type CreateCharacterBody,
} from './dto/create-character.dto.js';
import {
  ItemTargetBodySchema,
  UnequipBodySchema,
  type ItemTargetBody,
  type UnequipBody,
} from './dto/item-target.dto.js';
import { LearnSkillBodySchema, type LearnSkillBody } from './dto/learn-skill.dto.js';
import { SurvivalBodySchema, type SurvivalBody } from './dto/survival.dto.js';

@Controller('v1/characters')
@UseGuards(AuthGuard)
export class CharactersController {
  constructor(private readonly charactersService: CharactersService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @UserId() userId: string,
    @Body(new ZodValidationPipe(CreateCharacterBodySchema)) body: CreateCharacterBody,
  ) {
    return this.charactersService.create(userId, body.name, body.origin);
  }

  @Get('me')
  async get(@UserId() userId: string) {
    return this.charactersService.get(userId);
  }

  @Post('me/rest')
  @HttpCode(HttpStatus.OK)
  async rest(@UserId() userId: string) {
    return this.charactersService.rest(userId);
  }

  @Post('me/equip')
  @HttpCode(HttpStatus.OK)
  async equip(
    @UserId() userId: string,
    @Body(new ZodValidationPipe(ItemTargetBodySchema)) body: ItemTargetBody,
  ) {
    return this.charactersService.equip(userId, body.instanceId);
  }

  @Post('me/unequip')
  @HttpCode(HttpStatus.OK)
  async unequip(
    @UserId() userId: string,
    @Body(new ZodValidationPipe(UnequipBodySchema)) body: UnequipBody,
  ) {
    return this.charactersService.unequip(userId, body.slot);
  }

  @Post('me/enhance')
  @HttpCode(HttpStatus.OK)
  async enhance(
    @UserId() userId: string,
    @Body(new ZodValidationPipe(ItemTargetBodySchema)) body: ItemTargetBody,
  ) {
    return this.charactersService.enhance(userId, body.instanceId);
  }

  @Post('me/items/use')
  @HttpCode(HttpStatus.OK)
  async useItem(
    @UserId() userId: string,
    @Body(new ZodValidationPipe(ItemTargetBodySchema)) body: ItemTargetBody,
  ) {
    return this.charactersService.useItem(userId, body.instanceId);
  }

  @Post('me/skills')
  @HttpCode(HttpStatus.OK)
  async learnSkill(
    @UserId() userId: string,
    @Body(new ZodValidationPipe(LearnSkillBodySchema)) body: LearnSkillBody,
  ) {
    return this.charactersService.learnSkill(userId, body.skillId);
  }

  @Post('me/job')
  @HttpCode(HttpStatus.OK)
  async advanceJob(@UserId() userId: string) {
    return this.charactersService.advanceJob(userId);
  }

  @Post('me/survival')
  @HttpCode(HttpStatus.OK)
  async survive(
    @UserId() userId: string,
    @Body(new ZodValidationPipe(SurvivalBodySchema)) body: SurvivalBody,
  ) {
    return this.charactersService.survive(userId, body.option);
  }
}
