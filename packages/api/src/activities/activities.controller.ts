import { Controller, Delete, Get, HttpCode, Param, Post, Query } from '@nestjs/common';

import type { ActivityListing, MessageResponse } from '@activity-signup/shared';

import { ActivitiesRepository } from './activities.repository';
import { RegistrationQueryDto } from './dto/registration-query.dto';
import { RegistrationsService } from './registrations.service';

@Controller('activities')
export class ActivitiesController {
  constructor(
    private readonly activitiesRepository: ActivitiesRepository,
    private readonly registrationsService: RegistrationsService,
  ) {}

  @Get()
  list(): Promise<ActivityListing> {
    return this.activitiesRepository.listActivities();
  }

  @Post(':activityName/signup')
  @HttpCode(200)
  signup(
    @Param('activityName') activityName: string,
    @Query() query: RegistrationQueryDto,
  ): Promise<MessageResponse> {
    return this.registrationsService.signup(activityName, query.email);
  }

  @Delete(':activityName/unregister')
  unregister(
    @Param('activityName') activityName: string,
    @Query() query: RegistrationQueryDto,
  ): Promise<MessageResponse> {
    return this.registrationsService.unregister(activityName, query.email);
  }
}
