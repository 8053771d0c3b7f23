import { Module } from '@nestjs/common';

import { ActivitiesController } from './activities.controller';
import { ActivitiesRepository } from './activities.repository';
import { RegistrationsService } from './registrations.service';

@Module({
  controllers: [ActivitiesController],
  providers: [ActivitiesRepository, RegistrationsService],
  exports: [ActivitiesRepository, RegistrationsService],
})
export class ActivitiesModule {}
