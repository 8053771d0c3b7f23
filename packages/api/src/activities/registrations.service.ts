import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { EntityManager } from 'typeorm';

import type { MessageResponse } from '@activity-signup/shared';

import { TransactionRunner } from '../database/transaction-runner.service';
import { Activity } from './entities/activity.entity';
import { Registration } from './entities/registration.entity';

@Injectable()
export class RegistrationsService {
  private readonly logger = new Logger(RegistrationsService.name);

  constructor(private readonly transactions: TransactionRunner) {}

  async signup(activityName: string, email: string): Promise<MessageResponse> {
    await this.transactions.run(async (manager) => {
      await this.requireActivity(manager, activityName);

      const existing = await manager.findOne(Registration, { where: { activityName, email } });
      if (existing) {
        throw new BadRequestException('Student is already signed up');
      }

      await manager.insert(Registration, { activityName, email });
    });

    this.logger.log(`Signed up ${email} for ${activityName}`);
    return { message: `Signed up ${email} for ${activityName}` };
  }

  async unregister(activityName: string, email: string): Promise<MessageResponse> {
    await this.transactions.run(async (manager) => {
      await this.requireActivity(manager, activityName);

      const result = await manager.delete(Registration, { activityName, email });
      if (!result.affected) {
        throw new BadRequestException('Student is not signed up for this activity');
      }
    });

    this.logger.log(`Unregistered ${email} from ${activityName}`);
    return { message: `Unregistered ${email} from ${activityName}` };
  }

  private async requireActivity(manager: EntityManager, activityName: string): Promise<Activity> {
    const activity = await manager.findOne(Activity, { where: { name: activityName } });
    if (!activity) {
      throw new NotFoundException('Activity not found');
    }

    return activity;
  }
}
