import { Injectable } from '@nestjs/common';

import type { ActivityDetails, ActivityListing } from '@activity-signup/shared';

import { TransactionRunner } from '../database/transaction-runner.service';
import { Activity } from './entities/activity.entity';
import { Registration } from './entities/registration.entity';

@Injectable()
export class ActivitiesRepository {
  constructor(private readonly transactions: TransactionRunner) {}

  async listActivities(): Promise<ActivityListing> {
    return this.transactions.run(async (manager) => {
      const activities = await manager.find(Activity, { order: { name: 'ASC' } });
      const registrations = await manager.find(Registration, {
        order: { activityName: 'ASC', email: 'ASC' },
      });

      const participants = new Map<string, string[]>();
      for (const registration of registrations) {
        const emails = participants.get(registration.activityName) ?? [];
        emails.push(registration.email);
        participants.set(registration.activityName, emails);
      }

      return Object.fromEntries(
        activities.map((activity): [string, ActivityDetails] => [
          activity.name,
          {
            description: activity.description,
            schedule: activity.schedule,
            max_participants: activity.maxParticipants,
            participants: participants.get(activity.name) ?? [],
          },
        ]),
      );
    });
  }
}
