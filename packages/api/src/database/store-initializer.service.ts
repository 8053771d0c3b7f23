import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';

import { Activity } from '../activities/entities/activity.entity';
import { Registration } from '../activities/entities/registration.entity';
import { INITIAL_ACTIVITIES, SeedActivity } from './seeds/initial-activities';
import { TransactionRunner } from './transaction-runner.service';

@Injectable()
export class StoreInitializer implements OnApplicationBootstrap {
  private readonly logger = new Logger(StoreInitializer.name);

  constructor(private readonly transactions: TransactionRunner) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.initialize();
  }

  /**
   * Brings the schema up to date, then seeds the given activities if the
   * activities table is empty. Returns whether seed rows were written.
   */
  async initialize(seed: readonly SeedActivity[] = INITIAL_ACTIVITIES): Promise<boolean> {
    const applied = await this.transactions.exclusive((dataSource) =>
      dataSource.runMigrations({ transaction: 'all' }),
    );
    if (applied.length > 0) {
      this.logger.log(`Applied migrations: ${applied.map((migration) => migration.name).join(', ')}`);
    }

    return this.transactions.run(async (manager) => {
      const existing = await manager.count(Activity);
      if (existing > 0) {
        this.logger.log(`Store already holds ${existing} activities, skipping seed.`);
        return false;
      }

      for (const entry of seed) {
        await manager.insert(Activity, {
          name: entry.name,
          description: entry.description,
          schedule: entry.schedule,
          maxParticipants: entry.maxParticipants,
        });

        if (entry.participants.length > 0) {
          await manager.insert(
            Registration,
            entry.participants.map((email) => ({ activityName: entry.name, email })),
          );
        }
      }

      this.logger.log(`Seeded ${seed.length} activities.`);
      return true;
    });
  }
}
