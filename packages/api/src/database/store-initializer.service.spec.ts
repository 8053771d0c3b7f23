import { TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';

import { createTestingStore } from '../../test/testing-store';
import { ActivitiesRepository } from '../activities/activities.repository';
import { Activity } from '../activities/entities/activity.entity';
import { Registration } from '../activities/entities/registration.entity';
import { INITIAL_ACTIVITIES } from './seeds/initial-activities';
import { StoreInitializer } from './store-initializer.service';

describe('StoreInitializer', () => {
  let moduleRef: TestingModule;
  let initializer: StoreInitializer;
  let dataSource: DataSource;

  beforeEach(async () => {
    moduleRef = await createTestingStore();
    initializer = moduleRef.get(StoreInitializer);
    dataSource = moduleRef.get(DataSource);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  const clearStore = async (): Promise<void> => {
    await dataSource.createQueryBuilder().delete().from(Activity).execute();
  };

  it('seeds the store on bootstrap', async () => {
    await expect(dataSource.getRepository(Activity).count()).resolves.toBe(9);
    await expect(dataSource.getRepository(Registration).count()).resolves.toBe(18);
  });

  it('leaves a populated store untouched', async () => {
    await dataSource.getRepository(Registration).insert({
      activityName: 'Chess Club',
      email: 'extra@mergington.edu',
    });
    const before = await moduleRef.get(ActivitiesRepository).listActivities();

    await expect(initializer.initialize()).resolves.toBe(false);

    await expect(moduleRef.get(ActivitiesRepository).listActivities()).resolves.toEqual(before);
    await expect(dataSource.getRepository(Registration).count()).resolves.toBe(19);
  });

  it('seeds again once the store is empty', async () => {
    await clearStore();
    await expect(dataSource.getRepository(Registration).count()).resolves.toBe(0);

    await expect(initializer.initialize()).resolves.toBe(true);

    await expect(dataSource.getRepository(Activity).count()).resolves.toBe(INITIAL_ACTIVITIES.length);
    await expect(dataSource.getRepository(Registration).count()).resolves.toBe(18);
  });

  it('accepts a custom seed table', async () => {
    await clearStore();

    await initializer.initialize([
      {
        name: 'Robotics',
        description: 'Build and program robots',
        schedule: 'Saturdays, 10:00 AM - 12:00 PM',
        maxParticipants: 8,
        participants: [],
      },
    ]);

    await expect(moduleRef.get(ActivitiesRepository).listActivities()).resolves.toEqual({
      Robotics: {
        description: 'Build and program robots',
        schedule: 'Saturdays, 10:00 AM - 12:00 PM',
        max_participants: 8,
        participants: [],
      },
    });
  });

  it('rejects a non-positive capacity', async () => {
    await expect(
      dataSource.getRepository(Activity).insert({
        name: 'Empty Room',
        description: 'Nobody fits',
        schedule: 'Never',
        maxParticipants: 0,
      }),
    ).rejects.toThrow();
  });
});
