import { TestingModule } from '@nestjs/testing';

import { createTestingStore } from '../../test/testing-store';
import { INITIAL_ACTIVITIES } from '../database/seeds/initial-activities';
import { ActivitiesRepository } from './activities.repository';
import { RegistrationsService } from './registrations.service';

describe('ActivitiesRepository', () => {
  let moduleRef: TestingModule;
  let repository: ActivitiesRepository;

  beforeEach(async () => {
    moduleRef = await createTestingStore();
    repository = moduleRef.get(ActivitiesRepository);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('lists the seeded activities in ascending name order', async () => {
    const listing = await repository.listActivities();

    expect(Object.keys(listing)).toEqual([
      'Art Club',
      'Basketball Team',
      'Chess Club',
      'Debate Team',
      'Drama Club',
      'Gym Class',
      'Math Club',
      'Programming Class',
      'Soccer Team',
    ]);
  });

  it('returns activity details with participants sorted by email', async () => {
    const listing = await repository.listActivities();

    expect(listing['Chess Club']).toEqual({
      description: 'Learn strategies and compete in chess tournaments',
      schedule: 'Fridays, 3:30 PM - 5:00 PM',
      max_participants: 12,
      participants: ['daniel@mergington.edu', 'michael@mergington.edu'],
    });
    expect(listing['Math Club'].participants).toEqual([
      'benjamin@mergington.edu',
      'james@mergington.edu',
    ]);
  });

  it('returns exactly the seeded activities with their seeded participants', async () => {
    const listing = await repository.listActivities();

    expect(Object.keys(listing)).toHaveLength(INITIAL_ACTIVITIES.length);
    for (const seed of INITIAL_ACTIVITIES) {
      expect(listing[seed.name]).toEqual({
        description: seed.description,
        schedule: seed.schedule,
        max_participants: seed.maxParticipants,
        participants: [...seed.participants].sort(),
      });
    }
  });

  it('keeps every participant list in ascending order', async () => {
    const listing = await repository.listActivities();

    for (const details of Object.values(listing)) {
      expect(details.participants).toEqual([...details.participants].sort());
    }
  });

  it('places new registrations in email order', async () => {
    await moduleRef.get(RegistrationsService).signup('Chess Club', 'aaron@mergington.edu');

    const listing = await repository.listActivities();

    expect(listing['Chess Club'].participants).toEqual([
      'aaron@mergington.edu',
      'daniel@mergington.edu',
      'michael@mergington.edu',
    ]);
  });
});
