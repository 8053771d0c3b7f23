export interface SeedActivity {
  readonly name: string;
  readonly description: string;
  readonly schedule: string;
  readonly maxParticipants: number;
  readonly participants: readonly string[];
}

/** Inserted once, into an empty store. */
export const INITIAL_ACTIVITIES: readonly SeedActivity[] = Object.freeze([
  {
    name: 'Chess Club',
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM',
    maxParticipants: 12,
    participants: ['michael@mergington.edu', 'daniel@mergington.edu'],
  },
  {
    name: 'Programming Class',
    description: 'Learn programming fundamentals and build software projects',
    schedule: 'Tuesdays and Thursdays, 3:30 PM - 4:30 PM',
    maxParticipants: 20,
    participants: ['emma@mergington.edu', 'sophia@mergington.edu'],
  },
  {
    name: 'Gym Class',
    description: 'Physical education and sports activities',
    schedule: 'Mondays, Wednesdays, Fridays, 2:00 PM - 3:00 PM',
    maxParticipants: 30,
    participants: ['john@mergington.edu', 'olivia@mergington.edu'],
  },
  {
    name: 'Soccer Team',
    description: 'Join the school soccer team and compete in matches',
    schedule: 'Tuesdays and Thursdays, 4:00 PM - 5:30 PM',
    maxParticipants: 22,
    participants: ['liam@mergington.edu', 'noah@mergington.edu'],
  },
  {
    name: 'Basketball Team',
    description: 'Practice and play basketball with the school team',
    schedule: 'Wednesdays and Fridays, 3:30 PM - 5:00 PM',
    maxParticipants: 15,
    participants: ['ava@mergington.edu', 'mia@mergington.edu'],
  },
  {
    name: 'Art Club',
    description: 'Explore your creativity through painting and drawing',
    schedule: 'Thursdays, 3:30 PM - 5:00 PM',
    maxParticipants: 15,
    participants: ['amelia@mergington.edu', 'harper@mergington.edu'],
  },
  {
    name: 'Drama Club',
    description: 'Act, direct, and produce plays and performances',
    schedule: 'Mondays and Wednesdays, 4:00 PM - 5:30 PM',
    maxParticipants: 20,
    participants: ['ella@mergington.edu', 'scarlett@mergington.edu'],
  },
  {
    name: 'Math Club',
    description: 'Solve challenging problems and participate in math competitions',
    schedule: 'Tuesdays, 3:30 PM - 4:30 PM',
    maxParticipants: 10,
    participants: ['james@mergington.edu', 'benjamin@mergington.edu'],
  },
  {
    name: 'Debate Team',
    description: 'Develop public speaking and argumentation skills',
    schedule: 'Fridays, 4:00 PM - 5:30 PM',
    maxParticipants: 12,
    participants: ['charlotte@mergington.edu', 'henry@mergington.edu'],
  },
]);
