import { Check, Column, Entity, OneToMany, PrimaryColumn } from 'typeorm';

import { Registration } from './registration.entity';

@Entity('activities')
@Check('"max_participants" > 0')
export class Activity {
  @PrimaryColumn({ type: 'text' })
  name!: string;

  @Column({ type: 'text' })
  description!: string;

  @Column({ type: 'text' })
  schedule!: string;

  // Not enforced on signup.
  @Column({ name: 'max_participants', type: 'integer' })
  maxParticipants!: number;

  @OneToMany(() => Registration, (registration) => registration.activity)
  registrations?: Registration[];
}
