import { Entity, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';

import { Activity } from './activity.entity';

@Entity('registrations')
export class Registration {
  @PrimaryColumn({ name: 'activity_name', type: 'text' })
  activityName!: string;

  @PrimaryColumn({ type: 'text' })
  email!: string;

  @ManyToOne(() => Activity, (activity) => activity.registrations, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'activity_name', referencedColumnName: 'name' })
  activity?: Activity;
}
