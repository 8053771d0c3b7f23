import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitialSchema1760000000000 implements MigrationInterface {
  name = 'InitialSchema1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS activities (
        name text PRIMARY KEY,
        description text NOT NULL,
        schedule text NOT NULL,
        max_participants integer NOT NULL CHECK (max_participants > 0)
      );
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS registrations (
        activity_name text NOT NULL,
        email text NOT NULL,
        PRIMARY KEY (activity_name, email),
        FOREIGN KEY (activity_name) REFERENCES activities(name) ON DELETE CASCADE
      );
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('DROP TABLE IF EXISTS registrations;');
    await queryRunner.query('DROP TABLE IF EXISTS activities;');
  }
}
