import { DataSourceOptions } from 'typeorm';

import { Activity } from '../activities/entities/activity.entity';
import { Registration } from '../activities/entities/registration.entity';
import { AppConfig } from '../config/app.config';
import { MIGRATIONS } from './migrations';

export function buildDataSourceOptions(
  config: Pick<AppConfig, 'databasePath' | 'dbLogging'>,
): DataSourceOptions {
  return {
    type: 'better-sqlite3',
    database: config.databasePath,
    entities: [Activity, Registration],
    migrations: MIGRATIONS,
    // The store initializer runs migrations before seeding.
    migrationsRun: false,
    synchronize: false,
    logging: config.dbLogging,
  };
}
