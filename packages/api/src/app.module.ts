import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';

import { ActivitiesModule } from './activities/activities.module';
import { AppController } from './app.controller';
import { appConfig } from './config/app.config';
import { buildDataSourceOptions } from './database/data-source';
import { DatabaseModule } from './database/database.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [appConfig] }),
    TypeOrmModule.forRootAsync({
      inject: [appConfig.KEY],
      useFactory: (config: ConfigType<typeof appConfig>) => buildDataSourceOptions(config),
    }),
    DatabaseModule,
    ActivitiesModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
