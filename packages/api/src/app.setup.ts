import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { HttpAdapterHost } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { existsSync } from 'fs';

import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { appConfig } from './config/app.config';

const logger = new Logger('AppSetup');

/** Global pipes, filters and static assets shared by the server and its tests. */
export function configureApp(app: NestExpressApplication): ConfigType<typeof appConfig> {
  const config = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );
  app.useGlobalFilters(new HttpExceptionFilter(app.get(HttpAdapterHost)));

  if (existsSync(config.staticDir)) {
    app.useStaticAssets(config.staticDir, { prefix: '/static' });
  } else {
    logger.warn(`Static directory ${config.staticDir} not found; /static is not served.`);
  }

  return config;
}
