/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { parseCommandLine } from './config/cli';
import { Env, logLevels } from './config/env';

async function bootstrap() {
  const overrides = parseCommandLine(process.argv.slice(2));
  const app = await NestFactory.create<NestExpressApplication>(AppModule.forRoot(overrides), {
    bufferLogs: true,
  });
  const configService = app.get<ConfigService<Env, true>>(ConfigService);
  const logger = new Logger('JiraAlerts');

  app.useLogger(logLevels(configService.get('LOG_LEVEL', { infer: true })));
  app.enableShutdownHooks();
  configureApp(app);

  const port = configService.get('PORT', { infer: true });
  await app.listen(port);

  logger.log(`jira-alerts started on port ${port}`);
  logger.log(`Jira server: ${configService.get('JIRA_URL', { infer: true })}`);
  logger.log(`Alertmanager webhook endpoint: http://localhost:${port}/issues/<project>/<issue_type>`);
}

bootstrap().catch((error) => {
  console.error('Failed to start jira-alerts:', error);
  process.exit(1);
});
