/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { Env } from './config/env';

/**
 * HTTP settings shared by the server and the e2e tests. Must run before
 * `listen()` or `init()`, while the default body parsers are not yet in place.
 */
export function configureApp(app: NestExpressApplication): NestExpressApplication {
  const configService = app.get<ConfigService<Env, true>>(ConfigService);

  // Alertmanager posts whole groups; large groups exceed Express's 100kb default.
  app.useBodyParser('json', { limit: configService.get('MAX_BODY_SIZE', { infer: true }) });

  app.enableCors({
    origin: configService.get('ALLOWED_ORIGINS', { infer: true }),
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });

  return app;
}
