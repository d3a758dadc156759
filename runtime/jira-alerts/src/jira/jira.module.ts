/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Env } from '../config/env';
import { JIRA_CLIENT_OPTIONS, JiraClient, JiraClientOptions } from './jira.client';
import { TRACKER_CLIENT } from './tracker.interface';

@Module({
  providers: [
    {
      provide: JIRA_CLIENT_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<Env, true>): JiraClientOptions => ({
        baseUrl: configService.get('JIRA_URL', { infer: true }),
        username: configService.get('JIRA_USERNAME', { infer: true }),
        password: configService.get('JIRA_PASSWORD', { infer: true }),
        timeoutMs: configService.get('JIRA_TIMEOUT_MS', { infer: true }),
      }),
    },
    JiraClient,
    { provide: TRACKER_CLIENT, useExisting: JiraClient },
  ],
  exports: [TRACKER_CLIENT],
})
export class JiraModule {}
