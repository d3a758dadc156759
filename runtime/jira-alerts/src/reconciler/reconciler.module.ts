/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Env } from '../config/env';
import { JiraModule } from '../jira/jira.module';
import { RECONCILER_OPTIONS, ReconcilerOptions, ReconcilerService } from './reconciler.service';

@Module({
  imports: [JiraModule],
  providers: [
    {
      provide: RECONCILER_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<Env, true>): ReconcilerOptions => ({
        resolveTransitions: configService.get('RESOLVE_TRANSITIONS', { infer: true }),
        reopenTransitions: configService.get('REOPEN_TRANSITIONS', { infer: true }),
        resolvedStatus: configService.get('RESOLVED_STATUS', { infer: true }),
        labelPrefix: configService.get('FINGERPRINT_LABEL_PREFIX', { infer: true }),
        updateExisting: configService.get('UPDATE_EXISTING_ISSUES', { infer: true }),
      }),
    },
    ReconcilerService,
  ],
  exports: [ReconcilerService],
})
export class ReconcilerModule {}
