/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TerminusModule } from '@nestjs/terminus';
import { EnvOverrides, validateEnv } from './config/env';
import { HealthController } from './health/health.controller';
import { JiraHealthIndicator } from './health/jira.health';
import { IssuesModule } from './issues/issues.module';
import { JiraModule } from './jira/jira.module';
import { MetricsModule } from './metrics/metrics.module';

@Module({})
export class AppModule {
  /**
   * @param overrides values taken from the command line, applied over the
   * environment before validation
   */
  static forRoot(overrides: EnvOverrides = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          envFilePath: ['.env.local', '.env'],
          validate: (config) => validateEnv({ ...config, ...overrides }),
        }),
        TerminusModule,
        MetricsModule,
        JiraModule,
        IssuesModule,
      ],
      controllers: [HealthController],
      providers: [JiraHealthIndicator],
    };
  }
}
