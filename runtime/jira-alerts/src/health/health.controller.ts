/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckResult, HealthCheckService } from '@nestjs/terminus';
import { JiraHealthIndicator } from './jira.health';

@Controller('-')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly jira: JiraHealthIndicator,
  ) {}

  // Liveness only; Jira being down must not get the process restarted.
  @Get(['health', 'healthy'])
  @HealthCheck()
  live(): Promise<HealthCheckResult> {
    return this.health.check([]);
  }

  @Get('ready')
  @HealthCheck()
  ready(): Promise<HealthCheckResult> {
    return this.health.check([() => this.jira.isHealthy('jira')]);
  }
}
