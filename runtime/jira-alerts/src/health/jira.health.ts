/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { Inject, Injectable } from '@nestjs/common';
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { TRACKER_CLIENT, TrackerClient } from '../jira/tracker.interface';

@Injectable()
export class JiraHealthIndicator extends HealthIndicator {
  constructor(@Inject(TRACKER_CLIENT) private readonly tracker: TrackerClient) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    try {
      const info = await this.tracker.serverInfo();
      return this.getStatus(key, true, { version: info.version });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new HealthCheckError('Jira check failed', this.getStatus(key, false, { message }));
    }
  }
}
