/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { Injectable } from '@nestjs/common';
import { Registry, Counter, Histogram } from 'prom-client';

@Injectable()
export class MetricsService {
  private readonly registry: Registry;

  // Counters
  private readonly errorsTotal: Counter;
  private readonly jiraErrorsTotal: Counter;
  private readonly alertGroupsTotal: Counter;

  // Histograms
  private readonly jiraRequestLatency: Histogram;
  private readonly requestLatency: Histogram;

  constructor() {
    this.registry = new Registry();

    this.errorsTotal = new Counter({
      name: 'errors_total',
      help: 'Number of errors',
      registers: [this.registry],
    });

    this.jiraErrorsTotal = new Counter({
      name: 'jira_errors_total',
      help: 'Number of jira errors',
      labelNames: ['action'],
      registers: [this.registry],
    });

    this.alertGroupsTotal = new Counter({
      name: 'alert_groups_total',
      help: 'Number of alert groups reconciled, by group status and outcome',
      labelNames: ['status', 'action'],
      registers: [this.registry],
    });

    this.jiraRequestLatency = new Histogram({
      name: 'jira_request_latency_seconds',
      help: 'Latency when querying the JIRA API',
      labelNames: ['action'],
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
      registers: [this.registry],
    });

    this.requestLatency = new Histogram({
      name: 'request_latency_seconds',
      help: 'Latency of incoming requests',
      labelNames: ['endpoint'],
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
      registers: [this.registry],
    });
  }

  incrementErrors() {
    this.errorsTotal.inc();
  }

  incrementJiraErrors(action: string) {
    this.jiraErrorsTotal.inc({ action });
  }

  recordAlertGroup(status: string, action: string) {
    this.alertGroupsTotal.inc({ status, action });
  }

  startJiraTimer(action: string): () => void {
    const end = this.jiraRequestLatency.startTimer({ action });
    return () => {
      end();
    };
  }

  startRequestTimer(endpoint: string): () => void {
    const end = this.requestLatency.startTimer({ endpoint });
    return () => {
      end();
    };
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
