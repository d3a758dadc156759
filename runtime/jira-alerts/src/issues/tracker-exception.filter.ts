/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { TrackerError } from '../jira/jira.errors';
import { MetricsService } from '../metrics/metrics.service';

// Alertmanager retries a delivery that failed with a 5xx.
@Catch(TrackerError)
export class TrackerExceptionFilter implements ExceptionFilter<TrackerError> {
  private readonly logger = new Logger(TrackerExceptionFilter.name);

  constructor(private readonly metricsService: MetricsService) {}

  catch(exception: TrackerError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();

    this.metricsService.incrementErrors();
    this.logger.error(`${exception.message}: ${exception.detail.join('; ')}`);

    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      status: exception.message,
      error: exception.kind,
      action: exception.action,
      detail: exception.detail,
    });
  }
}
