/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  UseFilters,
} from '@nestjs/common';
import { AlertGroup, AlertGroupSchema } from '../alertmanager/alertmanager.schema';
import { MetricsService } from '../metrics/metrics.service';
import { ReconcileResult, ReconcilerService } from '../reconciler/reconciler.service';
import { TrackerExceptionFilter } from './tracker-exception.filter';
import { ZodValidationPipe } from './zod-validation.pipe';

export interface IssuesResponse extends ReconcileResult {
  status: 'OK';
}

const alertGroupPipe = new ZodValidationPipe(AlertGroupSchema, 'Alertmanager notification');

/**
 * Alertmanager webhook receiver, generic webhook versions 3 and 4.
 */
@Controller(['issues', 'api/issues'])
@UseFilters(TrackerExceptionFilter)
export class IssuesController {
  private readonly logger = new Logger(IssuesController.name);

  constructor(
    private readonly reconciler: ReconcilerService,
    private readonly metricsService: MetricsService,
  ) {}

  @Post(':project/:issueType')
  @HttpCode(HttpStatus.OK)
  async fileIssue(
    @Param('project') project: string,
    @Param('issueType') issueType: string,
    @Body(alertGroupPipe) group: AlertGroup,
  ): Promise<IssuesResponse> {
    return this.handle('/issues/<project>/<issue_type>', project, issueType, group);
  }

  /** Project and issue type come from the `project` and `issue_type` common labels. */
  @Post()
  @HttpCode(HttpStatus.OK)
  async fileIssueFromLabels(@Body(alertGroupPipe) group: AlertGroup): Promise<IssuesResponse> {
    const project: string | undefined = group.commonLabels['project'];
    const issueType: string | undefined = group.commonLabels['issue_type'];

    if (!project || !issueType) {
      this.logger.error('/issues, required commonLabels not found: issue_type or project');
      throw new BadRequestException('Required commonLabels not found: issue_type or project');
    }

    return this.handle('/issues', project, issueType, group);
  }

  private async handle(
    endpoint: string,
    project: string,
    issueType: string,
    group: AlertGroup,
  ): Promise<IssuesResponse> {
    const stopTimer = this.metricsService.startRequestTimer(endpoint);
    try {
      const result = await this.reconciler.reconcile(project, issueType, group);
      return { status: 'OK', ...result };
    } finally {
      stopTimer();
    }
  }
}
