/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { AlertGroup } from '../alertmanager/alertmanager.schema';
import { fingerprint, fingerprintLabel } from '../alertmanager/fingerprint';
import { composeDescription, issueLabels, renderDescription, renderSummary } from '../alertmanager/templates';
import { TRACKER_CLIENT, TrackerClient, TrackerIssue } from '../jira/tracker.interface';
import { MetricsService } from '../metrics/metrics.service';
import { firstValidTransition, transitionCheck } from './transitions';

export const RECONCILER_OPTIONS = Symbol('RECONCILER_OPTIONS');

export interface ReconcilerOptions {
  resolveTransitions: string[];
  reopenTransitions: string[];
  // Lower-cased status names that count as closed
  resolvedStatus: string[];
  labelPrefix: string;
  updateExisting: boolean;
}

export type ReconcileAction = 'created' | 'closed' | 'reopened' | 'updated' | 'unchanged' | 'ignored';

export interface IssueReport {
  created: string[];
  found: string[];
  updated: string[];
  resolved: string[];
  reopened: string[];
}

export interface ReconcileResult {
  fingerprint: string;
  action: ReconcileAction;
  issues: IssueReport;
}

function createdAt(issue: TrackerIssue): number {
  const time = Date.parse(issue.created);
  return Number.isNaN(time) ? 0 : time;
}

function issueNumber(issue: TrackerIssue): number {
  const number = Number(issue.key.slice(issue.key.lastIndexOf('-') + 1));
  return Number.isNaN(number) ? 0 : number;
}

/** Most recently created first; the issue number breaks ties. */
export function newestFirst(issues: TrackerIssue[]): TrackerIssue[] {
  return [...issues].sort((a, b) => createdAt(b) - createdAt(a) || issueNumber(b) - issueNumber(a));
}

@Injectable()
export class ReconcilerService {
  private readonly logger = new Logger(ReconcilerService.name);
  private readonly resolvedStatus: Set<string>;

  constructor(
    @Inject(TRACKER_CLIENT) private readonly tracker: TrackerClient,
    @Inject(RECONCILER_OPTIONS) private readonly options: ReconcilerOptions,
    private readonly metricsService: MetricsService,
  ) {
    this.resolvedStatus = new Set(options.resolvedStatus.map((status) => status.toLowerCase()));
  }

  /**
   * Brings the Jira issue of one alert group in line with the group's status.
   */
  async reconcile(project: string, issueType: string, group: AlertGroup): Promise<ReconcileResult> {
    const groupFingerprint = fingerprint(group.groupLabels);
    const label = fingerprintLabel(this.options.labelPrefix, groupFingerprint);
    const issues: IssueReport = { created: [], found: [], updated: [], resolved: [], reopened: [] };

    this.logger.log(`issue (${project}, ${issueType}): ${group.status} group ${groupFingerprint}`);

    const matches = newestFirst(await this.tracker.searchByFingerprint(project, label));
    issues.found = matches.map((match) => this.tracker.browseUrl(match.key));

    const issue = matches.shift();
    if (matches.length > 0) {
      this.logger.warn(
        `issue (${project}, ${issueType}): ${issue?.key} chosen over stale duplicates ${matches
          .map((match) => match.key)
          .join(', ')}`,
      );
    }

    const action = issue
      ? await this.reconcileExisting(project, issueType, group, issue, label, issues)
      : await this.reconcileMissing(project, issueType, group, label, issues);

    this.metricsService.recordAlertGroup(group.status, action);
    return { fingerprint: groupFingerprint, action, issues };
  }

  private async reconcileMissing(
    project: string,
    issueType: string,
    group: AlertGroup,
    label: string,
    issues: IssueReport,
  ): Promise<ReconcileAction> {
    // Do not create an issue for resolved groups that were never filed.
    if (group.status === 'resolved') {
      this.logger.debug(`issue (${project}, ${issueType}): resolved group without issue, nothing to close`);
      return 'ignored';
    }

    const created = await this.tracker.createIssue({
      project,
      issueType,
      summary: renderSummary(group),
      description: composeDescription(renderDescription(group)),
      labels: issueLabels(group.commonLabels, label),
    });
    issues.created.push(this.tracker.browseUrl(created.key));
    this.logger.log(`issue (${project}, ${issueType}), new issue created (${created.key})`);
    return 'created';
  }

  private async reconcileExisting(
    project: string,
    issueType: string,
    group: AlertGroup,
    issue: TrackerIssue,
    label: string,
    issues: IssueReport,
  ): Promise<ReconcileAction> {
    const url = this.tracker.browseUrl(issue.key);
    const closed = this.isClosed(issue);
    let action: ReconcileAction = 'unchanged';

    this.logger.debug(
      `issue (${project}, ${issueType}), jira issue found: ${issue.key} (${issue.status || 'unknown status'})`,
    );

    if (group.status === 'resolved' && !closed) {
      if (await this.applyTransition(issue, this.options.resolveTransitions, 'close')) {
        issues.resolved.push(url);
        action = 'closed';
      }
    } else if (group.status === 'firing' && closed) {
      if (await this.applyTransition(issue, this.options.reopenTransitions, 'reopen')) {
        issues.reopened.push(url);
        action = 'reopened';
      }
    }

    if (this.options.updateExisting) {
      await this.tracker.updateIssue(issue.key, {
        summary: renderSummary(group),
        description: composeDescription(renderDescription(group), issue.description),
        labels: [...new Set([...issue.labels, ...issueLabels(group.commonLabels, label)])],
      });
      issues.updated.push(url);
      this.logger.log(`issue (${project}, ${issueType}), ${issue.key} updated`);
      if (action === 'unchanged') {
        action = 'updated';
      }
    }

    return action;
  }

  private isClosed(issue: TrackerIssue): boolean {
    return issue.statusCategory === 'done' || this.resolvedStatus.has(issue.status.toLowerCase());
  }

  private async applyTransition(
    issue: TrackerIssue,
    candidates: string[],
    purpose: 'close' | 'reopen',
  ): Promise<boolean> {
    const { transition, attempted } = await firstValidTransition(
      candidates,
      transitionCheck(this.tracker, issue.key),
    );

    if (!transition) {
      this.logger.warn(`Unable to find transition to ${purpose} ${issue.key} (tried: ${attempted.join(', ')})`);
      return false;
    }

    this.logger.debug(`issue ${issue.key}: checked ${attempted.join(', ')}`);
    await this.tracker.executeTransition(issue.key, transition.id);
    this.logger.log(`issue ${issue.key}: transition "${transition.name}" executed to ${purpose}`);
    return true;
  }
}
