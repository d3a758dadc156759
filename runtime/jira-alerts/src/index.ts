/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

export { AppModule } from './app.module';
export { ReconcilerService } from './reconciler/reconciler.service';
export { JiraClient } from './jira/jira.client';
export { fingerprint, fingerprintLabel, canonicalLabels } from './alertmanager/fingerprint';
export { renderSummary, renderDescription, issueLabels } from './alertmanager/templates';
export { TrackerError, TrackerRejectedError, TrackerUnreachableError } from './jira/jira.errors';
export { TRACKER_CLIENT } from './jira/tracker.interface';
export { AlertGroupSchema } from './alertmanager/alertmanager.schema';

export type { AlertGroup, Alert, AlertStatus } from './alertmanager/alertmanager.schema';
export type {
  TrackerClient,
  TrackerIssue,
  Transition,
  NewIssue,
  CreatedIssue,
  IssueUpdate,
} from './jira/tracker.interface';
export type { ReconcileResult, ReconcileAction, ReconcilerOptions } from './reconciler/reconciler.service';
