/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { TrackerError } from '../../src/jira/jira.errors';
import {
  CreatedIssue,
  IssueUpdate,
  NewIssue,
  ServerInfo,
  TrackerClient,
  TrackerIssue,
  Transition,
} from '../../src/jira/tracker.interface';
import { JIRA_URL } from './fixtures';

/**
 * In-memory tracker. Issues and the transitions each one offers are set up
 * by the test; every mutation is recorded for assertions.
 */
export class FakeTracker implements TrackerClient {
  issues: TrackerIssue[] = [];
  transitions = new Map<string, Transition[]>();
  failWith?: TrackerError;

  readonly searches: { project: string; label: string }[] = [];
  readonly created: NewIssue[] = [];
  readonly listed: string[] = [];
  readonly executed: { issueKey: string; transitionId: string }[] = [];
  readonly updated: { issueKey: string; update: IssueUpdate }[] = [];

  private nextNumber = 100;

  async searchByFingerprint(project: string, fingerprintLabel: string): Promise<TrackerIssue[]> {
    this.throwIfFailing();
    this.searches.push({ project, label: fingerprintLabel });
    return this.issues.filter(
      (issue) => issue.key.startsWith(`${project}-`) && issue.labels.includes(fingerprintLabel),
    );
  }

  async createIssue(issue: NewIssue): Promise<CreatedIssue> {
    this.throwIfFailing();
    this.created.push(issue);
    const number = this.nextNumber++;
    return { id: String(10000 + number), key: `${issue.project}-${number}` };
  }

  async listTransitions(issueKey: string): Promise<Transition[]> {
    this.throwIfFailing();
    this.listed.push(issueKey);
    return this.transitions.get(issueKey) ?? [];
  }

  async executeTransition(issueKey: string, transitionId: string): Promise<void> {
    this.throwIfFailing();
    this.executed.push({ issueKey, transitionId });
  }

  async updateIssue(issueKey: string, update: IssueUpdate): Promise<void> {
    this.throwIfFailing();
    this.updated.push({ issueKey, update });
  }

  async serverInfo(): Promise<ServerInfo> {
    this.throwIfFailing();
    return { baseUrl: JIRA_URL, version: '9.12.0' };
  }

  browseUrl(issueKey: string): string {
    return `${JIRA_URL}/browse/${issueKey}`;
  }

  private throwIfFailing() {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}
